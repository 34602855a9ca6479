/**
 * Node configuration from the environment.
 *
 * Issuance constants are read once at startup and frozen; nothing changes
 * them while the process runs.
 */

import { BitcoinNetworkName } from '../crypto';
import { DEFAULT_ISSUANCE_CONFIG, IssuanceConfig, MINT_FACTOR_SCALE } from '../issuance/types';

export interface NodeConfig {
  controllerPublicKey: string;
  network: BitcoinNetworkName;
  port: number;
  dataDir: string;
  blockTimeMs: number;
  requestMaxAgeMs: number;
  issuance: Readonly<IssuanceConfig>;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number, problems: string[]): number {
  const raw = (env[name] || '').trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readBigInt(env: Env, name: string, fallback: bigint, min: bigint, problems: string[]): bigint {
  const raw = (env[name] || '').trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || BigInt(raw) < min) {
    problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return BigInt(raw);
}

export function loadNodeConfig(env: Env = process.env): NodeConfig {
  const problems: string[] = [];

  const controllerPublicKey = (env.CONTROLLER_PUBLIC_KEY || '').trim().toLowerCase();
  if (!controllerPublicKey) {
    problems.push('CONTROLLER_PUBLIC_KEY is required (run "npm run generate-keys")');
  } else if (!/^(02|03)[0-9a-f]{64}$/.test(controllerPublicKey)) {
    problems.push('CONTROLLER_PUBLIC_KEY must be a compressed secp256k1 public key in hex');
  }

  const networkRaw = (env.BITCOIN_NETWORK || 'testnet').trim();
  if (networkRaw !== 'mainnet' && networkRaw !== 'testnet') {
    problems.push(`BITCOIN_NETWORK must be "mainnet" or "testnet" (got "${networkRaw}")`);
  }
  const network: BitcoinNetworkName = networkRaw === 'mainnet' ? 'mainnet' : 'testnet';

  const d = DEFAULT_ISSUANCE_CONFIG;
  const issuance: IssuanceConfig = {
    maxIssuers: readInteger(env, 'MAX_ISSUERS', d.maxIssuers, 1, problems),
    issuerTermLength: readInteger(env, 'ISSUER_TERM_LENGTH', d.issuerTermLength, 1, problems),
    baseMintFactor: readInteger(env, 'BASE_MINT_FACTOR', d.baseMintFactor, 0, problems),
    // Zero supply is bootstrapped by minting exactly the floor
    supplyFloor: readBigInt(env, 'SUPPLY_FLOOR', d.supplyFloor, 1n, problems),
    earlyExitThresholdBps: readInteger(env, 'EARLY_EXIT_THRESHOLD_BPS', d.earlyExitThresholdBps, 0, problems),
    lowMintThreshold: readInteger(env, 'LOW_MINT_THRESHOLD', d.lowMintThreshold, 0, problems),
    burnBonusStep: readInteger(env, 'BURN_BONUS_STEP', d.burnBonusStep, 0, problems),
  };

  for (const [name, value] of [
    ['BASE_MINT_FACTOR', issuance.baseMintFactor],
    ['EARLY_EXIT_THRESHOLD_BPS', issuance.earlyExitThresholdBps],
    ['LOW_MINT_THRESHOLD', issuance.lowMintThreshold],
  ] as const) {
    if (value > MINT_FACTOR_SCALE) {
      problems.push(`${name} cannot exceed ${MINT_FACTOR_SCALE}`);
    }
  }

  const config: NodeConfig = {
    controllerPublicKey,
    network,
    port: readInteger(env, 'PORT', 3000, 0, problems),
    dataDir: (env.DATA_DIR || './data').trim(),
    blockTimeMs: readInteger(env, 'BLOCK_TIME_MS', 10000, 1, problems),
    requestMaxAgeMs: readInteger(env, 'REQUEST_MAX_AGE_MS', 5 * 60 * 1000, 1, problems),
    issuance: Object.freeze(issuance),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return Object.freeze(config);
}
