/**
 * Signed Request Envelopes
 *
 * Every mutating API call carries
 *   { publicKey, signature, timestamp, nonce, body }
 * where `signature` is a secp256k1 signature over the hex of
 *   canonicalCBOR({ action, body, timestamp, nonce }).
 * The caller identity is the P2PKH address of `publicKey`.
 */

import { BitcoinNetworkName, generateNonce, publicKeyToAddress, signMessage, verifySignature } from '../crypto';
import { canonicalCborEncode } from '../crypto/canonical-cbor';

export type RequestBody = Record<string, string>;

export interface SignedRequest {
  publicKey: string;
  signature: string;
  timestamp: number;
  nonce: string;
  body: RequestBody;
}

export interface AuthenticatedRequest {
  caller: string;
  body: RequestBody;
}

export class RequestAuthError extends Error {
  constructor(message: string, readonly status: 400 | 401) {
    super(message);
    this.name = 'RequestAuthError';
  }
}

export function buildSigningMessage(action: string, body: RequestBody, timestamp: number, nonce: string): string {
  return canonicalCborEncode({ action, body, timestamp, nonce }).toString('hex');
}

export function signRequest(
  action: string,
  body: RequestBody,
  keys: { privateKey: string; publicKey: string },
  timestamp: number = Date.now()
): SignedRequest {
  const nonce = generateNonce();
  return {
    publicKey: keys.publicKey,
    signature: signMessage(buildSigningMessage(action, body, timestamp, nonce), keys.privateKey),
    timestamp,
    nonce,
    body,
  };
}

function isRequestBody(value: unknown): value is RequestBody {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

function parseEnvelope(raw: unknown): SignedRequest {
  if (raw === null || typeof raw !== 'object') {
    throw new RequestAuthError('Request must be a signed JSON envelope', 400);
  }
  if (!('publicKey' in raw && 'signature' in raw && 'timestamp' in raw && 'nonce' in raw && 'body' in raw)) {
    throw new RequestAuthError('Envelope requires publicKey, signature, timestamp, nonce and body', 400);
  }

  const { publicKey, signature, timestamp, nonce, body } = raw;
  if (typeof publicKey !== 'string' || !/^(02|03)[0-9a-fA-F]{64}$/.test(publicKey)) {
    throw new RequestAuthError('publicKey must be a compressed public key in hex', 400);
  }
  if (typeof signature !== 'string' || !/^[0-9a-fA-F]{128}$/.test(signature)) {
    throw new RequestAuthError('signature must be 64 bytes of hex', 400);
  }
  if (typeof timestamp !== 'number' || !Number.isSafeInteger(timestamp)) {
    throw new RequestAuthError('timestamp must be an integer (ms since epoch)', 400);
  }
  if (typeof nonce !== 'string' || nonce.length < 16 || nonce.length > 128) {
    throw new RequestAuthError('nonce must be 16-128 characters', 400);
  }
  if (!isRequestBody(body)) {
    throw new RequestAuthError('body must be an object of string fields', 400);
  }
  return { publicKey, signature, timestamp, nonce, body };
}

export class RequestAuthenticator {
  // nonce -> timestamp, kept for one freshness window
  private seenNonces: Map<string, number> = new Map();

  constructor(
    private network: BitcoinNetworkName,
    private maxAgeMs: number
  ) {}

  authenticate(action: string, raw: unknown, now: number = Date.now()): AuthenticatedRequest {
    const envelope = parseEnvelope(raw);

    if (Math.abs(now - envelope.timestamp) > this.maxAgeMs) {
      throw new RequestAuthError('Request timestamp outside the accepted window', 401);
    }

    const message = buildSigningMessage(action, envelope.body, envelope.timestamp, envelope.nonce);
    if (!verifySignature(message, envelope.signature, envelope.publicKey)) {
      throw new RequestAuthError('Invalid signature', 401);
    }

    this.pruneNonces(now);
    if (this.seenNonces.has(envelope.nonce)) {
      throw new RequestAuthError('Replayed nonce', 401);
    }
    this.seenNonces.set(envelope.nonce, envelope.timestamp);

    return {
      caller: publicKeyToAddress(envelope.publicKey, this.network),
      body: envelope.body,
    };
  }

  private pruneNonces(now: number): void {
    for (const [nonce, ts] of this.seenNonces) {
      if (now - ts > this.maxAgeMs) this.seenNonces.delete(nonce);
    }
  }
}
