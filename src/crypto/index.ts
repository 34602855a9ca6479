import * as crypto from 'crypto';
import * as ecc from 'tiny-secp256k1';
import { ECPairFactory } from 'ecpair';
import * as bitcoin from 'bitcoinjs-lib';

const ECPair = ECPairFactory(ecc);

export type BitcoinNetworkName = 'mainnet' | 'testnet';

export function resolveNetwork(name: BitcoinNetworkName): bitcoin.Network {
  return name === 'mainnet' ? bitcoin.networks.bitcoin : bitcoin.networks.testnet;
}

export function sha256(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function signMessage(message: string, privateKeyHex: string): string {
  const messageHash = Buffer.from(sha256(message), 'hex');
  const keyPair = ECPair.fromPrivateKey(Buffer.from(privateKeyHex, 'hex'));
  if (!keyPair.privateKey) {
    throw new Error('Key pair has no private key');
  }

  const signature = ecc.sign(messageHash, keyPair.privateKey);
  return Buffer.from(signature).toString('hex');
}

export function verifySignature(message: string, signature: string, publicKeyHex: string): boolean {
  try {
    const messageHash = Buffer.from(sha256(message), 'hex');
    const publicKey = Buffer.from(publicKeyHex, 'hex');
    const signatureBuffer = Buffer.from(signature, 'hex');

    return ecc.verify(messageHash, publicKey, signatureBuffer);
  } catch {
    return false;
  }
}

export function generateKeyPair(network: BitcoinNetworkName): { privateKey: string; publicKey: string; address: string } {
  const keyPair = ECPair.makeRandom();
  if (!keyPair.privateKey) {
    throw new Error('Key generation produced no private key');
  }

  return {
    privateKey: keyPair.privateKey.toString('hex'),
    publicKey: keyPair.publicKey.toString('hex'),
    address: publicKeyToAddress(keyPair.publicKey.toString('hex'), network),
  };
}

export function publicKeyToAddress(publicKeyHex: string, network: BitcoinNetworkName): string {
  const { address } = bitcoin.payments.p2pkh({
    pubkey: Buffer.from(publicKeyHex, 'hex'),
    network: resolveNetwork(network),
  });
  if (!address) {
    throw new Error(`Cannot derive address from public key ${publicKeyHex}`);
  }
  return address;
}

/**
 * The null identity: P2PKH over the all-zero hash160. Nobody holds its key.
 */
export function nullIdentity(network: BitcoinNetworkName): string {
  const { address } = bitcoin.payments.p2pkh({
    hash: Buffer.alloc(20),
    network: resolveNetwork(network),
  });
  if (!address) {
    throw new Error('Cannot derive null identity');
  }
  return address;
}

export function isValidIdentity(identity: string, network: BitcoinNetworkName): boolean {
  try {
    const decoded = bitcoin.address.fromBase58Check(identity);
    return decoded.version === resolveNetwork(network).pubKeyHash;
  } catch {
    return false;
  }
}

export function generateNonce(): string {
  return crypto.randomBytes(32).toString('hex');
}
