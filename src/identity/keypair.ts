import { createHash, generateKeyPairSync } from 'node:crypto';

/**
 * Represents an ed25519 key pair for a node identity
 */
export interface KeyPair {
  publicKey: string;  // hex-encoded
  privateKey: string; // hex-encoded
}

/**
 * Stable key of a verified identity: hex SHA-1 fingerprint of the
 * DER-encoded public key.
 */
export type IdentityKey = string;

/**
 * Generates a new ed25519 key pair
 * @returns KeyPair with hex-encoded public and private keys
 */
export function generateKeyPair(): KeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');

  return {
    publicKey: publicKey.export({ type: 'spki', format: 'der' }).toString('hex'),
    privateKey: privateKey.export({ type: 'pkcs8', format: 'der' }).toString('hex'),
  };
}

/**
 * Normalizes a public key given as hex or raw bytes to lowercase hex
 */
export function normalizePublicKey(publicKey: string | Uint8Array): string {
  if (typeof publicKey === 'string') {
    return publicKey.toLowerCase();
  }
  return Buffer.from(publicKey).toString('hex');
}

/**
 * Derives the identity key of a public key.
 * Every encoding of the same key maps to the same identity.
 */
export function computeIdentityKey(publicKey: string | Uint8Array): IdentityKey {
  const der = Buffer.from(normalizePublicKey(publicKey), 'hex');
  return createHash('sha1').update(der).digest('hex');
}
