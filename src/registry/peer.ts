import { computeIdentityKey, normalizePublicKey, type IdentityKey } from '../identity/keypair.js';
import type { Address } from './address.js';

/**
 * A remote peer whose identity has been cryptographically established
 */
export interface VerifiedPeer {
  /** Identity (hex-encoded DER ed25519 public key) */
  readonly publicKey: string;
  /** Fingerprint of publicKey; the only thing registry equality looks at */
  readonly identityKey: IdentityKey;
  /** Network address the peer was last seen at */
  address: Address;
  /** Lamport clock of the last message received from the peer */
  clock: number;
  /** Unix timestamp (ms) when this peer was last seen */
  lastSeen: number;
}

/**
 * Creates a verified peer record for a public key the caller has already verified.
 */
export function createVerifiedPeer(
  publicKey: string | Uint8Array,
  address: Address,
  options: { clock?: number; lastSeen?: number } = {}
): VerifiedPeer {
  return {
    publicKey: normalizePublicKey(publicKey),
    identityKey: computeIdentityKey(publicKey),
    address,
    clock: options.clock ?? 0,
    lastSeen: options.lastSeen ?? Date.now(),
  };
}

/**
 * Advances the peer's Lamport clock and refreshes lastSeen.
 * A lower clock value never moves the clock back.
 */
export function updateClock(peer: VerifiedPeer, clock: number, now: number = Date.now()): void {
  peer.clock = Math.max(peer.clock, clock);
  peer.lastSeen = now;
}
