import type { IdentityKey } from './identity/keypair.js';
import { addressKey } from './registry/address.js';
import type { VerifiedPeer } from './registry/peer.js';

/**
 * Get a short display version of an identity key: its first 8 characters.
 * Identity keys are hash fingerprints, so any 8 characters distinguish them
 * equally well.
 *
 * @param identityKey - The full identity key
 * @returns The first 8 characters followed by "..."
 */
export function shortKey(identityKey: IdentityKey): string {
  return identityKey.slice(0, 8) + "...";
}

/**
 * Formats a peer for log lines: "3f8c2247... @ 10.0.0.1:8090"
 */
export function describePeer(peer: VerifiedPeer): string {
  return `${shortKey(peer.identityKey)} @ ${addressKey(peer.address)}`;
}
