import { normalizePublicKey, type IdentityKey } from '../identity/keypair.js';
import { addressKey, type Address } from './address.js';
import type { VerifiedPeer } from './peer.js';

/**
 * In-memory index of verified peers, keyed by identity, with secondary
 * lookup by address and public key
 */
export class VerifiedPeerStore {
  private peers: Map<IdentityKey, VerifiedPeer> = new Map();
  private byAddress: Map<string, IdentityKey> = new Map();
  private byPublicKey: Map<string, IdentityKey> = new Map();
  /** Address key each identity is currently indexed under */
  private indexedAddress: Map<IdentityKey, string> = new Map();

  /**
   * Add or update a peer in the store.
   * If a peer with the same identity exists, it is replaced and re-indexed
   * under the new object's address.
   *
   * @param peer - The peer to add or update
   * @returns true if the identity was not in the store before
   */
  addOrUpdatePeer(peer: VerifiedPeer): boolean {
    const isNew = !this.peers.has(peer.identityKey);
    this.peers.set(peer.identityKey, peer);
    this.byPublicKey.set(peer.publicKey, peer.identityKey);
    this.reindex(peer);
    return isNew;
  }

  /**
   * Remove a peer from the store.
   *
   * @param identityKey - The identity of the peer to remove
   * @returns The removed peer, or undefined if it wasn't stored
   */
  removePeer(identityKey: IdentityKey): VerifiedPeer | undefined {
    const peer = this.peers.get(identityKey);
    if (!peer) {
      return undefined;
    }

    this.peers.delete(identityKey);
    this.byPublicKey.delete(peer.publicKey);
    const indexed = this.indexedAddress.get(identityKey);
    this.indexedAddress.delete(identityKey);
    if (indexed !== undefined) {
      this.releaseAddress(indexed, identityKey);
    }
    return peer;
  }

  getPeer(identityKey: IdentityKey): VerifiedPeer | undefined {
    return this.peers.get(identityKey);
  }

  has(identityKey: IdentityKey): boolean {
    return this.peers.has(identityKey);
  }

  /**
   * Find the verified peer currently holding an address.
   *
   * Peer objects are shared with the caller, so an address may have been
   * changed in place since the peer was indexed. Such an entry no longer
   * matches here; it is indexed under the new address the next time the
   * peer passes through addOrUpdatePeer.
   */
  getByAddress(address: Address): VerifiedPeer | undefined {
    const key = addressKey(address);
    const indexed = this.byAddress.get(key);
    if (indexed === undefined) {
      return undefined;
    }
    const candidate = this.peers.get(indexed);
    if (candidate && addressKey(candidate.address) === key) {
      return candidate;
    }
    return undefined;
  }

  getByPublicKey(publicKey: string | Uint8Array): VerifiedPeer | undefined {
    const identityKey = this.byPublicKey.get(normalizePublicKey(publicKey));
    return identityKey === undefined ? undefined : this.peers.get(identityKey);
  }

  /**
   * Get all peers in the store, in the order they were first added.
   */
  allPeers(): VerifiedPeer[] {
    return Array.from(this.peers.values());
  }

  get size(): number {
    return this.peers.size;
  }

  private reindex(peer: VerifiedPeer): void {
    const previous = this.indexedAddress.get(peer.identityKey);
    const current = addressKey(peer.address);
    this.indexedAddress.set(peer.identityKey, current);
    if (previous !== undefined && previous !== current) {
      this.releaseAddress(previous, peer.identityKey);
    }
    this.byAddress.set(current, peer.identityKey);
  }

  /**
   * Drop the address entry owned by `identityKey`. Another identity may
   * share the endpoint (e.g. behind the same NAT); it takes the entry over.
   */
  private releaseAddress(key: string, identityKey: IdentityKey): void {
    if (this.byAddress.get(key) !== identityKey) {
      return;
    }
    this.byAddress.delete(key);
    for (const [otherIdentity, otherKey] of this.indexedAddress) {
      if (otherKey === key) {
        this.byAddress.set(key, otherIdentity);
        return;
      }
    }
  }
}
