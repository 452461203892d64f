import type { IdentityKey } from '../identity/keypair.js';
import { addressKey, type Address } from './address.js';

/**
 * Addresses that must never enter the provenance graph, and identities
 * that must never be registered as verified peers.
 */
export class Blacklist {
  private entries: Map<string, Address> = new Map();
  private identities: Set<IdentityKey> = new Set();

  add(address: Address): void {
    this.entries.set(addressKey(address), address);
  }

  isBlacklisted(address: Address): boolean {
    return this.entries.has(addressKey(address));
  }

  addIdentity(identityKey: IdentityKey): void {
    this.identities.add(identityKey);
  }

  isIdentityBlacklisted(identityKey: IdentityKey): boolean {
    return this.identities.has(identityKey);
  }

  /**
   * Snapshot of the blacklisted addresses, in insertion order.
   */
  get addresses(): Address[] {
    return Array.from(this.entries.values());
  }
}
