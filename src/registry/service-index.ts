import type { IdentityKey } from '../identity/keypair.js';
import type { ServiceId } from './service-id.js';

/**
 * Services advertised per identity. Recorded whether or not the identity
 * has been verified yet.
 */
export class ServiceIndex {
  private services: Map<IdentityKey, Set<ServiceId>> = new Map();

  /**
   * Merge services into the identity's recorded set.
   *
   * @returns the services that were not recorded before
   */
  discover(identityKey: IdentityKey, services: Iterable<ServiceId>): ServiceId[] {
    let known = this.services.get(identityKey);
    if (!known) {
      known = new Set();
      this.services.set(identityKey, known);
    }

    const added: ServiceId[] = [];
    for (const service of services) {
      if (!known.has(service)) {
        known.add(service);
        added.push(service);
      }
    }

    if (known.size === 0) {
      this.services.delete(identityKey);
    }
    return added;
  }

  /**
   * Copy of the identity's recorded services; empty if none.
   */
  servicesOf(identityKey: IdentityKey): Set<ServiceId> {
    return new Set(this.services.get(identityKey));
  }

  offers(identityKey: IdentityKey, service: ServiceId): boolean {
    return this.services.get(identityKey)?.has(service) ?? false;
  }

  /**
   * @returns true if the identity had recorded services
   */
  remove(identityKey: IdentityKey): boolean {
    return this.services.delete(identityKey);
  }

  has(identityKey: IdentityKey): boolean {
    return this.services.has(identityKey);
  }
}
