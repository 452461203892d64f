import { EventEmitter } from 'node:events';
import type { RegistryConfig } from '../config.js';
import type { IdentityKey } from '../identity/keypair.js';
import { addressKey, type Address } from './address.js';
import { Blacklist } from './blacklist.js';
import type { VerifiedPeer } from './peer.js';
import { VerifiedPeerStore } from './peer-store.js';
import {
  ProvenanceGraph,
  addressNodeKey,
  peerNodeKey,
  type NodeKey,
} from './provenance-graph.js';
import { ServiceIndex } from './service-index.js';
import type { ServiceId } from './service-id.js';
import { describePeer, shortKey } from '../utils.js';

export interface Logger {
  debug(message: string): void;
}

/**
 * Events emitted by PeerRegistry. All are emitted synchronously from
 * inside the mutation that caused them.
 */
export interface PeerRegistryEvents {
  /** An introduction was recorded: `address` is walkable with `introducer` as parent */
  'address-discovered': (address: Address, introducer: VerifiedPeer) => void;
  /** A new identity became verified; `promoted` if it replaced an address-only entry */
  'peer-verified': (peer: VerifiedPeer, promoted: boolean) => void;
  /** A verified peer was removed */
  'peer-removed': (peer: VerifiedPeer) => void;
  /** An address-only entry was removed */
  'address-removed': (address: Address) => void;
}

/**
 * The peer discovery registry: which peers are verified, which addresses
 * are only known through introductions, who introduced whom, and which
 * services each identity advertises.
 *
 * No operation throws for unknown, duplicate, stale or blacklisted input;
 * such calls are no-ops.
 */
export class PeerRegistry extends EventEmitter {
  readonly blacklist: Blacklist = new Blacklist();
  private graph: ProvenanceGraph = new ProvenanceGraph();
  private peerStore: VerifiedPeerStore = new VerifiedPeerStore();
  private serviceIndex: ServiceIndex = new ServiceIndex();
  private logger: Logger | null;

  constructor(logger?: Logger) {
    super();
    this.logger = logger ?? null;
  }

  /**
   * Create a registry with its blacklist populated from configuration.
   */
  static fromConfig(config: RegistryConfig, logger?: Logger): PeerRegistry {
    const registry = new PeerRegistry(logger);
    for (const address of config.blacklist) {
      registry.blacklist.add(address);
    }
    for (const identityKey of config.blacklistedIdentities) {
      registry.blacklist.addIdentity(identityKey);
    }
    return registry;
  }

  /**
   * Record that `introducer` told us about `address`.
   *
   * The introducer is registered as verified (the caller vouches for it),
   * whatever the blacklist says about it. The address becomes walkable
   * with the introducer as its parent, unless it is blacklisted, already
   * held by a verified peer, or already has a living parent.
   */
  discoverAddress(introducer: VerifiedPeer, address: Address): void {
    this.registerPeer(introducer);

    if (this.blacklist.isBlacklisted(address)) {
      this.logger?.debug(`Dropped introduction of blacklisted ${addressKey(address)} from ${shortKey(introducer.identityKey)}`);
      return;
    }

    if (this.peerStore.getByAddress(address)) {
      return;
    }

    const key = addressNodeKey(address);
    const parent = this.graph.parentOf(key);
    if (parent !== undefined) {
      if (parent !== peerNodeKey(introducer.identityKey)) {
        this.logger?.debug(`Ignored introduction of ${addressKey(address)} from ${shortKey(introducer.identityKey)}: already introduced`);
      }
      return;
    }

    const node = this.graph.addAddressNode(address);
    this.graph.addEdge(peerNodeKey(introducer.identityKey), node.key);
    this.emit('address-discovered', node.address, introducer);
  }

  /**
   * Merge `services` into the set recorded for the peer's identity.
   * Verification state is irrelevant.
   */
  discoverServices(peer: VerifiedPeer, services: Iterable<ServiceId>): void {
    const added = this.serviceIndex.discover(peer.identityKey, services);
    if (added.length > 0) {
      this.logger?.debug(`${shortKey(peer.identityKey)} advertises ${added.length} new service(s)`);
    }
  }

  /**
   * Register a peer whose identity has been established.
   * Ignored if its address or identity is blacklisted.
   */
  addVerifiedPeer(peer: VerifiedPeer): void {
    if (this.blacklist.isBlacklisted(peer.address) || this.blacklist.isIdentityBlacklisted(peer.identityKey)) {
      this.logger?.debug(`Refused blacklisted peer ${describePeer(peer)}`);
      return;
    }
    this.registerPeer(peer);
  }

  /**
   * Remove a peer: its verified entry if it has one, otherwise the
   * address-only entry at its address. Its services are forgotten.
   * Addresses it introduced stay walkable, without a parent.
   */
  removePeer(peer: VerifiedPeer): void {
    const peerKey = peerNodeKey(peer.identityKey);
    if (this.graph.hasNode(peerKey)) {
      this.removeIdentity(peer.identityKey, peerKey);
      return;
    }

    const servicesRemoved = this.serviceIndex.remove(peer.identityKey);
    if (this.removeAddressNode(peer.address)) {
      return;
    }
    if (!servicesRemoved) {
      this.logger?.debug(`Remove of unknown peer ${describePeer(peer)} ignored`);
    }
  }

  /**
   * Remove whatever is known at `address`: the verified peer currently
   * holding it, otherwise the address-only entry.
   */
  removeByAddress(address: Address): void {
    const verified = this.peerStore.getByAddress(address);
    if (verified) {
      this.removeIdentity(verified.identityKey, peerNodeKey(verified.identityKey));
      return;
    }

    if (!this.removeAddressNode(address)) {
      this.logger?.debug(`Remove of unknown address ${addressKey(address)} ignored`);
    }
  }

  /**
   * Addresses known only through introductions, in discovery order.
   * With `service`, only those whose direct introducer advertises it.
   */
  getWalkableAddresses(service?: ServiceId): Address[] {
    const result: Address[] = [];
    for (const node of this.graph.addressNodes()) {
      if (this.blacklist.isBlacklisted(node.address) || this.peerStore.getByAddress(node.address)) {
        continue;
      }
      if (service !== undefined) {
        const introducer = this.introducerIdentity(node.key);
        if (introducer === undefined || !this.serviceIndex.offers(introducer, service)) {
          continue;
        }
      }
      result.push(node.address);
    }
    return result;
  }

  /**
   * Address-only entries the peer introduced, in the order it introduced them.
   */
  getIntroductionsFrom(peer: VerifiedPeer): Address[] {
    const result: Address[] = [];
    for (const child of this.graph.childrenOf(peerNodeKey(peer.identityKey))) {
      if (child.kind === 'address') {
        result.push(child.address);
      }
    }
    return result;
  }

  /**
   * The verified peer that introduced `address`, if it is still known.
   * For a promoted peer, the introducer of the address it was promoted from.
   */
  getIntroducer(address: Address): VerifiedPeer | undefined {
    const verified = this.peerStore.getByAddress(address);
    const key = verified ? peerNodeKey(verified.identityKey) : addressNodeKey(address);
    const introducer = this.introducerIdentity(key);
    return introducer === undefined ? undefined : this.peerStore.getPeer(introducer);
  }

  getServicesForPeer(peer: VerifiedPeer): Set<ServiceId> {
    return this.serviceIndex.servicesOf(peer.identityKey);
  }

  /**
   * Verified peers advertising `service`. Unverified identities with
   * recorded services are never returned.
   */
  getPeersForService(service: ServiceId): VerifiedPeer[] {
    return this.peerStore.allPeers().filter(peer => this.serviceIndex.offers(peer.identityKey, service));
  }

  getVerifiedByAddress(address: Address): VerifiedPeer | undefined {
    return this.peerStore.getByAddress(address);
  }

  getVerifiedByPublicKey(publicKey: string | Uint8Array): VerifiedPeer | undefined {
    return this.peerStore.getByPublicKey(publicKey);
  }

  getVerifiedByIdentity(identityKey: IdentityKey): VerifiedPeer | undefined {
    return this.peerStore.getPeer(identityKey);
  }

  isVerified(peer: VerifiedPeer): boolean {
    return this.peerStore.has(peer.identityKey);
  }

  /**
   * Snapshot of the verified peers, in the order they were first verified.
   */
  get verifiedPeers(): readonly VerifiedPeer[] {
    return this.peerStore.allPeers();
  }

  /**
   * Registration without the blacklist check. Keeps the graph and the
   * verified index in step: a peer node exists iff the identity is stored.
   */
  private registerPeer(peer: VerifiedPeer): void {
    const key = peerNodeKey(peer.identityKey);

    if (this.graph.hasNode(key)) {
      this.peerStore.addOrUpdatePeer(peer);
      // The peer may have moved onto an address we only knew by introduction
      if (this.graph.absorb(addressNodeKey(peer.address), key)) {
        this.logger?.debug(`Absorbed address ${addressKey(peer.address)} into ${shortKey(peer.identityKey)}`);
      }
      return;
    }

    this.graph.addPeerNode(peer.identityKey);
    const promoted = this.graph.absorb(addressNodeKey(peer.address), key);
    this.peerStore.addOrUpdatePeer(peer);

    if (promoted) {
      this.logger?.debug(`Promoted ${addressKey(peer.address)} to verified peer ${shortKey(peer.identityKey)}`);
    }
    this.emit('peer-verified', peer, promoted);
  }

  private removeIdentity(identityKey: IdentityKey, key: NodeKey): void {
    this.graph.removeNode(key);
    this.serviceIndex.remove(identityKey);
    const removed = this.peerStore.removePeer(identityKey);
    if (removed) {
      this.emit('peer-removed', removed);
    }
  }

  private removeAddressNode(address: Address): boolean {
    const key = addressNodeKey(address);
    const node = this.graph.getNode(key);
    if (node?.kind !== 'address') {
      return false;
    }
    this.graph.removeNode(key);
    this.emit('address-removed', node.address);
    return true;
  }

  private introducerIdentity(key: NodeKey): IdentityKey | undefined {
    const parent = this.graph.parentOf(key);
    if (parent === undefined) {
      return undefined;
    }
    const node = this.graph.getNode(parent);
    return node?.kind === 'peer' ? node.identityKey : undefined;
  }
}
