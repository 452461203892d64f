import type { IdentityKey } from '../identity/keypair.js';
import { addressKey, type Address } from './address.js';

/**
 * Key of a graph node. Address nodes and peer nodes live in separate
 * namespaces so an address key can never collide with an identity key.
 */
export type NodeKey = `addr:${string}` | `peer:${string}`;

export interface AddressNode {
  kind: 'address';
  key: NodeKey;
  address: Address;
}

export interface PeerNode {
  kind: 'peer';
  key: NodeKey;
  identityKey: IdentityKey;
}

export type GraphNode = AddressNode | PeerNode;

export function addressNodeKey(address: Address): NodeKey {
  return `addr:${addressKey(address)}`;
}

export function peerNodeKey(identityKey: IdentityKey): NodeKey {
  return `peer:${identityKey}`;
}

/**
 * Directed "introduced" graph between verified peers and the addresses
 * they reported.
 *
 * Every node has at most one parent. Outgoing edges are kept in
 * insertion order.
 */
export class ProvenanceGraph {
  private nodes: Map<NodeKey, GraphNode> = new Map();
  private children: Map<NodeKey, Set<NodeKey>> = new Map();
  private parents: Map<NodeKey, NodeKey> = new Map();

  /**
   * Add an address node, or return the existing one.
   */
  addAddressNode(address: Address): AddressNode {
    const key = addressNodeKey(address);
    const existing = this.nodes.get(key);
    if (existing?.kind === 'address') {
      return existing;
    }
    const node: AddressNode = { kind: 'address', key, address };
    this.insert(node);
    return node;
  }

  /**
   * Add a peer node, or return the existing one.
   */
  addPeerNode(identityKey: IdentityKey): PeerNode {
    const key = peerNodeKey(identityKey);
    const existing = this.nodes.get(key);
    if (existing?.kind === 'peer') {
      return existing;
    }
    const node: PeerNode = { kind: 'peer', key, identityKey };
    this.insert(node);
    return node;
  }

  hasNode(key: NodeKey): boolean {
    return this.nodes.has(key);
  }

  getNode(key: NodeKey): GraphNode | undefined {
    return this.nodes.get(key);
  }

  hasEdge(from: NodeKey, to: NodeKey): boolean {
    return this.parents.get(to) === from;
  }

  parentOf(key: NodeKey): NodeKey | undefined {
    return this.parents.get(key);
  }

  /**
   * Direct children of a node, in the order the edges were added.
   */
  childrenOf(key: NodeKey): GraphNode[] {
    const result: GraphNode[] = [];
    for (const child of this.children.get(key) ?? []) {
      const node = this.nodes.get(child);
      if (node) {
        result.push(node);
      }
    }
    return result;
  }

  /**
   * Add the edge from → to. If `to` already had a parent, that edge is
   * replaced. Both nodes must exist; otherwise nothing happens.
   *
   * @returns true if the edge was added
   */
  addEdge(from: NodeKey, to: NodeKey): boolean {
    if (from === to || !this.nodes.has(from) || !this.nodes.has(to)) {
      return false;
    }
    const previous = this.parents.get(to);
    if (previous === from) {
      return true;
    }
    if (previous !== undefined) {
      this.children.get(previous)?.delete(to);
    }
    this.parents.set(to, from);
    this.children.get(from)?.add(to);
    return true;
  }

  /**
   * Remove a node and every edge touching it. Children are orphaned,
   * never removed.
   *
   * @returns true if the node existed
   */
  removeNode(key: NodeKey): boolean {
    if (!this.nodes.has(key)) {
      return false;
    }

    const parent = this.parents.get(key);
    if (parent !== undefined) {
      this.children.get(parent)?.delete(key);
      this.parents.delete(key);
    }

    for (const child of this.children.get(key) ?? []) {
      this.parents.delete(child);
    }

    this.children.delete(key);
    this.nodes.delete(key);
    return true;
  }

  /**
   * Fold an address node into a peer node: its children are re-parented
   * onto the peer, and its parent edge is inherited if the peer has none
   * yet (taking the address node's place in the parent's child order).
   * The address node is then deleted.
   *
   * @returns true if an address node was absorbed
   */
  absorb(sourceKey: NodeKey, targetKey: NodeKey): boolean {
    const source = this.nodes.get(sourceKey);
    const target = this.nodes.get(targetKey);
    if (source?.kind !== 'address' || target?.kind !== 'peer') {
      return false;
    }

    const targetChildren = this.children.get(targetKey);
    for (const child of this.children.get(sourceKey) ?? []) {
      if (child === targetKey) {
        continue;
      }
      this.parents.set(child, targetKey);
      targetChildren?.add(child);
    }
    this.children.set(sourceKey, new Set());

    const parent = this.parents.get(sourceKey);
    if (parent !== undefined && parent !== targetKey && !this.parents.has(targetKey)) {
      const siblings = this.children.get(parent);
      if (siblings) {
        this.children.set(
          parent,
          new Set(Array.from(siblings, sibling => (sibling === sourceKey ? targetKey : sibling)))
        );
      }
      this.parents.set(targetKey, parent);
      this.parents.delete(sourceKey);
    }

    return this.removeNode(sourceKey);
  }

  /**
   * All address nodes, in the order they were first added.
   */
  addressNodes(): AddressNode[] {
    const result: AddressNode[] = [];
    for (const node of this.nodes.values()) {
      if (node.kind === 'address') {
        result.push(node);
      }
    }
    return result;
  }

  get size(): number {
    return this.nodes.size;
  }

  private insert(node: GraphNode): void {
    this.nodes.set(node.key, node);
    this.children.set(node.key, new Set());
  }
}
