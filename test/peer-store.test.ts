import { describe, it } from 'node:test';
import assert from 'node:assert';
import { VerifiedPeerStore } from '../src/registry/peer-store.js';
import { createVerifiedPeer, type VerifiedPeer } from '../src/registry/peer.js';
import { createAddress } from '../src/registry/address.js';
import { generateKeyPair } from '../src/identity/keypair.js';

function makePeer(host: string, port: number): VerifiedPeer {
  return createVerifiedPeer(generateKeyPair().publicKey, createAddress(host, port), { lastSeen: 1000000000 });
}

describe('VerifiedPeerStore', () => {
  describe('addOrUpdatePeer', () => {
    it('should add a new peer', () => {
      const store = new VerifiedPeerStore();
      const peer = makePeer('10.0.0.1', 1);

      assert.strictEqual(store.addOrUpdatePeer(peer), true);

      assert.strictEqual(store.getPeer(peer.identityKey), peer);
      assert.strictEqual(store.size, 1);
    });

    it('should replace a peer with the same identity', () => {
      const store = new VerifiedPeerStore();
      const peer1 = makePeer('10.0.0.1', 1);
      const peer2: VerifiedPeer = { ...peer1, clock: 5, lastSeen: 2000 };

      store.addOrUpdatePeer(peer1);
      assert.strictEqual(store.addOrUpdatePeer(peer2), false);

      assert.strictEqual(store.size, 1);
      assert.strictEqual(store.getPeer(peer1.identityKey)?.lastSeen, 2000);
    });

    it('should store multiple peers in insertion order', () => {
      const store = new VerifiedPeerStore();
      const peer1 = makePeer('10.0.0.1', 1);
      const peer2 = makePeer('10.0.0.2', 2);

      store.addOrUpdatePeer(peer1);
      store.addOrUpdatePeer(peer2);

      assert.deepStrictEqual(store.allPeers(), [peer1, peer2]);
    });
  });

  describe('removePeer', () => {
    it('should remove an existing peer and its lookups', () => {
      const store = new VerifiedPeerStore();
      const peer = makePeer('10.0.0.1', 1);
      store.addOrUpdatePeer(peer);

      assert.strictEqual(store.removePeer(peer.identityKey), peer);

      assert.strictEqual(store.has(peer.identityKey), false);
      assert.strictEqual(store.getByAddress(peer.address), undefined);
      assert.strictEqual(store.getByPublicKey(peer.publicKey), undefined);
    });

    it('should return undefined when removing non-existent peer', () => {
      const store = new VerifiedPeerStore();

      assert.strictEqual(store.removePeer('nonexistent'), undefined);
    });

    it('should hand a shared address over to the remaining identity', () => {
      const store = new VerifiedPeerStore();
      const first = makePeer('10.0.0.1', 1);
      const second = makePeer('10.0.0.1', 1);
      store.addOrUpdatePeer(first);
      store.addOrUpdatePeer(second);

      store.removePeer(second.identityKey);

      assert.strictEqual(store.getByAddress(createAddress('10.0.0.1', 1)), first);
    });
  });

  describe('getByAddress', () => {
    it('should find a peer by an equal address value', () => {
      const store = new VerifiedPeerStore();
      const peer = makePeer('10.0.0.1', 1);
      store.addOrUpdatePeer(peer);

      assert.strictEqual(store.getByAddress(createAddress('10.0.0.1', 1)), peer);
    });

    it('should return undefined for unknown addresses', () => {
      const store = new VerifiedPeerStore();
      store.addOrUpdatePeer(makePeer('10.0.0.1', 1));

      assert.strictEqual(store.getByAddress(createAddress('10.0.0.1', 2)), undefined);
    });

    it('should re-index a peer whose address changed', () => {
      const store = new VerifiedPeerStore();
      const peer = makePeer('10.0.0.1', 1);
      store.addOrUpdatePeer(peer);

      store.addOrUpdatePeer({ ...peer, address: createAddress('10.0.0.9', 9) });

      assert.strictEqual(store.getByAddress(createAddress('10.0.0.1', 1)), undefined);
      assert.strictEqual(store.getByAddress(createAddress('10.0.0.9', 9))?.identityKey, peer.identityKey);
    });

    it('should not return a peer whose address was changed in place', () => {
      const store = new VerifiedPeerStore();
      const peer = makePeer('10.0.0.1', 1);
      store.addOrUpdatePeer(peer);

      peer.address = createAddress('10.0.0.9', 9);

      assert.strictEqual(store.getByAddress(createAddress('10.0.0.1', 1)), undefined);
      store.addOrUpdatePeer(peer);
      assert.strictEqual(store.getByAddress(createAddress('10.0.0.9', 9)), peer);
    });
  });

  describe('getByPublicKey', () => {
    it('should accept hex or bytes', () => {
      const store = new VerifiedPeerStore();
      const peer = makePeer('10.0.0.1', 1);
      store.addOrUpdatePeer(peer);

      assert.strictEqual(store.getByPublicKey(peer.publicKey), peer);
      assert.strictEqual(store.getByPublicKey(peer.publicKey.toUpperCase()), peer);
      assert.strictEqual(store.getByPublicKey(Buffer.from(peer.publicKey, 'hex')), peer);
    });

    it('should return undefined for unknown keys', () => {
      const store = new VerifiedPeerStore();

      assert.strictEqual(store.getByPublicKey(generateKeyPair().publicKey), undefined);
    });
  });
});
