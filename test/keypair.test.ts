import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  generateKeyPair,
  computeIdentityKey,
  normalizePublicKey,
} from '../src/identity/keypair.js';

describe('KeyPair', () => {
  describe('generateKeyPair', () => {
    it('should generate a valid key pair', () => {
      const keyPair = generateKeyPair();

      assert.ok(keyPair.publicKey);
      assert.ok(keyPair.privateKey);
      assert.strictEqual(typeof keyPair.publicKey, 'string');
      assert.strictEqual(typeof keyPair.privateKey, 'string');
    });

    it('should generate unique key pairs', () => {
      const keyPair1 = generateKeyPair();
      const keyPair2 = generateKeyPair();

      assert.notStrictEqual(keyPair1.publicKey, keyPair2.publicKey);
      assert.notStrictEqual(keyPair1.privateKey, keyPair2.privateKey);
    });

    it('should generate hex-encoded keys', () => {
      const keyPair = generateKeyPair();

      // Hex strings should only contain valid hex characters
      assert.match(keyPair.publicKey, /^[0-9a-f]+$/i);
      assert.match(keyPair.privateKey, /^[0-9a-f]+$/i);
    });
  });

  describe('normalizePublicKey', () => {
    it('should lowercase hex strings', () => {
      assert.strictEqual(normalizePublicKey('ABCDEF01'), 'abcdef01');
    });

    it('should hex-encode bytes', () => {
      assert.strictEqual(normalizePublicKey(new Uint8Array([0, 15, 255])), '000fff');
    });
  });

  describe('computeIdentityKey', () => {
    it('should produce a 40 character hex fingerprint', () => {
      const { publicKey } = generateKeyPair();

      assert.match(computeIdentityKey(publicKey), /^[0-9a-f]{40}$/);
    });

    it('should be stable for the same key', () => {
      const { publicKey } = generateKeyPair();

      assert.strictEqual(computeIdentityKey(publicKey), computeIdentityKey(publicKey));
    });

    it('should not depend on the key encoding', () => {
      const { publicKey } = generateKeyPair();
      const fromHex = computeIdentityKey(publicKey);

      assert.strictEqual(computeIdentityKey(publicKey.toUpperCase()), fromHex);
      assert.strictEqual(computeIdentityKey(Buffer.from(publicKey, 'hex')), fromHex);
    });

    it('should differ between keys', () => {
      const keyPair1 = generateKeyPair();
      const keyPair2 = generateKeyPair();

      assert.notStrictEqual(computeIdentityKey(keyPair1.publicKey), computeIdentityKey(keyPair2.publicKey));
    });

    it('should hash the DER bytes with SHA-1', () => {
      // sha1 of the single byte 0x00
      assert.strictEqual(computeIdentityKey('00'), '5ba93c9db0cff93f52b521d7420e43f6eda2784f');
    });
  });
});
