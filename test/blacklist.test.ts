import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Blacklist } from '../src/registry/blacklist.js';
import { createAddress } from '../src/registry/address.js';

describe('Blacklist', () => {
  it('should match added addresses by value', () => {
    const blacklist = new Blacklist();
    blacklist.add(createAddress('10.0.0.1', 8090));

    assert.strictEqual(blacklist.isBlacklisted(createAddress('10.0.0.1', 8090)), true);
  });

  it('should not match a different port on the same host', () => {
    const blacklist = new Blacklist();
    blacklist.add(createAddress('10.0.0.1', 8090));

    assert.strictEqual(blacklist.isBlacklisted(createAddress('10.0.0.1', 8091)), false);
  });

  it('should list addresses once, in insertion order', () => {
    const blacklist = new Blacklist();
    blacklist.add(createAddress('10.0.0.2', 1));
    blacklist.add(createAddress('10.0.0.1', 1));
    blacklist.add(createAddress('10.0.0.2', 1));

    assert.deepStrictEqual(blacklist.addresses, [
      { host: '10.0.0.2', port: 1 },
      { host: '10.0.0.1', port: 1 },
    ]);
  });

  it('should track identities separately from addresses', () => {
    const blacklist = new Blacklist();
    blacklist.addIdentity('aa'.repeat(20));

    assert.strictEqual(blacklist.isIdentityBlacklisted('aa'.repeat(20)), true);
    assert.strictEqual(blacklist.isIdentityBlacklisted('bb'.repeat(20)), false);
    assert.deepStrictEqual(blacklist.addresses, []);
  });
});
