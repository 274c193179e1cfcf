import { describe, it, expect } from 'vitest';
import { removeStable } from '../src/protocol/allowlist.js';
import { accountWith, createAccount, errorOf, setup, valueOf } from './helpers.js';

describe('Allow-list Manager', () => {
  describe('addClaimer', () => {
    it('appends in insertion order', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xb', '0xc']);
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xa', '0xb', '0xc']);
    });

    it('lets the admin list itself', async () => {
      const { protocol } = await setup();
      const target = await createAccount(protocol, '0xadmin', 'vault');
      valueOf(await protocol.addClaimer('0xadmin', target, '0xadmin'));
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xadmin']);
    });

    it('rejects an unknown account', async () => {
      const { protocol } = await setup();
      expect(errorOf(await protocol.addClaimer('0xadmin', '0xghost', '0xa'))).toEqual({
        type: 'not_found',
        target: '0xghost',
      });
    });

    it('rejects the registry identity, which has no allow-list', async () => {
      const { protocol } = await setup();
      expect(errorOf(await protocol.addClaimer('installer', protocol.registryId, '0xa')).type).toBe('not_found');
    });

    it('rejects a non-admin and leaves the list unchanged', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa']);
      expect(errorOf(await protocol.addClaimer('0xa', target, '0xb'))).toEqual({
        type: 'not_admin',
        target,
        caller: '0xa',
      });
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xa']);
    });

    it('rejects a duplicate', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa']);
      expect(errorOf(await protocol.addClaimer('0xadmin', target, '0xa'))).toEqual({
        type: 'already_listed',
        target,
        claimer: '0xa',
      });
    });

    it('checks admin before duplicates', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa']);
      expect(errorOf(await protocol.addClaimer('0xa', target, '0xa')).type).toBe('not_admin');
    });
  });

  describe('removeClaimer', () => {
    it('keeps the order of the remaining claimers', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xb', '0xc']);
      valueOf(await protocol.removeClaimer('0xadmin', target, '0xb'));
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xa', '0xc']);
    });

    it('keeps order when removing the head of a longer list', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xb', '0xc', '0xd']);
      valueOf(await protocol.removeClaimer('0xadmin', target, '0xa'));
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xb', '0xc', '0xd']);
    });

    it('allows re-listing after removal, at the end', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xb']);
      valueOf(await protocol.removeClaimer('0xadmin', target, '0xa'));
      valueOf(await protocol.addClaimer('0xadmin', target, '0xa'));
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xb', '0xa']);
    });

    it('rejects an unknown account', async () => {
      const { protocol } = await setup();
      expect(errorOf(await protocol.removeClaimer('0xadmin', '0xghost', '0xa')).type).toBe('not_found');
    });

    it('rejects a non-admin and leaves the list unchanged', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xb']);
      expect(errorOf(await protocol.removeClaimer('0xb', target, '0xa'))).toEqual({
        type: 'not_admin',
        target,
        caller: '0xb',
      });
      expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xa', '0xb']);
    });

    it('rejects a claimer who is not listed', async () => {
      const { protocol } = await setup();
      const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa']);
      expect(errorOf(await protocol.removeClaimer('0xadmin', target, '0xz'))).toEqual({
        type: 'not_listed',
        target,
        claimer: '0xz',
      });
    });
  });

  it('emits one event per successful change', async () => {
    const { protocol, sink } = await setup();
    const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xb']);
    await protocol.removeClaimer('0xadmin', target, '0xa');
    await protocol.removeClaimer('0xadmin', target, '0xa');
    await protocol.addClaimer('0xintruder', target, '0xc');

    expect(sink.getByKind('allow_add').map(e => [e.sequence, e.actor, e.claimer])).toEqual([
      [0, '0xadmin', '0xa'],
      [1, '0xadmin', '0xb'],
    ]);
    expect(sink.getByKind('allow_remove')).toHaveLength(1);
    expect(sink.getByKind('allow_remove')[0]).toMatchObject({ actor: '0xadmin', target, claimer: '0xa', sequence: 0 });
    const counters = valueOf(await protocol.getAuditCounters());
    expect(counters.allow_add).toBe(2);
    expect(counters.allow_remove).toBe(1);
  });
});

describe('removeStable', () => {
  it('removes the single occurrence and keeps order', () => {
    const list = ['a', 'b', 'c', 'd'];
    expect(removeStable(list, 'b')).toBe(true);
    expect(list).toEqual(['a', 'c', 'd']);
  });

  it('reports absence without touching the list', () => {
    const list = ['a'];
    expect(removeStable(list, 'z')).toBe(false);
    expect(list).toEqual(['a']);
  });
});
