import { describe, it, expect } from 'vitest';
import { accountWith, errorOf, setup, valueOf } from './helpers.js';

describe('Credential Issuer', () => {
  it('moves the claimer from the allow-list to a capability', async () => {
    const { protocol } = await setup();
    const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa', '0xx', '0xc']);
    valueOf(await protocol.claimCapability('0xx', target));
    expect((await protocol.getManagement(target))?.unclaimed).toEqual(['0xa', '0xc']);
    expect(await protocol.getCapabilityTarget('0xx')).toBe(target);
  });

  it('rejects a second claim on the same account as not listed', async () => {
    const { protocol } = await setup();
    const target = await accountWith(protocol, '0xadmin', 'vault', ['0xx']);
    valueOf(await protocol.claimCapability('0xx', target));
    expect(errorOf(await protocol.claimCapability('0xx', target))).toEqual({
      type: 'not_listed',
      target,
      claimer: '0xx',
    });
  });

  it('allows one live capability per holder across all accounts', async () => {
    const { protocol } = await setup();
    const t1 = await accountWith(protocol, '0xadmin', 'one', ['0xx']);
    const t2 = await accountWith(protocol, '0xother', 'two', ['0xx']);
    valueOf(await protocol.claimCapability('0xx', t1));
    expect(errorOf(await protocol.claimCapability('0xx', t2))).toEqual({
      type: 'already_holding_capability',
      holder: '0xx',
    });
    expect((await protocol.getManagement(t2))?.unclaimed).toEqual(['0xx']);
    expect(await protocol.getCapabilityTarget('0xx')).toBe(t1);
  });

  it('unblocks the next claim once the capability is redeemed', async () => {
    const { protocol } = await setup();
    const t1 = await accountWith(protocol, '0xadmin', 'one', ['0xx']);
    const t2 = await accountWith(protocol, '0xadmin', 'two', ['0xx']);
    valueOf(await protocol.claimCapability('0xx', t1));
    valueOf(await protocol.acquireAuthority('0xx', t1));
    valueOf(await protocol.claimCapability('0xx', t2));
    expect(await protocol.getCapabilityTarget('0xx')).toBe(t2);
  });

  it('rejects an unknown account', async () => {
    const { protocol } = await setup();
    expect(errorOf(await protocol.claimCapability('0xx', '0xghost'))).toEqual({ type: 'not_found', target: '0xghost' });
  });

  it('rejects a claimer who was never listed', async () => {
    const { protocol } = await setup();
    const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa']);
    expect(errorOf(await protocol.claimCapability('0xz', target)).type).toBe('not_listed');
    expect(await protocol.getCapabilityTarget('0xz')).toBeNull();
  });

  it('rejects a claimer whose listing was removed', async () => {
    const { protocol } = await setup();
    const target = await accountWith(protocol, '0xadmin', 'vault', ['0xa']);
    valueOf(await protocol.removeClaimer('0xadmin', target, '0xa'));
    expect(errorOf(await protocol.claimCapability('0xa', target)).type).toBe('not_listed');
  });

  it('checks listing before holding', async () => {
    const { protocol } = await setup();
    const t1 = await accountWith(protocol, '0xadmin', 'one', ['0xx']);
    const t2 = await accountWith(protocol, '0xadmin', 'two', []);
    valueOf(await protocol.claimCapability('0xx', t1));
    expect(errorOf(await protocol.claimCapability('0xx', t2)).type).toBe('not_listed');
  });

  it('emits a claim event', async () => {
    const { protocol, sink } = await setup();
    const target = await accountWith(protocol, '0xadmin', 'vault', ['0xx']);
    await protocol.claimCapability('0xx', target);
    expect(sink.getByKind('claim')).toHaveLength(1);
    expect(sink.getByKind('claim')[0]).toMatchObject({ actor: '0xx', target, sequence: 0 });
    expect(sink.getByKind('claim')[0].claimer).toBeUndefined();
  });
});
