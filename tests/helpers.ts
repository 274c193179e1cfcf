import type { AddressDeriver } from '../src/core/address.js';
import { MemoryAuditSink } from '../src/core/audit.js';
import { seedBytes, toHex } from '../src/core/crypto.js';
import { describeError } from '../src/core/errors.js';
import { createLogger, LogLevel } from '../src/core/logger.js';
import { MetricsCollector } from '../src/core/metrics.js';
import type { IdentityId, IdentityStore, ProtocolError, Result, Seed } from '../src/core/types.js';
import { SharedAccountProtocol } from '../src/protocol/protocol.js';
import { MemoryIdentityStore } from '../src/storage/memory.js';

export const INSTALLER = 'installer';

/** Readable, injective stand-in for address derivation: `parent/hex(seed)` */
export class StubDeriver implements AddressDeriver {
  derive(parent: IdentityId, seed: Seed): IdentityId {
    return `${parent}/${toHex(seedBytes(seed))}`;
  }
}

export interface Harness {
  protocol: SharedAccountProtocol;
  store: IdentityStore;
  sink: MemoryAuditSink;
  metrics: MetricsCollector;
  deriver: StubDeriver;
}

export function makeHarness(store: IdentityStore = new MemoryIdentityStore()): Harness {
  const sink = new MemoryAuditSink();
  const metrics = new MetricsCollector();
  const deriver = new StubDeriver();
  const protocol = new SharedAccountProtocol({
    store,
    installer: INSTALLER,
    deriver,
    auditSink: sink,
    metrics,
    logger: createLogger('test', LogLevel.SILENT),
  });
  return { protocol, store, sink, metrics, deriver };
}

/** Harness with the registry already initialized */
export async function setup(store?: IdentityStore): Promise<Harness> {
  const harness = makeHarness(store);
  valueOf(await harness.protocol.initialize(INSTALLER));
  return harness;
}

export function valueOf<T>(result: Result<T, ProtocolError>): T {
  if (!result.ok) throw new Error(`Unexpected rejection: ${describeError(result.error)}`);
  return result.value;
}

export function errorOf<T>(result: Result<T, ProtocolError>): ProtocolError {
  if (result.ok) throw new Error('Expected the operation to be rejected');
  return result.error;
}

export async function createAccount(protocol: SharedAccountProtocol, creator: IdentityId, seed: Seed): Promise<IdentityId> {
  return valueOf(await protocol.createSharedAccount(creator, seed));
}

/** Shared account `seed` created by `admin` with `claimers` listed in order */
export async function accountWith(
  protocol: SharedAccountProtocol,
  admin: IdentityId,
  seed: Seed,
  claimers: IdentityId[],
): Promise<IdentityId> {
  const target = await createAccount(protocol, admin, seed);
  for (const claimer of claimers) {
    valueOf(await protocol.addClaimer(admin, target, claimer));
  }
  return target;
}
