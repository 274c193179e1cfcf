/**
 * Registry — one-time bootstrap of the module's own identity.
 *
 * The registry lives at `derive(installer, REGISTRY_SEED)` and carries the
 * module's authority source plus one audit handle per event kind.
 */

import { fail, ok } from '../core/errors.js';
import type {
  AuditCounters,
  AuditHandle,
  AuditHandles,
  AuditKind,
  AuthoritySource,
  IdentityId,
  ProtocolError,
  RegistryRecord,
  Result,
  StoreTransaction,
} from '../core/types.js';
import type { AddressDeriver } from '../core/address.js';

export const REGISTRY_SEED = 'coterie::registry';

export function registryAddress(deriver: AddressDeriver, installer: IdentityId, seed: string = REGISTRY_SEED): IdentityId {
  return deriver.derive(installer, seed);
}

function handle(registryId: IdentityId, kind: AuditKind): AuditHandle {
  return { guid: `${registryId}:${kind}`, counter: 0 };
}

function freshHandles(registryId: IdentityId): AuditHandles {
  return {
    creation: handle(registryId, 'creation'),
    allow_add: handle(registryId, 'allow_add'),
    allow_remove: handle(registryId, 'allow_remove'),
    claim: handle(registryId, 'claim'),
    redeem: handle(registryId, 'redeem'),
  };
}

export function newRegistryRecord(registryId: IdentityId, authoritySource: AuthoritySource): RegistryRecord {
  return { authoritySource, auditHandles: freshHandles(registryId) };
}

/** Create the registry identity and its record. */
export async function initializeRegistry(
  tx: StoreTransaction,
  registryId: IdentityId,
): Promise<Result<IdentityId, ProtocolError>> {
  if (await tx.identityExists(registryId)) {
    return fail({ type: 'already_initialized', registry: registryId });
  }
  const source = await tx.createIdentity(registryId);
  await tx.insert(registryId, 'registry', newRegistryRecord(registryId, source));
  return ok(registryId);
}

export async function loadRegistry(
  tx: StoreTransaction,
  registryId: IdentityId,
): Promise<Result<RegistryRecord, ProtocolError>> {
  const registry = await tx.read(registryId, 'registry');
  if (!registry) return fail({ type: 'not_initialized', registry: registryId });
  return ok(registry);
}

export function auditCounters(registry: RegistryRecord): AuditCounters {
  const h = registry.auditHandles;
  return {
    creation: h.creation.counter,
    allow_add: h.allow_add.counter,
    allow_remove: h.allow_remove.counter,
    claim: h.claim.counter,
    redeem: h.redeem.counter,
  };
}
