/**
 * Allow-list Manager — admin-gated edits to a shared account's `unclaimed` list.
 */

import { fail, ok } from '../core/errors.js';
import type { IdentityId, ManagementRecord, ProtocolError, Result } from '../core/types.js';
import { recordEvent } from './unit.js';
import type { UnitOfWork } from './unit.js';

/**
 * Remove the single occurrence of `item`, keeping the order of the rest.
 * Returns false when `item` is absent.
 */
export function removeStable<T>(list: T[], item: T): boolean {
  const index = list.indexOf(item);
  if (index === -1) return false;
  list.splice(index, 1);
  return true;
}

async function managementFor(
  unit: UnitOfWork,
  admin: IdentityId,
  target: IdentityId,
): Promise<Result<ManagementRecord, ProtocolError>> {
  const management = await unit.tx.read(target, 'management');
  if (!management) return fail({ type: 'not_found', target });
  if (management.admin !== admin) return fail({ type: 'not_admin', target, caller: admin });
  return ok(management);
}

export async function addClaimer(
  unit: UnitOfWork,
  admin: IdentityId,
  target: IdentityId,
  claimer: IdentityId,
): Promise<Result<void, ProtocolError>> {
  const found = await managementFor(unit, admin, target);
  if (!found.ok) return found;

  const management = found.value;
  if (management.unclaimed.includes(claimer)) {
    return fail({ type: 'already_listed', target, claimer });
  }
  management.unclaimed.push(claimer);
  await unit.tx.update(target, 'management', management);

  recordEvent(unit, 'allow_add', { actor: admin, target, claimer });
  return ok(undefined);
}

export async function removeClaimer(
  unit: UnitOfWork,
  admin: IdentityId,
  target: IdentityId,
  claimer: IdentityId,
): Promise<Result<void, ProtocolError>> {
  const found = await managementFor(unit, admin, target);
  if (!found.ok) return found;

  const management = found.value;
  if (!removeStable(management.unclaimed, claimer)) {
    return fail({ type: 'not_listed', target, claimer });
  }
  await unit.tx.update(target, 'management', management);

  recordEvent(unit, 'allow_remove', { actor: admin, target, claimer });
  return ok(undefined);
}
