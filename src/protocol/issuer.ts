/**
 * Credential issuer: turns allow-list membership into a capability.
 *
 * A holder keeps at most one live capability across every shared account,
 * so a second claim anywhere waits until the first has been redeemed.
 */

import { fail, ok } from '../core/errors.js';
import type { IdentityId, ProtocolError, Result } from '../core/types.js';
import { removeStable } from './allowlist.js';
import { recordEvent } from './unit.js';
import type { UnitOfWork } from './unit.js';

export async function claimCapability(
  unit: UnitOfWork,
  claimer: IdentityId,
  target: IdentityId,
): Promise<Result<void, ProtocolError>> {
  const { tx } = unit;
  const management = await tx.read(target, 'management');
  if (!management) return fail({ type: 'not_found', target });
  if (!management.unclaimed.includes(claimer)) {
    return fail({ type: 'not_listed', target, claimer });
  }
  if (await tx.has(claimer, 'capability')) {
    return fail({ type: 'already_holding_capability', holder: claimer });
  }

  removeStable(management.unclaimed, claimer);
  await tx.update(target, 'management', management);
  await tx.insert(claimer, 'capability', { target });

  recordEvent(unit, 'claim', { actor: claimer, target });
  return ok(undefined);
}
