/**
 * Authority redeemer. Consumes a capability for one-time delegated authority.
 */

import { DelegatedAuthority } from '../core/authority.js';
import { fail, ok } from '../core/errors.js';
import type { IdentityId, ProtocolError, Result } from '../core/types.js';
import { recordEvent } from './unit.js';
import type { UnitOfWork } from './unit.js';

/**
 * The capability is moved out of the acquirer's slot before the target is
 * checked. Any failure aborts the unit, which puts it back untouched.
 */
export async function acquireAuthority(
  unit: UnitOfWork,
  acquirer: IdentityId,
  target: IdentityId,
): Promise<Result<DelegatedAuthority, ProtocolError>> {
  const { tx } = unit;
  const capability = await tx.take(acquirer, 'capability');
  if (!capability) return fail({ type: 'no_capability', holder: acquirer });
  if (capability.target !== target) {
    return fail({ type: 'wrong_target', holder: acquirer, requested: target, held: capability.target });
  }

  const account = await tx.read(target, 'shared_account');
  if (!account) return fail({ type: 'not_found', target });

  const authority = DelegatedAuthority.issue(account.authoritySource, acquirer, unit.now);
  recordEvent(unit, 'redeem', { actor: acquirer, target });
  return ok(authority);
}
