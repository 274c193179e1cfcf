/**
 * Shared-account factory. Creates a shared account and its management record.
 */

import { fail, ok } from '../core/errors.js';
import type { IdentityId, ProtocolError, Result, Seed } from '../core/types.js';
import { recordEvent } from './unit.js';
import type { UnitOfWork } from './unit.js';

/**
 * Create the shared account at `derive(creator, seed)` with `creator` as its
 * admin and an empty allow-list.
 */
export async function createSharedAccount(
  unit: UnitOfWork,
  creator: IdentityId,
  seed: Seed,
): Promise<Result<IdentityId, ProtocolError>> {
  const { tx } = unit;
  const target = unit.deriver.derive(creator, seed);
  if (await tx.identityExists(target)) {
    return fail({ type: 'already_exists', identity: target });
  }

  const authoritySource = await tx.createIdentity(target);
  await tx.insert(target, 'shared_account', { authoritySource });
  await tx.insert(target, 'management', { admin: creator, unclaimed: [] });

  recordEvent(unit, 'creation', { actor: creator, target });
  return ok(target);
}
