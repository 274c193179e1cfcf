/**
 * Unit of work shared by the protocol modules.
 *
 * Modules stage record writes on `tx` and audit events through
 * `recordEvent`; the facade writes the bumped registry counters back and
 * publishes the events only after the unit commits.
 */

import type {
  AuditEvent,
  AuditKind,
  IdentityId,
  RegistryRecord,
  StoreTransaction,
} from '../core/types.js';
import type { AddressDeriver } from '../core/address.js';

export interface UnitOfWork {
  tx: StoreTransaction;
  deriver: AddressDeriver;
  registryId: IdentityId;
  registry: RegistryRecord;
  events: AuditEvent[];
  now: Date;
}

export interface EventFields {
  actor: IdentityId;
  target: IdentityId;
  claimer?: IdentityId;
}

/** Append an event of `kind` and advance that kind's counter */
export function recordEvent(unit: UnitOfWork, kind: AuditKind, fields: EventFields): AuditEvent {
  const handle = unit.registry.auditHandles[kind];
  const event: AuditEvent = {
    kind,
    guid: handle.guid,
    sequence: handle.counter,
    timestamp: unit.now.toISOString(),
    ...fields,
  };
  handle.counter += 1;
  unit.events.push(event);
  return event;
}
