/**
 * In-memory identity store for tests and simple use.
 */

import { RECORD_KINDS } from '../core/types.js';
import type { IdentityId, RecordKind, RecordTypes } from '../core/types.js';
import { TransactionalIdentityStore } from './transaction.js';
import type { ChangeSet, RecordBackend, StagedRecords } from './transaction.js';

type RecordMaps = { [K in RecordKind]: Map<IdentityId, RecordTypes[K]> };

function applyKind<K extends RecordKind>(target: RecordMaps, staged: StagedRecords, kind: K): void {
  const slot = target[kind];
  for (const [id, record] of staged[kind]) {
    if (record === null) {
      slot.delete(id);
    } else {
      slot.set(id, structuredClone(record));
    }
  }
}

export class MemoryRecordBackend implements RecordBackend {
  private identities = new Set<IdentityId>();
  private records: RecordMaps = {
    registry: new Map(),
    shared_account: new Map(),
    management: new Map(),
    capability: new Map(),
  };

  async hasIdentity(id: IdentityId): Promise<boolean> {
    return this.identities.has(id);
  }

  async load<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null> {
    const record = this.records[kind].get(id);
    return record === undefined ? null : structuredClone(record);
  }

  async apply(changes: ChangeSet): Promise<void> {
    for (const id of changes.identities) {
      this.identities.add(id);
    }
    for (const kind of RECORD_KINDS) {
      applyKind(this.records, changes.records, kind);
    }
  }

  close(): void {
    this.identities.clear();
    for (const kind of RECORD_KINDS) {
      this.records[kind].clear();
    }
  }
}

export class MemoryIdentityStore extends TransactionalIdentityStore {
  constructor() {
    super(new MemoryRecordBackend());
  }
}
