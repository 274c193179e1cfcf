/**
 * Units of work over a record back end.
 *
 * A `BufferedTransaction` reads through to the back end and stages every
 * write locally. `TransactionalIdentityStore` runs units one at a time and
 * hands the staged change set to the back end only when the unit succeeds,
 * so a failed or throwing unit leaves the store untouched.
 */

import { generateAuthoritySource } from '../core/crypto.js';
import { StoreError } from '../core/errors.js';
import type {
  AuthoritySource,
  IdentityId,
  IdentityStore,
  RecordKind,
  RecordTypes,
  Result,
  StoreTransaction,
} from '../core/types.js';

/** Per-kind slots; `null` marks a record removed in this unit */
export type StagedRecords = { [K in RecordKind]: Map<IdentityId, RecordTypes[K] | null> };

export interface ChangeSet {
  /** Identities created in this unit */
  identities: IdentityId[];
  records: StagedRecords;
}

export interface RecordBackend {
  hasIdentity(id: IdentityId): Promise<boolean>;
  /** Returns a copy the caller may mutate freely */
  load<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null>;
  /** Apply a change set all at once */
  apply(changes: ChangeSet): Promise<void>;
  close(): void;
}

export function emptyStagedRecords(): StagedRecords {
  return {
    registry: new Map(),
    shared_account: new Map(),
    management: new Map(),
    capability: new Map(),
  };
}

/** Runs queued tasks strictly one after another */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

export class BufferedTransaction implements StoreTransaction {
  private staged = emptyStagedRecords();
  private created = new Set<IdentityId>();

  constructor(private backend: RecordBackend) {}

  async identityExists(id: IdentityId): Promise<boolean> {
    return this.created.has(id) || (await this.backend.hasIdentity(id));
  }

  async createIdentity(id: IdentityId): Promise<AuthoritySource> {
    if (await this.identityExists(id)) {
      throw new StoreError(`Identity already exists: ${id}`);
    }
    this.created.add(id);
    return generateAuthoritySource(id);
  }

  async read<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null> {
    const slot = this.staged[kind];
    if (slot.has(id)) {
      const record = slot.get(id);
      return record == null ? null : structuredClone(record);
    }
    return this.backend.load(id, kind);
  }

  async has(id: IdentityId, kind: RecordKind): Promise<boolean> {
    return (await this.read(id, kind)) !== null;
  }

  async insert<K extends RecordKind>(id: IdentityId, kind: K, record: RecordTypes[K]): Promise<void> {
    if (await this.has(id, kind)) {
      throw new StoreError(`Record ${kind} already exists at ${id}`);
    }
    this.staged[kind].set(id, structuredClone(record));
  }

  async update<K extends RecordKind>(id: IdentityId, kind: K, record: RecordTypes[K]): Promise<void> {
    if (!(await this.has(id, kind))) {
      throw new StoreError(`No ${kind} record at ${id}`);
    }
    this.staged[kind].set(id, structuredClone(record));
  }

  async take<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null> {
    const record = await this.read(id, kind);
    if (record === null) return null;
    this.staged[kind].set(id, null);
    return record;
  }

  changes(): ChangeSet {
    return { identities: Array.from(this.created), records: this.staged };
  }
}

/**
 * Identity store that serializes units of work over a back end.
 * `work` must not call `transact` on the same store; it would wait on itself.
 */
export class TransactionalIdentityStore implements IdentityStore {
  private queue = new SerialQueue();

  constructor(protected readonly backend: RecordBackend) {}

  transact<T, E>(work: (tx: StoreTransaction) => Promise<Result<T, E>>): Promise<Result<T, E>> {
    return this.queue.run(async () => {
      const tx = new BufferedTransaction(this.backend);
      const result = await work(tx);
      if (result.ok) {
        await this.backend.apply(tx.changes());
      }
      return result;
    });
  }

  close(): void {
    this.backend.close();
  }
}
