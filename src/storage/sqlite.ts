/**
 * SQLite identity store using better-sqlite3.
 *
 * One row per (identity, record kind); the composite primary key is what
 * holds the at-most-one-record-per-kind rule on disk. `identities` only marks
 * which ids exist; key material lives in the records that own it.
 */

import Database from 'better-sqlite3';
import { StoreError } from '../core/errors.js';
import { RECORD_KINDS } from '../core/types.js';
import type { IdentityId, RecordKind, RecordTypes } from '../core/types.js';
import { recordValidators, validationErrors } from './schemas.js';
import { TransactionalIdentityStore } from './transaction.js';
import type { ChangeSet, RecordBackend } from './transaction.js';

interface RecordRow {
  payload_json: string;
}

export class SqliteRecordBackend implements RecordBackend {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS identities (
        identity_id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS records (
        identity_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (identity_id, kind)
      );
      CREATE INDEX IF NOT EXISTS idx_records_kind ON records(kind);
    `);
  }

  async hasIdentity(id: IdentityId): Promise<boolean> {
    const row = this.db.prepare('SELECT 1 FROM identities WHERE identity_id = ?').get(id);
    return row !== undefined;
  }

  async load<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null> {
    const row = this.db
      .prepare<[string, string], RecordRow>('SELECT payload_json FROM records WHERE identity_id = ? AND kind = ?')
      .get(id, kind);
    if (!row) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload_json);
    } catch (e) {
      throw new StoreError(`Corrupt ${kind} record at ${id}: ${e}`);
    }
    const validate = recordValidators[kind];
    if (!validate(payload)) {
      throw new StoreError(`Corrupt ${kind} record at ${id}: ${validationErrors(validate)}`);
    }
    return payload;
  }

  async apply(changes: ChangeSet): Promise<void> {
    const now = new Date().toISOString();
    const insertIdentity = this.db.prepare(
      'INSERT INTO identities (identity_id, created_at) VALUES (?, ?)',
    );
    const upsertRecord = this.db.prepare(
      'INSERT OR REPLACE INTO records (identity_id, kind, payload_json, updated_at) VALUES (?, ?, ?, ?)',
    );
    const deleteRecord = this.db.prepare('DELETE FROM records WHERE identity_id = ? AND kind = ?');

    const commit = this.db.transaction((set: ChangeSet) => {
      for (const id of set.identities) {
        insertIdentity.run(id, now);
      }
      for (const kind of RECORD_KINDS) {
        for (const [id, record] of set.records[kind]) {
          if (record === null) {
            deleteRecord.run(id, kind);
          } else {
            upsertRecord.run(id, kind, JSON.stringify(record), now);
          }
        }
      }
    });
    commit(changes);
  }

  close(): void {
    this.db.close();
  }
}

export class SqliteIdentityStore extends TransactionalIdentityStore {
  constructor(dbPath: string = ':memory:') {
    super(new SqliteRecordBackend(dbPath));
  }
}
