/**
 * Coterie Core Types
 * Single source of truth for all shared types and interfaces.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Identities ──

/** An addressable holder of records: a principal or a shared account */
export type IdentityId = string;

/** Seed bytes mixed into address derivation; strings are taken as UTF-8 */
export type Seed = Uint8Array | string;

/**
 * The key pair minted for an identity when the store creates it.
 * Whoever holds it can sign as that identity.
 */
export interface AuthoritySource {
  identity: IdentityId;
  /** Base64url Ed25519 public key */
  publicKey: string;
  /** Base64url Ed25519 private key */
  secretKey: string;
}

// ── Audit ──

export const AUDIT_KINDS = ['creation', 'allow_add', 'allow_remove', 'claim', 'redeem'] as const;

export type AuditKind = (typeof AUDIT_KINDS)[number];

export interface AuditHandle {
  guid: string;
  counter: number;
}

export type AuditHandles = Record<AuditKind, AuditHandle>;

export interface AuditEvent {
  kind: AuditKind;
  guid: string;
  /** Counter value of the handle before this event */
  sequence: number;
  timestamp: string;
  actor: IdentityId;
  target: IdentityId;
  claimer?: IdentityId;
}

export type AuditCounters = Record<AuditKind, number>;

// ── Records ──

export interface RegistryRecord {
  authoritySource: AuthoritySource;
  auditHandles: AuditHandles;
}

export interface SharedAccountRecord {
  authoritySource: AuthoritySource;
}

export interface ManagementRecord {
  admin: IdentityId;
  /** Allow-listed claimers in insertion order, no duplicates */
  unclaimed: IdentityId[];
}

/** Single-use entitlement to redeem authority over `target`. Moved, never copied. */
export interface CapabilityRecord {
  readonly target: IdentityId;
}

export interface RecordTypes {
  registry: RegistryRecord;
  shared_account: SharedAccountRecord;
  management: ManagementRecord;
  capability: CapabilityRecord;
}

export type RecordKind = keyof RecordTypes;

export const RECORD_KINDS: readonly RecordKind[] = ['registry', 'shared_account', 'management', 'capability'];

// ── Protocol Errors ──

export type ProtocolError =
  | { type: 'already_initialized'; registry: IdentityId }
  | { type: 'not_installer'; installer: IdentityId; expected: IdentityId }
  | { type: 'not_initialized'; registry: IdentityId }
  | { type: 'already_exists'; identity: IdentityId }
  | { type: 'not_found'; target: IdentityId }
  | { type: 'not_admin'; target: IdentityId; caller: IdentityId }
  | { type: 'already_listed'; target: IdentityId; claimer: IdentityId }
  | { type: 'not_listed'; target: IdentityId; claimer: IdentityId }
  | { type: 'already_holding_capability'; holder: IdentityId }
  | { type: 'no_capability'; holder: IdentityId }
  | { type: 'wrong_target'; holder: IdentityId; requested: IdentityId; held: IdentityId };

export type ProtocolErrorType = ProtocolError['type'];

// ── Storage ──

/** Staged view of the store for one unit of work. */
export interface StoreTransaction {
  identityExists(id: IdentityId): Promise<boolean>;
  /** Create an identity and mint its authority source. Throws if it exists. */
  createIdentity(id: IdentityId): Promise<AuthoritySource>;
  read<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null>;
  has(id: IdentityId, kind: RecordKind): Promise<boolean>;
  /** Throws if a record of this kind already exists at `id`. */
  insert<K extends RecordKind>(id: IdentityId, kind: K, record: RecordTypes[K]): Promise<void>;
  /** Throws if no record of this kind exists at `id`. */
  update<K extends RecordKind>(id: IdentityId, kind: K, record: RecordTypes[K]): Promise<void>;
  /** Move a record out of the store, leaving the slot empty. */
  take<K extends RecordKind>(id: IdentityId, kind: K): Promise<RecordTypes[K] | null>;
}

export interface IdentityStore {
  /**
   * Run `work` as one atomic unit. Units are serialized; staged writes are
   * committed only when `work` resolves to an ok result.
   */
  transact<T, E>(work: (tx: StoreTransaction) => Promise<Result<T, E>>): Promise<Result<T, E>>;
  close(): void;
}
