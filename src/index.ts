/**
 * Coterie — shared-account delegation through single-use capabilities.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  IdentityId,
  Seed,
  AuthoritySource,
  AuditKind,
  AuditHandle,
  AuditHandles,
  AuditEvent,
  AuditCounters,
  RegistryRecord,
  SharedAccountRecord,
  ManagementRecord,
  CapabilityRecord,
  RecordTypes,
  RecordKind,
  ProtocolError,
  ProtocolErrorType,
  StoreTransaction,
  IdentityStore,
} from './core/types.js';
export { AUDIT_KINDS, RECORD_KINDS } from './core/types.js';

// ── Errors ──
export { StoreError, describeError } from './core/errors.js';

// ── Crypto ──
export {
  generateAuthoritySource,
  sign,
  verify,
  blake2b256,
  canonicalize,
  signObject,
  verifyObjectSignature,
  toBase64url,
  fromBase64url,
  toHex,
} from './core/crypto.js';

// ── Address Derivation ──
export { Blake2bAddressDeriver, defaultDeriver } from './core/address.js';
export type { AddressDeriver } from './core/address.js';

// ── Delegated Authority ──
export { DelegatedAuthority, verifyAuthorityProof, AUTHORITY_PROOF_FORMAT } from './core/authority.js';
export type { AuthorityProof } from './core/authority.js';

// ── Audit ──
export { MemoryAuditSink } from './core/audit.js';
export type { AuditSink } from './core/audit.js';

// ── Logging & Metrics ──
export {
  createLogger,
  ConsoleLogger,
  LogLevel,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
  parseLogLevel,
} from './core/logger.js';
export type { Logger, LogEntry, LogLevelName, LevelLabel } from './core/logger.js';
export { MetricsCollector, globalMetrics } from './core/metrics.js';
export type { MetricsAdapter, MetricsSnapshot, Tags } from './core/metrics.js';

// ── Protocol ──
export { SharedAccountProtocol } from './protocol/protocol.js';
export type { ProtocolOptions, ManagementView } from './protocol/protocol.js';
export { REGISTRY_SEED, registryAddress } from './protocol/registry.js';

// ── Storage ──
export { MemoryIdentityStore, MemoryRecordBackend } from './storage/memory.js';
export { SqliteIdentityStore, SqliteRecordBackend } from './storage/sqlite.js';
export { TransactionalIdentityStore, BufferedTransaction } from './storage/transaction.js';
export type { RecordBackend, ChangeSet, StagedRecords } from './storage/transaction.js';

// ── Configuration ──
export { DEFAULT_CONFIG, loadConfig, configFromEnv, createStore, createProtocol } from './config.js';
export type { CoterieConfig, StorageConfig, ConfigOverrides, ProtocolDependencies } from './config.js';
