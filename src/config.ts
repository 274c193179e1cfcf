/**
 * Configuration defaults, validation, and wiring of a protocol instance.
 */

import { Ajv } from 'ajv';
import { setGlobalLogLevel, parseLogLevel, createLogger } from './core/logger.js';
import type { LogLevelName } from './core/logger.js';
import type { MetricsCollector } from './core/metrics.js';
import type { AuditSink } from './core/audit.js';
import type { AddressDeriver } from './core/address.js';
import type { IdentityStore, Result } from './core/types.js';
import { SharedAccountProtocol } from './protocol/protocol.js';
import { REGISTRY_SEED } from './protocol/registry.js';
import { MemoryIdentityStore } from './storage/memory.js';
import { SqliteIdentityStore } from './storage/sqlite.js';

export interface StorageConfig {
  driver: 'memory' | 'sqlite';
  /** Database file for the sqlite driver */
  path: string;
}

export interface CoterieConfig {
  installer: string;
  registrySeed: string;
  storage: StorageConfig;
  logLevel: LogLevelName;
}

export const DEFAULT_CONFIG: CoterieConfig = {
  installer: '0x1',
  registrySeed: REGISTRY_SEED,
  storage: { driver: 'memory', path: 'coterie.db' },
  logLevel: 'info',
};

const LOG_LEVEL_NAMES: readonly string[] = ['debug', 'info', 'warn', 'error', 'silent'];

const configSchema = {
  type: 'object',
  required: ['installer', 'registrySeed', 'storage', 'logLevel'],
  additionalProperties: false,
  properties: {
    installer: { type: 'string', minLength: 1 },
    registrySeed: { type: 'string', minLength: 1 },
    storage: {
      type: 'object',
      required: ['driver', 'path'],
      additionalProperties: false,
      properties: {
        driver: { type: 'string', enum: ['memory', 'sqlite'] },
        path: { type: 'string', minLength: 1 },
      },
    },
    logLevel: { type: 'string', enum: LOG_LEVEL_NAMES },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<CoterieConfig>(configSchema);

export interface ConfigOverrides {
  installer?: string;
  registrySeed?: string;
  storage?: Partial<StorageConfig>;
  logLevel?: LogLevelName;
}

/** Merge overrides onto the defaults and validate the result. Undefined fields keep their default. */
export function loadConfig(overrides: ConfigOverrides = {}): Result<CoterieConfig> {
  const merged: CoterieConfig = {
    installer: overrides.installer ?? DEFAULT_CONFIG.installer,
    registrySeed: overrides.registrySeed ?? DEFAULT_CONFIG.registrySeed,
    storage: {
      driver: overrides.storage?.driver ?? DEFAULT_CONFIG.storage.driver,
      path: overrides.storage?.path ?? DEFAULT_CONFIG.storage.path,
    },
    logLevel: overrides.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
  if (!validateConfig(merged)) {
    return { ok: false, error: new Error(`Invalid configuration: ${ajv.errorsText(validateConfig.errors)}`) };
  }
  return { ok: true, value: merged };
}

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.includes(value);
}

function isStorageDriver(value: string): value is StorageConfig['driver'] {
  return value === 'memory' || value === 'sqlite';
}

/**
 * Read COTERIE_* variables. Unknown driver or level names fail validation
 * instead of silently falling back to the defaults.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): Result<CoterieConfig> {
  const overrides: ConfigOverrides = {};
  const storage: Partial<StorageConfig> = {};

  if (env.COTERIE_INSTALLER !== undefined) overrides.installer = env.COTERIE_INSTALLER;
  if (env.COTERIE_REGISTRY_SEED !== undefined) overrides.registrySeed = env.COTERIE_REGISTRY_SEED;
  if (env.COTERIE_DB_PATH !== undefined) storage.path = env.COTERIE_DB_PATH;

  const driver = env.COTERIE_STORAGE;
  if (driver !== undefined) {
    if (!isStorageDriver(driver)) {
      return { ok: false, error: new Error(`Invalid configuration: unknown storage driver "${driver}"`) };
    }
    storage.driver = driver;
  }

  const level = env.COTERIE_LOG_LEVEL?.toLowerCase();
  if (level !== undefined) {
    if (!isLogLevelName(level)) {
      return { ok: false, error: new Error(`Invalid configuration: unknown log level "${level}"`) };
    }
    overrides.logLevel = level;
  }

  overrides.storage = storage;
  return loadConfig(overrides);
}

export function createStore(storage: StorageConfig): IdentityStore {
  return storage.driver === 'sqlite' ? new SqliteIdentityStore(storage.path) : new MemoryIdentityStore();
}

export interface ProtocolDependencies {
  store?: IdentityStore;
  deriver?: AddressDeriver;
  auditSink?: AuditSink;
  metrics?: MetricsCollector;
}

/** Build a protocol instance from configuration. Sets the global log level. */
export function createProtocol(config: CoterieConfig, deps: ProtocolDependencies = {}): SharedAccountProtocol {
  setGlobalLogLevel(parseLogLevel(config.logLevel));
  const store = deps.store ?? createStore(config.storage);
  createLogger('config').debug('Protocol configured', {
    installer: config.installer,
    storage: config.storage.driver,
  });
  return new SharedAccountProtocol({
    store,
    installer: config.installer,
    registrySeed: config.registrySeed,
    deriver: deps.deriver,
    auditSink: deps.auditSink,
    metrics: deps.metrics,
  });
}
