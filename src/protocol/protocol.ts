/**
 * SharedAccountProtocol — the call contract of the capability protocol.
 *
 * Every operation runs as one unit of work on the identity store: it either
 * commits all of its record writes and registry counter bumps, or nothing.
 * Audit events reach the sink only after the commit.
 */

import type { AddressDeriver } from '../core/address.js';
import { defaultDeriver } from '../core/address.js';
import { MemoryAuditSink } from '../core/audit.js';
import type { AuditSink } from '../core/audit.js';
import type { AuthorityProof, DelegatedAuthority } from '../core/authority.js';
import { describeError, fail, ok } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { globalMetrics } from '../core/metrics.js';
import type { MetricsCollector } from '../core/metrics.js';
import { AUDIT_KINDS } from '../core/types.js';
import type {
  AuditCounters,
  AuditEvent,
  IdentityId,
  IdentityStore,
  ProtocolError,
  RegistryRecord,
  Result,
  Seed,
  StoreTransaction,
} from '../core/types.js';
import { addClaimer, removeClaimer } from './allowlist.js';
import { createSharedAccount } from './factory.js';
import { claimCapability } from './issuer.js';
import { acquireAuthority } from './redeemer.js';
import { auditCounters, initializeRegistry, loadRegistry, registryAddress, REGISTRY_SEED } from './registry.js';
import type { UnitOfWork } from './unit.js';

export interface ProtocolOptions {
  store: IdentityStore;
  /** Identity the module is installed under; anchors the registry address */
  installer: IdentityId;
  deriver?: AddressDeriver;
  registrySeed?: string;
  auditSink?: AuditSink;
  logger?: Logger;
  metrics?: MetricsCollector;
  clock?: () => Date;
}

export interface ManagementView {
  admin: IdentityId;
  unclaimed: IdentityId[];
}

type LogContext = Record<string, unknown>;

export class SharedAccountProtocol {
  readonly installer: IdentityId;
  readonly registryId: IdentityId;
  readonly auditSink: AuditSink;
  private store: IdentityStore;
  private deriver: AddressDeriver;
  private logger: Logger;
  private metrics: MetricsCollector;
  private clock: () => Date;

  constructor(opts: ProtocolOptions) {
    this.store = opts.store;
    this.installer = opts.installer;
    this.deriver = opts.deriver ?? defaultDeriver;
    this.registryId = registryAddress(this.deriver, opts.installer, opts.registrySeed ?? REGISTRY_SEED);
    this.auditSink = opts.auditSink ?? new MemoryAuditSink();
    this.metrics = opts.metrics ?? globalMetrics;
    this.clock = opts.clock ?? (() => new Date());
    this.logger = (opts.logger ?? createLogger('SharedAccountProtocol')).child({ registry: this.registryId });
  }

  // ── Operations ──

  /** Create the registry. Only the configured installer may do this, once. */
  initialize(installer: IdentityId): Promise<Result<IdentityId, ProtocolError>> {
    return this.execute('initialize', { installer }, async tx => {
      if (installer !== this.installer) {
        return fail({ type: 'not_installer', installer, expected: this.installer });
      }
      return initializeRegistry(tx, this.registryId);
    });
  }

  createSharedAccount(creator: IdentityId, seed: Seed): Promise<Result<IdentityId, ProtocolError>> {
    return this.run('createSharedAccount', { creator }, unit => createSharedAccount(unit, creator, seed));
  }

  addClaimer(admin: IdentityId, target: IdentityId, claimer: IdentityId): Promise<Result<void, ProtocolError>> {
    return this.run('addClaimer', { admin, target, claimer }, unit => addClaimer(unit, admin, target, claimer));
  }

  removeClaimer(admin: IdentityId, target: IdentityId, claimer: IdentityId): Promise<Result<void, ProtocolError>> {
    return this.run('removeClaimer', { admin, target, claimer }, unit => removeClaimer(unit, admin, target, claimer));
  }

  claimCapability(claimer: IdentityId, target: IdentityId): Promise<Result<void, ProtocolError>> {
    return this.run('claimCapability', { claimer, target }, unit => claimCapability(unit, claimer, target));
  }

  /**
   * Redeem the acquirer's capability for a signed proof of delegated
   * authority. The authority expires before the unit commits; only the
   * proof leaves it.
   */
  acquireAuthority(acquirer: IdentityId, target: IdentityId): Promise<Result<AuthorityProof, ProtocolError>> {
    return this.redeem('acquireAuthority', acquirer, target, authority => authority.toJSON());
  }

  /**
   * Redeem and run `work` with the authority inside the same unit of work.
   * The authority expires when `work` settles. If `work` throws, nothing is
   * committed and the capability is still held. `work` must not call back
   * into this protocol instance.
   */
  actAs<T>(
    acquirer: IdentityId,
    target: IdentityId,
    work: (authority: DelegatedAuthority) => T | Promise<T>,
  ): Promise<Result<Awaited<T>, ProtocolError>> {
    return this.redeem('actAs', acquirer, target, work);
  }

  // ── Views ──

  async isInitialized(): Promise<boolean> {
    return this.view(tx => tx.has(this.registryId, 'registry'));
  }

  async getManagement(target: IdentityId): Promise<ManagementView | null> {
    const management = await this.view(tx => tx.read(target, 'management'));
    return management && { admin: management.admin, unclaimed: [...management.unclaimed] };
  }

  /** Target of the capability `holder` currently holds, if any */
  async getCapabilityTarget(holder: IdentityId): Promise<IdentityId | null> {
    const capability = await this.view(tx => tx.read(holder, 'capability'));
    return capability?.target ?? null;
  }

  /** Public key proofs issued for `target` verify against */
  async getAccountKey(target: IdentityId): Promise<string | null> {
    const account = await this.view(tx => tx.read(target, 'shared_account'));
    return account?.authoritySource.publicKey ?? null;
  }

  async getAuditCounters(): Promise<Result<AuditCounters, ProtocolError>> {
    const loaded = await this.view(tx => loadRegistry(tx, this.registryId));
    return loaded.ok ? ok(auditCounters(loaded.value)) : loaded;
  }

  // ── Internals ──

  private redeem<T>(
    operation: string,
    acquirer: IdentityId,
    target: IdentityId,
    work: (authority: DelegatedAuthority) => T | Promise<T>,
  ): Promise<Result<Awaited<T>, ProtocolError>> {
    return this.run<Awaited<T>>(operation, { acquirer, target }, async unit => {
      const acquired = await acquireAuthority(unit, acquirer, target);
      if (!acquired.ok) return acquired;
      const authority = acquired.value;
      try {
        return ok(await work(authority));
      } finally {
        authority.expire();
      }
    });
  }

  private async view<T>(read: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const result = await this.store.transact<T, never>(tx => read(tx).then(value => ok(value)));
    return result.ok ? result.value : result.error;
  }

  /** Run a registry-backed operation and publish its events after commit */
  private async run<T>(
    operation: string,
    context: LogContext,
    work: (unit: UnitOfWork) => Promise<Result<T, ProtocolError>>,
  ): Promise<Result<T, ProtocolError>> {
    const committed: { events: AuditEvent[]; registry?: RegistryRecord } = { events: [] };

    const result = await this.execute(operation, context, async tx => {
      const loaded = await loadRegistry(tx, this.registryId);
      if (!loaded.ok) return loaded;

      const unit: UnitOfWork = {
        tx,
        deriver: this.deriver,
        registryId: this.registryId,
        registry: loaded.value,
        events: [],
        now: this.clock(),
      };
      const outcome = await work(unit);
      if (outcome.ok && unit.events.length > 0) {
        await tx.update(this.registryId, 'registry', unit.registry);
        committed.events = unit.events;
        committed.registry = unit.registry;
      }
      return outcome;
    });

    if (result.ok) {
      for (const event of committed.events) {
        this.auditSink.append(event);
      }
      if (committed.registry) {
        const counters = auditCounters(committed.registry);
        for (const kind of AUDIT_KINDS) {
          this.metrics.gauge('audit.counter', counters[kind], { kind });
        }
      }
    }
    return result;
  }

  private async execute<T>(
    operation: string,
    context: LogContext,
    work: (tx: StoreTransaction) => Promise<Result<T, ProtocolError>>,
  ): Promise<Result<T, ProtocolError>> {
    let result: Result<T, ProtocolError>;
    try {
      result = await this.store.transact(work);
    } catch (e) {
      this.metrics.counter('protocol.operation', { operation, outcome: 'fault' });
      this.logger.error(`${operation} failed`, { ...context, error: e instanceof Error ? e.message : String(e) });
      throw e;
    }

    if (result.ok) {
      this.metrics.counter('protocol.operation', { operation, outcome: 'ok' });
      this.logger.info(`${operation} committed`, context);
    } else {
      this.metrics.counter('protocol.operation', { operation, outcome: result.error.type });
      this.logger.warn(`${operation} rejected`, { ...context, error: result.error.type, reason: describeError(result.error) });
    }
    return result;
  }
}
