#!/usr/bin/env tsx
// Coterie Demo Scenario — shared treasury account run by a small team
// Usage: npm run demo

import { MemoryAuditSink } from '../core/audit.js';
import { verifyAuthorityProof } from '../core/authority.js';
import { describeError } from '../core/errors.js';
import { LogLevel, setGlobalLogLevel } from '../core/logger.js';
import type { ProtocolError, Result } from '../core/types.js';
import { MetricsCollector } from '../core/metrics.js';
import { SharedAccountProtocol } from '../protocol/protocol.js';
import { MemoryIdentityStore } from '../storage/memory.js';

// ═══════════════════════════════════════════
// Utility
// ═══════════════════════════════════════════

function banner(title: string): void {
  console.log('\n' + '═'.repeat(60));
  console.log(`  ${title}`);
  console.log('═'.repeat(60));
}

function section(title: string): void {
  console.log(`\n── ${title} ${'─'.repeat(Math.max(0, 50 - title.length))}`);
}

function show<T>(label: string, result: Result<T, ProtocolError>): void {
  console.log(result.ok ? `  ✓ ${label}` : `  ✗ ${label}: ${describeError(result.error)}`);
}

// ═══════════════════════════════════════════
// Scenario
// ═══════════════════════════════════════════

async function main() {
  setGlobalLogLevel(LogLevel.SILENT);
  banner('Coterie v0.1 — Shared Treasury Demo');

  const sink = new MemoryAuditSink();
  const metrics = new MetricsCollector();
  const protocol = new SharedAccountProtocol({
    store: new MemoryIdentityStore(),
    installer: '0xc07e',
    auditSink: sink,
    metrics,
  });

  section('Install');
  show('initialize registry', await protocol.initialize('0xc07e'));
  show('initialize again', await protocol.initialize('0xc07e'));

  section('Create shared account');
  const created = await protocol.createSharedAccount('0xa11ce', 'treasury');
  show('alice creates "treasury"', created);
  if (!created.ok) return;
  const treasury = created.value;
  console.log(`  treasury: ${treasury.slice(0, 18)}...`);
  show('alice creates "treasury" twice', await protocol.createSharedAccount('0xa11ce', 'treasury'));

  section('Allow-list');
  show('alice lists bob', await protocol.addClaimer('0xa11ce', treasury, '0xb0b'));
  show('alice lists carol', await protocol.addClaimer('0xa11ce', treasury, '0xca201'));
  show('bob lists mallory', await protocol.addClaimer('0xb0b', treasury, '0x3a11'));
  console.log(`  unclaimed: ${(await protocol.getManagement(treasury))?.unclaimed.join(', ')}`);

  section('Claim');
  show('bob claims', await protocol.claimCapability('0xb0b', treasury));
  show('bob claims again', await protocol.claimCapability('0xb0b', treasury));
  console.log(`  unclaimed: ${(await protocol.getManagement(treasury))?.unclaimed.join(', ')}`);

  section('Redeem');
  const publicKey = await protocol.getAccountKey(treasury);
  const acted = await protocol.actAs('0xb0b', treasury, authority => {
    const signed = authority.signAs({ transfer: 250, to: '0xd00d' });
    const proofValid = publicKey !== null && verifyAuthorityProof(authority.proof, publicKey);
    return { signed: signed.ok, proofValid };
  });
  show('bob acts as treasury', acted);
  if (acted.ok) {
    console.log(`  payload signed: ${acted.value.signed}, proof verifies: ${acted.value.proofValid}`);
  }
  show('bob acts again', await protocol.acquireAuthority('0xb0b', treasury));

  section('Audit');
  const counters = await protocol.getAuditCounters();
  if (counters.ok) {
    for (const [kind, count] of Object.entries(counters.value)) {
      console.log(`  ${kind.padEnd(14)} ${count}`);
    }
  }
  console.log(`  events recorded: ${sink.getEvents().length}`);
  const rejected = (metrics.getSnapshot().counters['protocol.operation'] ?? [])
    .filter(entry => entry.tags?.outcome !== 'ok')
    .reduce((sum, entry) => sum + entry.value, 0);
  console.log(`  rejected operations: ${rejected}`);
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
