/**
 * Protocol failures and store faults.
 *
 * Rejected operations come back as `{ ok: false, error: ProtocolError }`.
 * `StoreError` is thrown only when a store invariant is broken by the caller
 * or by corrupt persisted data.
 */

import type { ProtocolError, Result } from './types.js';

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(error: ProtocolError): Result<never, ProtocolError> {
  return { ok: false, error };
}

/** One-line description of a protocol failure for logs and messages. */
export function describeError(error: ProtocolError): string {
  switch (error.type) {
    case 'already_initialized':
      return `Registry already initialized at ${error.registry}`;
    case 'not_installer':
      return `Identity ${error.installer} is not the installer (expected ${error.expected})`;
    case 'not_initialized':
      return `Registry not initialized at ${error.registry}`;
    case 'already_exists':
      return `Identity already exists: ${error.identity}`;
    case 'not_found':
      return `No shared account at ${error.target}`;
    case 'not_admin':
      return `${error.caller} is not the admin of ${error.target}`;
    case 'already_listed':
      return `${error.claimer} is already allow-listed for ${error.target}`;
    case 'not_listed':
      return `${error.claimer} is not allow-listed for ${error.target}`;
    case 'already_holding_capability':
      return `${error.holder} already holds a capability`;
    case 'no_capability':
      return `${error.holder} holds no capability`;
    case 'wrong_target':
      return `Capability held by ${error.holder} is for ${error.held}, not ${error.requested}`;
  }
}
