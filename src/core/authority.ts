/**
 * Delegated authority: the one-time result of redeeming a capability.
 *
 * Holds the shared account's authority source in memory only. It is never
 * written to a store, and `toJSON()` exposes the signed proof, not the key.
 */

import { randomBytes } from 'node:crypto';
import { signObject, toBase64url, verifyObjectSignature } from './crypto.js';
import type { AuthoritySource, IdentityId, Result } from './types.js';

export const AUTHORITY_PROOF_FORMAT = 'coterie-authority-v1';

/** Statement, signed by the shared account, that `holder` acts for `account` */
export interface AuthorityProof {
  format: typeof AUTHORITY_PROOF_FORMAT;
  account: IdentityId;
  holder: IdentityId;
  nonce: string;
  issuedAt: string;
  signature: string;
}

export class DelegatedAuthority {
  private active = true;

  private constructor(
    private readonly source: AuthoritySource,
    readonly proof: AuthorityProof,
  ) {}

  static issue(source: AuthoritySource, holder: IdentityId, now: Date = new Date()): DelegatedAuthority {
    const unsigned: Omit<AuthorityProof, 'signature'> = {
      format: AUTHORITY_PROOF_FORMAT,
      account: source.identity,
      holder,
      nonce: toBase64url(randomBytes(16)),
      issuedAt: now.toISOString(),
    };
    const proof: AuthorityProof = { ...unsigned, signature: signObject(source.secretKey, unsigned) };
    return new DelegatedAuthority(source, proof);
  }

  get account(): IdentityId {
    return this.proof.account;
  }

  get holder(): IdentityId {
    return this.proof.holder;
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Sign `payload` as the shared account. Fails once expired. */
  signAs(payload: unknown): Result<string> {
    if (!this.active) {
      return { ok: false, error: new Error(`Delegated authority over ${this.account} has expired`) };
    }
    return { ok: true, value: signObject(this.source.secretKey, payload) };
  }

  expire(): void {
    this.active = false;
  }

  toJSON(): AuthorityProof {
    return { ...this.proof };
  }
}

/** Check a proof against the shared account's public key */
export function verifyAuthorityProof(proof: AuthorityProof, accountPublicKey: string): boolean {
  if (proof.format !== AUTHORITY_PROOF_FORMAT) return false;
  const { signature, ...signed } = proof;
  try {
    return verifyObjectSignature(accountPublicKey, signed, signature);
  } catch {
    return false;
  }
}
