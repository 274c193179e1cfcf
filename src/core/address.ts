/**
 * Deterministic address derivation.
 *
 * The protocol only relies on the contract of {@link AddressDeriver}: the same
 * `(parent, seed)` pair always yields the same identity, and distinct pairs
 * never collide. The BLAKE2b deriver below is the default production binding.
 */

import { blake2b256, canonicalize, seedBytes, toHex } from './crypto.js';
import type { IdentityId, Seed } from './types.js';

export interface AddressDeriver {
  derive(parent: IdentityId, seed: Seed): IdentityId;
}

/** Domain separator so derived ids never overlap another hashing scheme */
const DERIVATION_DOMAIN = 'coterie-derived-address-v1';

/** `0x` + hex(BLAKE2b-256(canonical JSON of domain, parent and seed)) */
export class Blake2bAddressDeriver implements AddressDeriver {
  derive(parent: IdentityId, seed: Seed): IdentityId {
    const preimage = canonicalize({
      domain: DERIVATION_DOMAIN,
      parent,
      seed: toHex(seedBytes(seed)),
    });
    return `0x${toHex(blake2b256(new TextEncoder().encode(preimage)))}`;
  }
}

export const defaultDeriver: AddressDeriver = new Blake2bAddressDeriver();
