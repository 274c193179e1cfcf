import { describe, it, expect } from 'vitest';
import { Blake2bAddressDeriver, defaultDeriver } from '../src/core/address.js';

describe('Blake2bAddressDeriver', () => {
  const deriver = new Blake2bAddressDeriver();

  it('produces 0x-prefixed 32-byte hex addresses', () => {
    expect(deriver.derive('0xa11ce', 'vault')).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('is deterministic', () => {
    expect(deriver.derive('0xa11ce', 'vault')).toBe(deriver.derive('0xa11ce', 'vault'));
    expect(defaultDeriver.derive('0xa11ce', 'vault')).toBe(deriver.derive('0xa11ce', 'vault'));
  });

  it('separates seeds under one parent', () => {
    expect(deriver.derive('0xa11ce', 'vault')).not.toBe(deriver.derive('0xa11ce', 'vault2'));
  });

  it('separates parents under one seed', () => {
    expect(deriver.derive('0xa11ce', 'vault')).not.toBe(deriver.derive('0xb0b', 'vault'));
  });

  it('does not confuse parent and seed boundaries', () => {
    expect(deriver.derive('ab', 'c')).not.toBe(deriver.derive('a', 'bc'));
  });

  it('treats a string seed as its UTF-8 bytes', () => {
    expect(deriver.derive('0xa11ce', 'abc')).toBe(deriver.derive('0xa11ce', new Uint8Array([97, 98, 99])));
  });
});
