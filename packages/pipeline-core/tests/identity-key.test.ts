import { describe, it, expect } from 'vitest';
import { canonicalizeIdentityKey } from '../src/dedup/identity-key.js';

describe('canonicalizeIdentityKey', () => {
  it.each([
    ['https://Example.com/a/', 'https://example.com/a'],
    ['https://example.com/a#top', 'https://example.com/a'],
    ['https://example.com/a?utm_source=x&utm_medium=y', 'https://example.com/a'],
    ['https://example.com/a?b=2&fbclid=z&a=1', 'https://example.com/a?a=1&b=2'],
    ['https://example.com:443/a', 'https://example.com/a'],
    ['https://example.com', 'https://example.com/'],
    ['  https://example.com/a//  ', 'https://example.com/a'],
  ])('%s → %s', (raw, expected) => {
    expect(canonicalizeIdentityKey(raw)).toBe(expected);
  });

  it('normalizes non-URL keys by case and whitespace', () => {
    expect(canonicalizeIdentityKey('  Some   Paper\tTitle ')).toBe('some paper title');
  });

  it('treats scheme-less hosts as plain text', () => {
    expect(canonicalizeIdentityKey('Example.com/A')).toBe('example.com/a');
  });

  it('is idempotent', () => {
    const once = canonicalizeIdentityKey('HTTPS://Example.com/x/?z=1&utm_campaign=q&a=2#frag');
    expect(once).toBe('https://example.com/x?a=2&z=1');
    expect(canonicalizeIdentityKey(once)).toBe(once);
  });
});
