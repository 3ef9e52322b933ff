import { describe, it, expect } from 'vitest';
import { redactSecret } from './redact.js';

describe('redactSecret', () => {
  it('keeps the head, the tail and the length', () => {
    expect(redactSecret('test-secret-value')).toBe('test…ue (17 chars)');
    expect(redactSecret('test-secret-value', 6)).toBe('test-s…ue (17 chars)');
  });

  it('hides short values entirely', () => {
    expect(redactSecret('abc')).toBe('***');
    expect(redactSecret('12345678')).toBe('********');
  });

  it('reports missing values', () => {
    expect(redactSecret(undefined)).toBe('(not set)');
    expect(redactSecret('')).toBe('(not set)');
  });
});
