import { describe, it, expect } from 'vitest';
import { IsoDateSchema } from '../../src/wire/schemas.js';

describe('IsoDateSchema', () => {
  it('accepts a calendar date as is', () => {
    expect(IsoDateSchema.parse('2024-01-31')).toBe('2024-01-31');
  });

  it('truncates a full ISO timestamp to its date', () => {
    expect(IsoDateSchema.parse('2024-01-31T18:30:00.000Z')).toBe('2024-01-31');
    expect(IsoDateSchema.parse('2024-01-31T18:30+02:00')).toBe('2024-01-31');
  });

  it('rejects trailing garbage after a date', () => {
    expect(IsoDateSchema.safeParse('2024-01-01garbage').success).toBe(false);
    expect(IsoDateSchema.safeParse('2024-01-01T').success).toBe(false);
  });

  it('rejects dates that do not exist', () => {
    expect(IsoDateSchema.safeParse('2024-02-30').success).toBe(false);
    expect(IsoDateSchema.safeParse('2024-02-30T00:00:00Z').success).toBe(false);
  });
});
