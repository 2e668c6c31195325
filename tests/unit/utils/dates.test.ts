/**
 * Timestamp helper tests
 */

import { describe, it, expect } from 'vitest';
import { nowIso, secondsBetween } from '../../../src/utils/dates.js';

describe('nowIso()', () => {
  it('returns a UTC toISOString timestamp', () => {
    expect(nowIso()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});

describe('secondsBetween()', () => {
  it('returns fractional seconds', () => {
    expect(secondsBetween('2024-04-01T12:00:00.000Z', '2024-04-01T12:00:01.500Z')).toBe(1.5);
  });
});
