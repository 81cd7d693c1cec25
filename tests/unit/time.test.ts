import { describe, expect, it } from 'vitest';
import { createRunId, shiftDays, toCompactDate, toIsoDate } from '@/core/time';

describe('toIsoDate', () => {
  it('accepts the three input layouts', () => {
    expect(toIsoDate('2024-02-29')).toBe('2024-02-29');
    expect(toIsoDate('20240131')).toBe('2024-01-31');
    expect(toIsoDate('2024/01/05')).toBe('2024-01-05');
  });

  it('rejects impossible or malformed dates', () => {
    expect(toIsoDate('2023-02-29')).toBeNull();
    expect(toIsoDate('2024-1-5')).toBeNull();
    expect(toIsoDate('yesterday')).toBeNull();
    expect(toIsoDate('')).toBeNull();
    expect(toIsoDate(undefined)).toBeNull();
  });
});

describe('shiftDays', () => {
  it('crosses month and leap-day boundaries', () => {
    expect(shiftDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(shiftDays('2024-01-31', 30)).toBe('2024-03-01');
    expect(shiftDays('2024-03-15', 0)).toBe('2024-03-15');
  });
});

describe('createRunId', () => {
  it('combines a compact local timestamp with the entropy suffix', () => {
    expect(createRunId(new Date(2026, 0, 2, 3, 4, 5), 'abcdef012345')).toBe('20260102T030405-abcdef012345');
  });

  it('generates twelve hex characters by default', () => {
    const first = createRunId();
    const second = createRunId();
    expect(first).toMatch(/^\d{8}T\d{6}-[0-9a-f]{12}$/);
    expect(first).not.toBe(second);
  });
});

describe('toCompactDate', () => {
  it('strips dashes for provider wire formats', () => {
    expect(toCompactDate('2024-01-05')).toBe('20240105');
  });
});
