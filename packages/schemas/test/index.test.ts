import { describe, expect, it } from 'vitest';
import { DEFAULT_ALL_PASSED_COUNT, cliOptionsSchema, runReportSchema } from '../src/index.js';

describe('cliOptionsSchema', () => {
  it('coerces the pass count given on the command line', () => {
    expect(cliOptionsSchema.parse({ reference: 'i', allPassedCount: '12' })).toEqual({
      reference: 'i',
      allPassedCount: 12
    });
  });

  it('defaults the pass count', () => {
    expect(cliOptionsSchema.parse({}).allPassedCount).toBe(DEFAULT_ALL_PASSED_COUNT);
    expect(DEFAULT_ALL_PASSED_COUNT).toBe(75);
  });

  it('accepts only the two reference modes', () => {
    expect(cliOptionsSchema.safeParse({ reference: 'x' }).success).toBe(false);
  });
});

describe('runReportSchema', () => {
  it('accepts answers only as integer strings', () => {
    const result = runReportSchema.safeParse({
      runId: 'r',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:00.000Z',
      summary: { total: 1, passed: 0, failed: 1, targetSeconds: 0, referenceSeconds: 0 },
      cases: [{ name: 'a.lama', source: '/a.lama', status: 'FAIL', targetSeconds: 0, targetAnswers: ['1.5'] }]
    });
    expect(result.success).toBe(false);
  });

  it('keeps answers wider than a double', () => {
    const result = runReportSchema.safeParse({
      runId: 'r',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:00.000Z',
      summary: { total: 1, passed: 1, failed: 0, targetSeconds: 0, referenceSeconds: 0 },
      cases: [{ name: 'a.lama', source: '/a.lama', status: 'PASS', targetSeconds: 0, goldenAnswers: ['-9223372036854775808'] }]
    });
    expect(result.success).toBe(true);
  });
});
