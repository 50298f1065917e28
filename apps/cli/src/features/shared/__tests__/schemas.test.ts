import { describe, expect, it } from 'vitest';

import { BatchesCommandOptionsSchema, PreviewCommandOptionsSchema, SettleCommandOptionsSchema } from '../schemas.js';
import { resolveWindow } from '../window-utils.js';

describe('PreviewCommandOptionsSchema', () => {
  it('parses window bounds into dates', () => {
    const options = PreviewCommandOptionsSchema.parse({
      policy: 'policy.json',
      start: '2024-05-01T00:00:00Z',
      end: '2024-05-02',
    });

    expect(options.start?.toISOString()).toBe('2024-05-01T00:00:00.000Z');
    expect(options.end?.toISOString()).toBe('2024-05-02T00:00:00.000Z');
  });

  it('requires a policy file', () => {
    const result = PreviewCommandOptionsSchema.safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('--policy <file> is required');
    }
  });

  it('rejects unparseable dates', () => {
    const result = SettleCommandOptionsSchema.safeParse({ policy: 'p.json', start: 'yesterday' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Expected an ISO 8601 date or timestamp');
    }
  });
});

describe('resolveWindow', () => {
  const now = new Date('2024-05-03T06:00:00.000Z');

  it('defaults to the two days before now', () => {
    const window = resolveWindow({}, now);

    expect(window.start.toISOString()).toBe('2024-05-01T06:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-05-03T06:00:00.000Z');
  });

  it('counts the default start back from an explicit end', () => {
    const window = resolveWindow({ end: new Date('2024-05-02T00:00:00.000Z') }, now);

    expect(window.start.toISOString()).toBe('2024-04-30T00:00:00.000Z');
  });

  it('keeps explicit bounds', () => {
    const start = new Date('2024-05-01T00:00:00.000Z');
    const end = new Date('2024-05-01T12:00:00.000Z');

    expect(resolveWindow({ start, end }, now)).toEqual({ start, end });
  });
});

describe('BatchesCommandOptionsSchema', () => {
  it('reads --limit from its string form', () => {
    expect(BatchesCommandOptionsSchema.parse({ limit: '5', useCase: 'mieterstrom' })).toEqual({
      limit: 5,
      useCase: 'mieterstrom',
    });
  });

  it('rejects a limit below one', () => {
    expect(BatchesCommandOptionsSchema.safeParse({ limit: '0' }).success).toBe(false);
  });
});
