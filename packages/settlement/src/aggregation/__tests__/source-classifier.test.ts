import { ValidationError } from '@netsettle/core';
import { describe, expect, it } from 'vitest';

import { decodeEventKind, decodeParticipantRole } from '../decoders.js';
import { classifySource, normalizeSource } from '../source-classifier.js';

describe('classifySource', () => {
  it.each([
    ['local_pv', 'local-pv'],
    ['Local-PV', 'local-pv'],
    ['  PV ', 'local-pv'],
    ['battery', 'battery'],
    ['local-battery', 'battery'],
    ['GRID', 'grid'],
    ['rooftop', 'unclassified'],
    ['', 'unclassified'],
  ])('classifies %j as %s', (source, bucket) => {
    expect(classifySource(source)).toBe(bucket);
  });

  it('normalizes case, whitespace and separators', () => {
    expect(normalizeSource(' Local-Battery ')).toBe('local_battery');
  });
});

describe('decodeEventKind', () => {
  it('accepts underscores and any case', () => {
    expect(decodeEventKind('GRID_FEED')._unsafeUnwrap()).toBe('grid-feed');
    expect(decodeEventKind('vpp-sale')._unsafeUnwrap()).toBe('vpp-sale');
    expect(decodeEventKind(' Base_Fee ')._unsafeUnwrap()).toBe('base-fee');
  });

  it('rejects kinds outside the closed set', () => {
    const result = decodeEventKind('refund');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.context).toEqual({ field: 'event_kind', value: 'refund' });
    }
  });
});

describe('decodeParticipantRole', () => {
  it('decodes roles written with underscores', () => {
    expect(decodeParticipantRole('external_market')._unsafeUnwrap()).toBe('external-market');
    expect(decodeParticipantRole('Commercial_Tenant')._unsafeUnwrap()).toBe('commercial-tenant');
  });

  it('rejects unknown roles', () => {
    expect(decodeParticipantRole('janitor').isErr()).toBe(true);
  });
});
