import { describe, it, expect } from 'vitest';
import { isActive, med, normalizeName, relationId, remoteOutcome } from '../services/helpers.ts';
import { listing } from './fixtures.ts';

describe('isActive', () => {
  it.each<[string | null, boolean]>([
    [null, true],
    ['ACTIVE', true],
    ['SOLD', false],
    ['DRAFT', false],
    ['active', false],
    ['', false],
  ])('status %j → %s', (status, expected) => {
    expect(isActive(listing({ id: 'x', status }))).toBe(expected);
  });
});

describe('helpers', () => {
  it('normalizeName collapses case and whitespace', () => {
    expect(normalizeName('  New   York ')).toBe('new york');
  });

  it('relationId picks the field for the relation', () => {
    const l = listing({ id: 'x', cityId: 'c', agentId: 'g', propertyTypeId: 't' });
    expect([relationId(l, 'city'), relationId(l, 'agent'), relationId(l, 'type')]).toEqual(['c', 'g', 't']);
  });

  it('remoteOutcome labels status errors with their code', () => {
    expect(remoteOutcome({ kind: 'status', status: 502, message: '' })).toBe('status_502');
    expect(remoteOutcome({ kind: 'unreachable', message: '' })).toBe('unreachable');
  });

  it('med handles even and odd lengths', () => {
    expect(med([3, 1, 2])).toBe(2);
    expect(med([4, 1, 2, 3])).toBe(3);
    expect(med([])).toBe(0);
  });
});
