import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import type { Alert } from '@flexwatch/shared';
import { compileFilter, isEmptyFilter, parseFilterQuery } from '../src/hub/filter.js';

function alert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 1,
    timestamp: 1_000,
    receivedAt: 1_000,
    capcodes: ['0012345'],
    body: 'A1 Brandweer Dordrecht',
    protocol: 'FLEX',
    messageType: 'alpha',
    service: 'Fire',
    priority: 'A1',
    colorClass: 'service-fire',
    matchedAliases: ['Fire Station 1'],
    ...overrides,
  };
}

describe('parseFilterQuery', () => {
  it('reads comma lists, repeated keys and normalizes capcodes', () => {
    const filter = parseFilterQuery({
      q: ' Beemster ',
      service: 'Fire,Police',
      priority: ['a1', 'p1'],
      capcode: '12345',
      limit: '5',
    });

    expect(filter).toEqual({
      text: 'Beemster',
      services: ['Fire', 'Police'],
      priorities: ['A1', 'P1'],
      capcodes: ['0012345'],
    });
  });

  it('returns an empty filter for an empty query', () => {
    expect(parseFilterQuery({})).toEqual({});
    expect(parseFilterQuery({ q: '  ', service: '' })).toEqual({});
  });

  it('matches service and priority names regardless of case', () => {
    expect(parseFilterQuery({ priority: 'Unknown' })).toEqual({ priorities: ['Unknown'] });
    expect(parseFilterQuery({ service: 'fire,POLICE', priority: ['unknown', 'test'] })).toEqual({
      services: ['Fire', 'Police'],
      priorities: ['Unknown', 'TEST'],
    });
    expect(parseFilterQuery({ service: 'traumaheli' })).toEqual({ services: ['TraumaHeli'] });
  });

  it('rejects unknown services, priorities and non-numeric capcodes', () => {
    expect(() => parseFilterQuery({ service: 'Coastguard' })).toThrow(ZodError);
    expect(() => parseFilterQuery({ priority: 'Z9' })).toThrow(ZodError);
    expect(() => parseFilterQuery({ capcode: '12ab' })).toThrow(ZodError);
  });
});

describe('compileFilter', () => {
  it('matches everything for an empty filter', () => {
    expect(isEmptyFilter({})).toBe(true);
    expect(compileFilter({})(alert())).toBe(true);
  });

  it('matches text against body and aliases, case-insensitively', () => {
    const byBody = compileFilter({ text: 'dordrecht' });
    const byAlias = compileFilter({ text: 'STATION 1' });

    expect(byBody(alert())).toBe(true);
    expect(byAlias(alert())).toBe(true);
    expect(byBody(alert({ body: 'B2 Rotterdam' }))).toBe(false);
  });

  it('requires every given criterion', () => {
    const predicate = compileFilter({ services: ['Fire', 'Police'], priorities: ['A1'] });

    expect(predicate(alert())).toBe(true);
    expect(predicate(alert({ priority: 'B2' }))).toBe(false);
    expect(predicate(alert({ service: 'Ambulance' }))).toBe(false);
  });

  it('matches alerts of unknown priority', () => {
    const predicate = compileFilter(parseFilterQuery({ priority: 'unknown' }));

    expect(predicate(alert({ priority: 'Unknown' }))).toBe(true);
    expect(predicate(alert())).toBe(false);
  });

  it('matches any capcode of a group call', () => {
    const predicate = compileFilter({ capcodes: ['1420001'] });

    expect(predicate(alert({ capcodes: ['0012345', '1420001'] }))).toBe(true);
    expect(predicate(alert())).toBe(false);
  });
});
