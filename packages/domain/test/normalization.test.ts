import { describe, it, expect } from 'vitest';
import { normalize } from '../src/normalize';
import { makeConfig } from './fixtures';

describe('normalize', () => {
  it('accepts a complete config unchanged', () => {
    const config = makeConfig();

    const res = normalize(JSON.parse(JSON.stringify(config)));

    expect(res).toEqual({ valid: true, errors: [], data: config });
  });

  it('fills defaults for optional sections', () => {
    const { timezone: _tz, ordering: _ordering, ...rest } = makeConfig();
    const input = {
      ...rest,
      journeys: { primaryChildId: 'kid' },
      optimizer: { variableChildId: 'kid' },
    };

    const res = normalize(input);

    expect(res.valid).toBe(true);
    expect(res.data?.timezone).toBe('Europe/London');
    expect(res.data?.journeys.companions).toEqual([]);
    expect(res.data?.optimizer.fixedChildIds).toEqual([]);
    expect(res.data?.ordering).toEqual({ schoolRank: {}, parentAddressRank: [] });
  });

  it('defaults the overnight parent to the PM parent', () => {
    const config = makeConfig();
    const input = {
      ...config,
      children: [{ ...config.children[0], custody: [{ week: 1, day: 0, am: 'p1', pm: 'p2' }] }],
    };

    const res = normalize(input);

    expect(res.data?.children[0].custody).toEqual([{ week: 1, day: 0, am: 'p1', pm: 'p2', overnight: 'p2' }]);
  });

  it('trims names and ids', () => {
    const config = makeConfig();
    const input = { ...config, parents: [{ ...config.parents[0], id: ' p1 ', name: ' Pat ' }] };

    const res = normalize(input);

    expect(res.data?.parents[0]).toMatchObject({ id: 'p1', name: 'Pat' });
  });

  it('reports malformed times with their path', () => {
    const config = makeConfig();
    const input = { ...config, schools: [{ ...config.schools[0], normalStart: '8:40' }] };

    const res = normalize(input);

    expect(res.valid).toBe(false);
    expect(res.data).toBeUndefined();
    expect(res.errors).toEqual(['schools.0.normalStart: Expected HH:mm']);
  });

  it('rejects a parent without addresses and a week outside the rotation', () => {
    const config = makeConfig();
    const input = {
      ...config,
      parents: [{ ...config.parents[0], addresses: [] }],
      children: [{ ...config.children[0], custody: [{ week: 3, day: 0, am: 'p1', pm: 'p1' }] }],
    };

    const res = normalize(input);

    expect(res.valid).toBe(false);
    expect(res.errors).toContain('parents.0.addresses: A parent needs at least one address');
    expect(res.errors.some(e => e.startsWith('children.0.custody.0.week: '))).toBe(true);
  });

  it('rejects input that is not an object', () => {
    const res = normalize('nope');

    expect(res.valid).toBe(false);
    expect(res.errors).toHaveLength(1);
  });
});
