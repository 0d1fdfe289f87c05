import { describe, it, expect } from 'vitest';
import { validate } from '../src/validate';
import { makeConfig } from './fixtures';

describe('validate', () => {
  it('accepts the fixture config', () => {
    expect(validate(makeConfig())).toEqual({ valid: true, errors: [] });
  });

  it('rejects an unknown timezone', () => {
    const config = makeConfig();
    config.timezone = 'Mars/Base';

    expect(validate(config).errors).toEqual(['Unknown timezone=Mars/Base']);
  });

  it('reports duplicate ids and address labels', () => {
    const config = makeConfig();
    config.schools.push({ ...config.schools[0] });
    config.parents[1].addresses.push({ label: 'North', address: 'Elsewhere' });

    expect(validate(config).errors).toEqual([
      'Duplicate school id=s1',
      'Parent p2 has duplicate address label=North',
    ]);
  });

  it('checks school hours are ordered', () => {
    const config = makeConfig();
    config.schools[0] = { ...config.schools[0], normalStart: '15:30', breakfastClubStart: '16:00', aftercareEnd: '15:00' };

    expect(validate(config).errors).toEqual([
      'School s1 starts at 15:30 but ends at 15:15',
      'School s1 breakfast club 16:00 is after normal start 15:30',
      'School s1 aftercare 15:00 ends before normal end 15:15',
    ]);
  });

  it('requires one custody entry per rotation weekday', () => {
    const config = makeConfig();
    const kid = config.children[0];
    kid.custody = kid.custody.filter(c => !(c.week === 2 && c.day === 4));
    kid.custody.push({ ...kid.custody[0] });

    expect(validate(config).errors).toEqual([
      'Child kid has multiple custody entries for week 1 day 0',
      'Child kid has no custody entry for week 2 Friday',
    ]);
  });

  it('reports unknown references', () => {
    const config = makeConfig();
    config.children[1].schoolIds = ['nowhere'];
    config.children[2].custody[0] = { ...config.children[2].custody[0], overnight: 'p9' };
    config.journeys.companions.push({ parentId: 'p3', childId: 'kid' });
    config.optimizer.fixedChildIds = ['sib', 'kid'];
    config.ordering.schoolRank.s9 = 4;

    expect(validate(config).errors).toEqual([
      'Child sib references unknown schoolId=nowhere',
      'Child step custody week 1 day 0 references unknown parentId=p9',
      'Companion references unknown parentId=p3',
      'Companion of parent p3 is the primary child',
      'Child kid is both variable and fixed',
      'ordering.schoolRank references unknown schoolId=s9',
    ]);
  });

  it('rejects a child without candidate schools and two companions for one parent', () => {
    const config = makeConfig();
    config.children[0].schoolIds = [];
    config.journeys.companions.push({ parentId: 'p1', childId: 'step' });

    expect(validate(config).errors).toEqual([
      'Child kid has no candidate school',
      'Parent p1 has more than one companion child',
    ]);
  });

  it('checks ordering addresses belong to the parent', () => {
    const config = makeConfig();
    config.ordering.parentAddressRank.push({ parentId: 'p1', addressLabel: 'Work', rank: 4 });

    expect(validate(config).errors).toEqual([
      "ordering.parentAddressRank references unknown address 'Work' of parent p1",
    ]);
  });
});
