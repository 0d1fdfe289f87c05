import { vi } from 'vitest';
import type { CustodyDay, PlannerConfig, TimeWindow, WeekdayName, WeekNumber } from '@school-run/shared-types';
import type { TravelTimeLookup } from '../src/travel';

const WORKDAY: TimeWindow = { start: '07:00', end: '19:00' };

export const WEEKDAYS: Record<WeekdayName, TimeWindow> = {
  Monday: WORKDAY,
  Tuesday: WORKDAY,
  Wednesday: WORKDAY,
  Thursday: WORKDAY,
  Friday: WORKDAY,
};

/**
 * Full two-week custody calendar; `pick` chooses the parent for (week, day)
 */
export function rotation(pick: (week: WeekNumber, day: number) => string): CustodyDay[] {
  const entries: CustodyDay[] = [];
  for (const week of [1, 2] as const) {
    for (let day = 0; day < 5; day++) {
      const parentId = pick(week, day);
      entries.push({ week, day, am: parentId, pm: parentId, overnight: parentId });
    }
  }
  return entries;
}

/**
 * Two parents, three children, four schools.
 *
 * - kid: candidate schools s1, s2 (Mon-Tue with Pat, Wed-Fri with Lee)
 * - sib: s3, always with Pat
 * - step: s4, week 1 with Lee, week 2 with Pat
 */
export function makeConfig(): PlannerConfig {
  return {
    timezone: 'UTC',
    parents: [
      {
        id: 'p1',
        name: 'Pat',
        addresses: [{ label: 'Home A', address: '1 A Street' }],
        availability: WEEKDAYS,
      },
      {
        id: 'p2',
        name: 'Lee',
        addresses: [
          { label: 'North', address: 'North Road' },
          { label: 'South', address: 'South Road' },
        ],
        availability: WEEKDAYS,
      },
    ],
    schools: [
      { id: 's1', name: 'School One', shortName: 'S1', address: 'School 1 Road', normalStart: '08:40', normalEnd: '15:15', breakfastClubStart: '08:00', aftercareEnd: '17:30' },
      { id: 's2', name: 'School Two', shortName: 'S2', address: 'School 2 Road', normalStart: '08:50', normalEnd: '15:15', breakfastClubStart: '08:00', aftercareEnd: '17:30' },
      { id: 's3', name: 'School Three', shortName: 'S3', address: 'School 3 Road', normalStart: '08:45', normalEnd: '15:15', breakfastClubStart: '07:00', aftercareEnd: '18:30' },
      { id: 's4', name: 'School Four', shortName: 'S4', address: 'School 4 Road', normalStart: '08:30', normalEnd: '15:30', breakfastClubStart: '08:00', aftercareEnd: '17:25' },
    ],
    children: [
      { id: 'kid', name: 'Kid', schoolIds: ['s1', 's2'], custody: rotation((_week, day) => (day < 2 ? 'p1' : 'p2')) },
      { id: 'sib', name: 'Sib', schoolIds: ['s3'], custody: rotation(() => 'p1') },
      { id: 'step', name: 'Step', schoolIds: ['s4'], custody: rotation(week => (week === 1 ? 'p2' : 'p1')) },
    ],
    journeys: {
      primaryChildId: 'kid',
      companions: [
        { parentId: 'p1', childId: 'sib' },
        { parentId: 'p2', childId: 'step' },
      ],
    },
    optimizer: { variableChildId: 'kid', fixedChildIds: ['sib', 'step'] },
    ordering: {
      schoolRank: { s2: 1, s1: 2 },
      parentAddressRank: [
        { parentId: 'p2', addressLabel: 'North', rank: 1 },
        { parentId: 'p2', addressLabel: 'South', rank: 2 },
        { parentId: 'p1', addressLabel: 'Home A', rank: 3 },
      ],
    },
  };
}

/**
 * Lookup stand-in whose minutes come from `minutesFor`
 */
export function fakeLookup(
  minutesFor: (origin: string, destination: string, arrivalTime?: string) => number = () => 20
) {
  const lookup = vi.fn(async (origin: string, destination: string, arrivalTime?: string) =>
    minutesFor(origin, destination, arrivalTime)
  );
  const fake: TravelTimeLookup = {
    lookup,
    stats: () => ({ providerCalls: lookup.mock.calls.length, cacheHits: 0, fallbacks: 0 }),
  };
  return { fake, lookup };
}
