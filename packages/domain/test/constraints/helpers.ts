import type { DaySchedule, PlannerConfig } from '@school-run/shared-types';
import { buildCatalog } from '../../src/catalog';
import { childSlots } from '../../src/schedule';

/**
 * Monday of week 1 with kid at s1, sib at s3 and step at s4
 */
export function mondaySchedule(config: PlannerConfig, totalMinutes = 0): DaySchedule {
  const catalog = buildCatalog(config);
  const request = { date: '2026-01-05', week: 1, day: 0 } as const;
  const slots = [
    ...childSlots(catalog, catalog.child('kid'), catalog.school('s1'), request, config.timezone),
    ...childSlots(catalog, catalog.child('sib'), catalog.school('s3'), request, config.timezone),
    ...childSlots(catalog, catalog.child('step'), catalog.school('s4'), request, config.timezone),
  ];
  return { ...request, schoolId: 's1', slots, legs: [], totalMinutes };
}

export function emptyDay(date: string, week: 1 | 2, day: number, totalMinutes: number): DaySchedule {
  return { date, week, day, schoolId: 's1', slots: [], legs: [], totalMinutes };
}
