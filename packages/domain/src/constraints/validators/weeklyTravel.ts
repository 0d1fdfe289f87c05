import type { TwoWeekSchedule } from '@school-run/shared-types';
import type { ConstraintResult } from '../types';

/**
 * Total journey minutes per rotation week
 */
export function getWeeklyTotals(schedule: TwoWeekSchedule): Map<number, number> {
  const totals = new Map<number, number>();
  for (const day of schedule.days) {
    totals.set(day.week, (totals.get(day.week) ?? 0) + day.totalMinutes);
  }
  return totals;
}

/**
 * Validates that each rotation week fits the weekly travel budget.
 */
export function validateWeeklyTravel(schedule: TwoWeekSchedule, maxWeeklyMinutes: number): ConstraintResult {
  const violations: string[] = [];

  for (const [week, total] of getWeeklyTotals(schedule)) {
    if (total > maxWeeklyMinutes) {
      violations.push(
        `Week ${week}: ${total}min of travel (limit ${maxWeeklyMinutes}min) - OVER by ${total - maxWeeklyMinutes}min`
      );
    }
  }

  return {
    valid: violations.length === 0,
    violations,
  };
}
