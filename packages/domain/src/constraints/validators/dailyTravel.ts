import type { DaySchedule } from '@school-run/shared-types';
import type { ConstraintResult } from '../types';

/**
 * Validates that a day's journeys fit the daily travel budget.
 *
 * Example:
 * - Budget: 240 minutes
 * - Valid: 4 legs of 55 minutes (220)
 * - Invalid: 5 legs of 60 minutes (300) - OVER by 60min
 */
export function validateDailyTravel(day: DaySchedule, maxDailyMinutes: number): ConstraintResult {
  const violations: string[] = [];

  if (day.totalMinutes > maxDailyMinutes) {
    violations.push(
      `${day.date}: ${day.totalMinutes}min of travel (limit ${maxDailyMinutes}min) - OVER by ${day.totalMinutes - maxDailyMinutes}min`
    );
  }

  return {
    valid: violations.length === 0,
    violations,
  };
}
