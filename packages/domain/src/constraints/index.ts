/**
 * Advisory constraint validators
 *
 * They run on an already selected schedule and only report; the optimizer
 * never rejects a candidate because of them.
 */

import type { DaySchedule, TwoWeekSchedule } from '@school-run/shared-types';
import { DEFAULT_TRAVEL_LIMITS, type TravelLimits, type ConstraintResult } from './types';
import { validateDailyTravel } from './validators/dailyTravel';
import { validateWeeklyTravel } from './validators/weeklyTravel';
import { validateParentAvailability } from './validators/parentAvailability';
import { validateSchoolHours } from './validators/schoolHours';

export * from './validators/dailyTravel';
export * from './validators/weeklyTravel';
export * from './validators/parentAvailability';
export * from './validators/schoolHours';

export * from './types';

function merge(results: ConstraintResult[]): ConstraintResult {
  const violations = results.flatMap(r => r.violations);
  return { valid: violations.length === 0, violations };
}

export function validateDaySchedule(
  day: DaySchedule,
  limits: TravelLimits = DEFAULT_TRAVEL_LIMITS
): ConstraintResult {
  return merge([
    validateDailyTravel(day, limits.maxDailyMinutes),
    validateParentAvailability(day),
    validateSchoolHours(day),
  ]);
}

export function validateTwoWeekSchedule(
  schedule: TwoWeekSchedule,
  limits: TravelLimits = DEFAULT_TRAVEL_LIMITS
): ConstraintResult {
  return merge([
    ...schedule.days.map(day => validateDaySchedule(day, limits)),
    validateWeeklyTravel(schedule, limits.maxWeeklyMinutes),
  ]);
}
