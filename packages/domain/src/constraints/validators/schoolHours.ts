import type { DaySchedule } from '@school-run/shared-types';
import { hhmmToMin, minToHHMM, minutesOfDay } from '../../utils';
import type { ConstraintResult } from '../types';

/**
 * Validates that slots respect the school's supervised hours.
 *
 * Rules:
 * - A drop-off may not start before breakfast club opens
 * - A pick-up may not end after aftercare closes
 */
export function validateSchoolHours(day: DaySchedule): ConstraintResult {
  const violations: string[] = [];

  for (const slot of day.slots) {
    const start = minutesOfDay(slot.time);
    const { school } = slot;

    if (slot.isDropOff && start < hhmmToMin(school.breakfastClubStart)) {
      violations.push(
        `${day.date}: ${slot.childName} drop-off at ${minToHHMM(start)} before ${school.shortName} opens at ${school.breakfastClubStart}`
      );
    }

    const end = start + slot.durationMinutes;
    if (!slot.isDropOff && end > hhmmToMin(school.aftercareEnd)) {
      violations.push(
        `${day.date}: ${slot.childName} pick-up ends at ${minToHHMM(end)} after ${school.shortName} aftercare ends at ${school.aftercareEnd}`
      );
    }
  }

  return {
    valid: violations.length === 0,
    violations,
  };
}
