import { WEEKDAY_NAMES, type DaySchedule } from '@school-run/shared-types';
import { hhmmToMin, minToHHMM, minutesOfDay } from '../../utils';
import type { ConstraintResult } from '../types';

/**
 * Validates that every slot falls inside the responsible parent's
 * availability window for that weekday.
 *
 * Rules:
 * - Slot start must be >= window start
 * - Slot end (start + duration) must be <= window end
 * - A parent with no window for the weekday is unavailable all day
 *
 * Example:
 * - Parent available 07:00-19:00
 * - Valid: drop-off 08:25-08:40
 * - Invalid: drop-off 06:45-07:00 (starts 15min too early)
 */
export function validateParentAvailability(day: DaySchedule): ConstraintResult {
  const violations: string[] = [];
  const weekday = WEEKDAY_NAMES[day.day];

  for (const slot of day.slots) {
    const kind = slot.isDropOff ? 'drop-off' : 'pick-up';
    const window = weekday ? slot.parent.availability[weekday] : undefined;

    if (!window) {
      violations.push(
        `${day.date}: ${slot.parent.name} is not available on ${weekday ?? `day ${day.day}`} (${slot.childName} ${kind})`
      );
      continue;
    }

    const start = minutesOfDay(slot.time);
    const end = start + slot.durationMinutes;
    const windowStart = hhmmToMin(window.start);
    const windowEnd = hhmmToMin(window.end);

    if (start < windowStart) {
      violations.push(
        `${day.date}: ${slot.childName} ${kind} at ${minToHHMM(start)} but ${slot.parent.name} is only available from ${window.start} ` +
        `(starts ${windowStart - start}min too early)`
      );
    }

    if (end > windowEnd) {
      violations.push(
        `${day.date}: ${slot.childName} ${kind} ends at ${minToHHMM(end)} but ${slot.parent.name} is only available until ${window.end} ` +
        `(ends ${end - windowEnd}min too late)`
      );
    }
  }

  return {
    valid: violations.length === 0,
    violations,
  };
}
