import { DateTime } from 'luxon';

export function hhmmToMin(hhmm: string): number {
  const [hStr, mStr] = hhmm.split(':');
  const h = Number(hStr);
  const m = Number(mStr);
  if (!Number.isFinite(h) || !Number.isFinite(m)) return 0;
  return h * 60 + m;
}

export function minToHHMM(min: number): string {
  const h = Math.floor(min / 60);
  const mm = min % 60;
  return `${h.toString().padStart(2, '0')}:${mm.toString().padStart(2, '0')}`;
}

/**
 * Instant for a wall-clock time on a calendar date in the given zone
 */
export function atClockTime(dateISO: string, hhmm: string, zone: string): DateTime {
  const [hour, minute] = hhmm.split(':').map(part => Number(part));
  const local = DateTime.fromISO(dateISO, { zone }).set({
    hour,
    minute,
    second: 0,
    millisecond: 0,
  });

  if (!local.isValid) {
    throw new Error(local.invalidExplanation || `Invalid date ${dateISO} in ${zone}`);
  }

  return local;
}

/**
 * Minutes since midnight of an ISO instant, read in the offset it carries
 */
export function minutesOfDay(iso: string): number {
  const dt = DateTime.fromISO(iso, { setZone: true });
  return dt.hour * 60 + dt.minute;
}

export function toISOString(dt: DateTime): string {
  const iso = dt.toISO();
  if (!iso) throw new Error(dt.invalidExplanation || 'Invalid date time');
  return iso;
}

export function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
