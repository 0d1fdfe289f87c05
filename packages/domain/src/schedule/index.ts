import { DateTime } from 'luxon';
import {
  HalfDay,
  ROTATION_WEEKS,
  TimeOfDay,
  WEEKDAY_NAMES,
  type Child,
  type DaySchedule,
  type JourneyLeg,
  type PlannerConfig,
  type ScheduleSlot,
  type School,
  type TwoWeekSchedule,
  type WeekNumber,
} from '@school-run/shared-types';
import { buildCatalog, custodyFor, primaryAddress, schoolsOf, type Catalog } from '../catalog';
import { silentLogger, type BaseLogger } from '../logger';
import type { TravelTimeLookup } from '../travel';
import { atClockTime, sum, toISOString } from '../utils';

/** Drop-off starts this long before the school day */
export const DROP_OFF_LEAD_MINUTES = 15;
/** Pick-up starts this long before the school day ends */
export const PICK_UP_LEAD_MINUTES = 5;
/** Time spent at the gate for either */
export const GATE_MINUTES = 15;

export type ScheduleDeps = {
  lookup: TravelTimeLookup;
  logger?: BaseLogger;
};

export type DayRequest = {
  date: string;
  week: WeekNumber;
  day: number;
};

export type DayGenerator = (
  config: PlannerConfig,
  request: DayRequest,
  deps: ScheduleDeps
) => Promise<DaySchedule[]>;

export type TwoWeekOptions = {
  /** Any date; the rotation starts on the first Monday on or after it */
  startDate: string;
  /** Replaces the per-day generator */
  generateDay?: DayGenerator;
};

export function custodyParentId(child: Child, week: number, day: number, half: HalfDay): string {
  const entry = custodyFor(child, week, day);
  switch (half) {
    case HalfDay.AM:
      return entry.am;
    case HalfDay.PM:
      return entry.pm;
    case HalfDay.OVERNIGHT:
      return entry.overnight;
  }
}

/**
 * Drop-off and pick-up slot of one child at one school, timed on `date`
 */
export function childSlots(
  catalog: Catalog,
  child: Child,
  school: School,
  request: DayRequest,
  timezone: string
): ScheduleSlot[] {
  const { date, week, day } = request;
  const dropOff = atClockTime(date, school.normalStart, timezone).minus({ minutes: DROP_OFF_LEAD_MINUTES });
  const pickUp = atClockTime(date, school.normalEnd, timezone).minus({ minutes: PICK_UP_LEAD_MINUTES });

  return [
    {
      childId: child.id,
      childName: child.name,
      school,
      parent: catalog.parent(custodyParentId(child, week, day, HalfDay.AM)),
      isDropOff: true,
      time: toISOString(dropOff),
      durationMinutes: GATE_MINUTES,
    },
    {
      childId: child.id,
      childName: child.name,
      school,
      parent: catalog.parent(custodyParentId(child, week, day, HalfDay.PM)),
      isDropOff: false,
      time: toISOString(pickUp),
      durationMinutes: GATE_MINUTES,
    },
  ];
}

/**
 * Drop-offs first, then pick-ups, then a stable sort by clock time
 */
export function orderSlots(slots: ScheduleSlot[]): ScheduleSlot[] {
  const millis = (slot: ScheduleSlot) => DateTime.fromISO(slot.time).toMillis();
  return [...slots.filter(s => s.isDropOff), ...slots.filter(s => !s.isDropOff)].sort(
    (a, b) => millis(a) - millis(b)
  );
}

/**
 * Where a slot happens as far as travel goes: the school for a drop-off,
 * the responsible parent's primary address otherwise.
 */
export function slotAddress(slot: ScheduleSlot): string {
  return slot.isDropOff ? slot.school.address : primaryAddress(slot.parent);
}

function slotLabel(slot: ScheduleSlot): string {
  return `${slot.childName} ${slot.isDropOff ? TimeOfDay.DROP_OFF : TimeOfDay.PICK_UP}`;
}

/**
 * Looks up every consecutive pair of ordered slots, arriving by the later
 * slot's time.
 */
export async function calculateTotalJourneyTime(
  orderedSlots: ScheduleSlot[],
  deps: ScheduleDeps
): Promise<{ legs: JourneyLeg[]; totalMinutes: number }> {
  const logger = deps.logger ?? silentLogger;
  const legs: JourneyLeg[] = [];

  for (let i = 0; i < orderedSlots.length - 1; i++) {
    const start = orderedSlots[i];
    const end = orderedSlots[i + 1];
    const origin = slotAddress(start);
    const destination = slotAddress(end);
    const minutes = await deps.lookup.lookup(origin, destination, end.time);
    logger.debug(`Journey from ${origin} to ${destination}: ${minutes} minutes`);
    legs.push({ from: slotLabel(start), to: slotLabel(end), origin, destination, minutes });
  }

  return { legs, totalMinutes: sum(legs.map(l => l.minutes)) };
}

/**
 * One day schedule per candidate school of the variable child, in candidate
 * order.
 */
export async function generateDayCandidates(
  config: PlannerConfig,
  request: DayRequest,
  deps: ScheduleDeps
): Promise<DaySchedule[]> {
  const catalog = buildCatalog(config);
  const variable = catalog.child(config.optimizer.variableChildId);
  const fixed = config.optimizer.fixedChildIds.map(id => catalog.child(id));
  const candidates: DaySchedule[] = [];

  for (const school of schoolsOf(catalog, variable)) {
    const slots = childSlots(catalog, variable, school, request, config.timezone);
    for (const child of fixed) {
      const [fixedSchool] = schoolsOf(catalog, child);
      if (!fixedSchool) continue;
      slots.push(...childSlots(catalog, child, fixedSchool, request, config.timezone));
    }

    const ordered = orderSlots(slots);
    const { legs, totalMinutes } = await calculateTotalJourneyTime(ordered, deps);
    candidates.push({
      date: request.date,
      week: request.week,
      day: request.day,
      schoolId: school.id,
      slots: ordered,
      legs,
      totalMinutes,
    });
  }

  return candidates;
}

/**
 * Lowest total wins; on equal totals the candidate listed first wins.
 */
export function selectOptimalDaySchedule(candidates: DaySchedule[]): DaySchedule | undefined {
  const ranked = candidates
    .map((schedule, index) => ({ schedule, index }))
    .sort((a, b) => a.schedule.totalMinutes - b.schedule.totalMinutes || a.index - b.index);
  return ranked[0]?.schedule;
}

/**
 * Empty when no candidate exists, otherwise the single optimal schedule
 */
export const generatePossibleDaySchedules: DayGenerator = async (config, request, deps) => {
  const logger = deps.logger ?? silentLogger;
  logger.info(`Generating schedules for ${request.date}, Week ${request.week}, Day ${request.day}`);

  const optimal = selectOptimalDaySchedule(await generateDayCandidates(config, request, deps));
  if (!optimal) {
    logger.warn(`No schedules generated for ${request.date}`);
    return [];
  }

  logger.info(`Selected optimal schedule for ${request.date} with journey time ${optimal.totalMinutes} minutes`);
  return [optimal];
};

/**
 * First Monday on or after `dateISO`
 */
export function rotationStart(dateISO: string): string {
  const date = DateTime.fromISO(dateISO, { zone: 'utc' });
  if (!date.isValid) throw new Error(date.invalidExplanation || `Invalid date ${dateISO}`);
  const offset = (8 - date.weekday) % 7;
  return date.plus({ days: offset }).toISODate() ?? dateISO;
}

export function rotationDate(startMonday: string, week: number, day: number): string {
  const date = DateTime.fromISO(startMonday, { zone: 'utc' }).plus({ days: (week - 1) * 7 + day });
  return date.toISODate() ?? startMonday;
}

/**
 * Builds the two-week schedule over weeks 1-2 x Monday-Friday.
 *
 * Custody is fixed input and each day is optimized on its own. If any day
 * has no candidate the result is empty, never a partial schedule.
 */
export async function generateTwoWeekSchedules(
  config: PlannerConfig,
  deps: ScheduleDeps,
  options: TwoWeekOptions
): Promise<TwoWeekSchedule[]> {
  const logger = deps.logger ?? silentLogger;
  const generateDay = options.generateDay ?? generatePossibleDaySchedules;
  const startMonday = rotationStart(options.startDate);
  logger.info(`Starting two-week schedule generation from ${startMonday}`);

  const days: DaySchedule[] = [];
  for (const week of ROTATION_WEEKS) {
    for (let day = 0; day < WEEKDAY_NAMES.length; day++) {
      const date = rotationDate(startMonday, week, day);
      const [daySchedule] = await generateDay(config, { date, week, day }, deps);
      if (!daySchedule) {
        logger.error(`No valid schedule for ${date}`);
        return [];
      }
      days.push(daySchedule);
    }
  }

  logger.info('Generated the fixed two-week schedule');
  return [{ days, totalMinutes: sum(days.map(d => d.totalMinutes)) }];
}
