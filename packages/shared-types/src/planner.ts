/**
 * TypeScript DTOs for the school run planner
 *
 * This file defines the reference data (parents, schools, children and their
 * custody calendars) and the structures produced by the journey calculator and
 * the two-week schedule optimizer.
 */

// ============================================================================
// ENUMS & CONSTANTS
// ============================================================================

export enum TimeOfDay {
  DROP_OFF = 'Drop-off',
  PICK_UP = 'Pick-up',
}

export enum HalfDay {
  AM = 'AM',
  PM = 'PM',
  OVERNIGHT = 'Overnight',
}

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday'] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

/** Week numbers of the custody rotation */
export const ROTATION_WEEKS = [1, 2] as const;

export type WeekNumber = (typeof ROTATION_WEEKS)[number];

// ============================================================================
// REFERENCE DATA
// ============================================================================

/**
 * A labelled address a parent can start from
 */
export interface ParentAddress {
  /** Short label used in reports (e.g., "Town flat") */
  label: string;

  /** Free text passed as-is to the mapping service */
  address: string;
}

/**
 * Clock window in HH:mm
 */
export interface TimeWindow {
  start: string;
  end: string;
}

export interface Parent {
  id: string;
  name: string;

  /** At least one address; the first is the primary address */
  addresses: ParentAddress[];

  /** Availability per weekday; missing days mean unavailable */
  availability: Partial<Record<WeekdayName, TimeWindow>>;
}

export interface School {
  id: string;

  /** Full name */
  name: string;

  /** Abbreviated name used in scenario labels */
  shortName: string;

  address: string;

  /** Normal session start / end (HH:mm) */
  normalStart: string;
  normalEnd: string;

  /** Earliest drop-off with breakfast club (HH:mm) */
  breakfastClubStart: string;

  /** Latest pick-up with aftercare (HH:mm) */
  aftercareEnd: string;

  /** Where the times were taken from */
  source?: string;
}

/**
 * Who is responsible for a child on one weekday of the rotation
 */
export interface CustodyDay {
  week: WeekNumber;

  /** 0 = Monday ... 4 = Friday */
  day: number;

  /** Parent doing the drop-off */
  am: string;

  /** Parent doing the pick-up */
  pm: string;

  /** Parent the child sleeps at; defaults to the PM parent */
  overnight: string;
}

export interface Child {
  id: string;
  name: string;

  /** Candidate school ids, in preference order */
  schoolIds: string[];

  /** Exactly one entry per (week, day) of the rotation */
  custody: CustodyDay[];
}

// ============================================================================
// PLANNER CONFIGURATION
// ============================================================================

/**
 * Journey calculator settings
 */
export interface JourneyPlanConfig {
  /** Child whose school is varied across scenarios */
  primaryChildId: string;

  /** Fixed child travelling with the primary child, per parent */
  companions: Array<{ parentId: string; childId: string }>;
}

/**
 * Schedule optimizer settings
 */
export interface OptimizerPlanConfig {
  /** Child whose school is chosen per day */
  variableChildId: string;

  /** Children whose school never changes */
  fixedChildIds: string[];
}

/**
 * Explicit sort order for journey results. Lower rank sorts first; keys
 * without a rank sort after every ranked key.
 */
export interface OrderingConfig {
  schoolRank: Record<string, number>;
  parentAddressRank: Array<{ parentId: string; addressLabel: string; rank: number }>;
}

export interface PlannerConfig {
  /** IANA zone used to turn school times into instants */
  timezone: string;
  parents: Parent[];
  schools: School[];
  children: Child[];
  journeys: JourneyPlanConfig;
  optimizer: OptimizerPlanConfig;
  ordering: OrderingConfig;
}

// ============================================================================
// JOURNEY CALCULATOR OUTPUT
// ============================================================================

export interface JourneyLeg {
  /** Stop labels (e.g., "Home", a school short name, "Return Home") */
  from: string;
  to: string;

  /** Addresses sent to the mapping service */
  origin: string;
  destination: string;

  minutes: number;
}

export interface JourneyScenario {
  parent: Parent;
  address: ParentAddress;
  children: Child[];

  /** Resolved school per child, same order as children */
  schools: School[];
}

export interface JourneyResult {
  scenarioName: string;
  parentId: string;
  parentName: string;
  addressLabel: string;

  /** Child names joined with ", " */
  children: string;

  /** Id and short name of the primary child's school */
  primarySchoolId: string;
  primarySchool: string;

  /** School short names joined with ", " */
  schools: string;

  timeOfDay: TimeOfDay;
  totalMinutes: number;
  legs: JourneyLeg[];
}

// ============================================================================
// SCHEDULE OPTIMIZER OUTPUT
// ============================================================================

export interface ScheduleSlot {
  childId: string;
  childName: string;
  school: School;

  /** Responsible parent for this slot */
  parent: Parent;

  isDropOff: boolean;

  /** Clock time as an ISO-8601 instant with offset */
  time: string;

  /** Minutes spent at the school gate */
  durationMinutes: number;
}

export interface DaySchedule {
  /** Calendar date (YYYY-MM-DD) */
  date: string;
  week: WeekNumber;
  day: number;

  /** School chosen for the variable child */
  schoolId: string;

  /** Slots in clock order */
  slots: ScheduleSlot[];
  legs: JourneyLeg[];
  totalMinutes: number;
}

export interface TwoWeekSchedule {
  /** Ten days in (week, day) order */
  days: DaySchedule[];
  totalMinutes: number;
}
