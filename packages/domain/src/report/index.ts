import {
  HalfDay,
  type JourneyResult,
  type OrderingConfig,
  type PlannerConfig,
  type TwoWeekSchedule,
} from '@school-run/shared-types';
import { buildCatalog } from '../catalog';
import { custodyParentId } from '../schedule';

const DAY_ABBREVIATIONS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri'];
const UNRANKED = Number.MAX_SAFE_INTEGER;

// ============================================================================
// JOURNEY CALCULATOR
// ============================================================================

export const JOURNEY_CSV_COLUMNS = [
  'Scenario Name',
  'Parent',
  'Parent Address',
  'Children',
  'Primary School',
  'Schools',
  'Time of Day',
  'Total Journey Time (mins)',
  'Journey Details',
] as const;

/**
 * Orders results by the primary child's school rank, then by the
 * (parent, address label) rank. Unranked keys go last; equal keys keep their
 * input order.
 */
export function sortJourneyResults(results: JourneyResult[], ordering: OrderingConfig): JourneyResult[] {
  const addressRank = new Map(
    ordering.parentAddressRank.map(e => [`${e.parentId}::${e.addressLabel}`, e.rank] as const)
  );
  const schoolRankOf = (r: JourneyResult) => ordering.schoolRank[r.primarySchoolId] ?? UNRANKED;
  const addressRankOf = (r: JourneyResult) => addressRank.get(`${r.parentId}::${r.addressLabel}`) ?? UNRANKED;

  return [...results].sort((a, b) => schoolRankOf(a) - schoolRankOf(b) || addressRankOf(a) - addressRankOf(b));
}

export function formatJourneyTable(results: JourneyResult[]): string {
  const rule = '-'.repeat(100);
  const row = (name: string, total: string, timeOfDay: string, children: string) =>
    `${name.padEnd(50)}${total.padEnd(20)}${timeOfDay.padEnd(15)}${children.padEnd(20)}`;

  return [
    '',
    'Possible Journey Scenarios:',
    rule,
    row('Scenario Name', 'Total Time (mins)', 'Time of Day', 'Children'),
    rule,
    ...results.map(r => row(r.scenarioName, String(r.totalMinutes), r.timeOfDay, r.children)),
    rule,
  ].join('\n');
}

export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function journeyDetails(result: JourneyResult): string {
  return JSON.stringify(
    result.legs.map(l => ({ From: l.from, To: l.to, 'Journey Time (mins)': l.minutes }))
  );
}

/**
 * One header line plus one line per result, newline terminated
 */
export function toJourneyCsv(results: JourneyResult[]): string {
  const rows = [
    JOURNEY_CSV_COLUMNS.join(','),
    ...results.map(r =>
      [
        r.scenarioName,
        r.parentName,
        r.addressLabel,
        r.children,
        r.primarySchool,
        r.schools,
        r.timeOfDay,
        r.totalMinutes,
        journeyDetails(r),
      ]
        .map(csvField)
        .join(',')
    ),
  ];
  return `${rows.join('\n')}\n`;
}

// ============================================================================
// SCHEDULE OPTIMIZER
// ============================================================================

export type OvernightRow = {
  /** e.g., "Week 1 Mon" */
  label: string;
  date: string;
  schoolId: string;
  schoolName: string;
  totalMinutes: number;
  /** Overnight parent name per child, keyed by child name */
  overnight: Record<string, string>;
};

/**
 * Children shown in the custody view: the variable child, then the fixed ones
 */
export function optimizerChildren(config: PlannerConfig) {
  const catalog = buildCatalog(config);
  return [config.optimizer.variableChildId, ...config.optimizer.fixedChildIds].map(id => catalog.child(id));
}

export function overnightRows(schedule: TwoWeekSchedule, config: PlannerConfig): OvernightRow[] {
  const catalog = buildCatalog(config);
  const children = optimizerChildren(config);

  return schedule.days.map(day => {
    const overnight: Record<string, string> = {};
    for (const child of children) {
      overnight[child.name] = catalog.parent(custodyParentId(child, day.week, day.day, HalfDay.OVERNIGHT)).name;
    }
    return {
      label: `Week ${day.week} ${DAY_ABBREVIATIONS[day.day] ?? day.day}`,
      date: day.date,
      schoolId: day.schoolId,
      schoolName: catalog.school(day.schoolId).shortName,
      totalMinutes: day.totalMinutes,
      overnight,
    };
  });
}

export function formatTwoWeekSchedule(
  schedule: TwoWeekSchedule,
  config: PlannerConfig,
  warnings: string[] = []
): string {
  const heavy = '='.repeat(70);
  const rule = '-'.repeat(70);
  const names = optimizerChildren(config).map(c => c.name);
  const rows = overnightRows(schedule, config);

  const lines = [
    '',
    'Optimal Two-Week Schedule',
    heavy,
    `Total Journey Time: ${schedule.totalMinutes} minutes`,
    heavy,
    '',
    'Schedule Overview',
    rule,
    `${'Date'.padEnd(15)}${names.map(n => n.padEnd(10)).join('')}`,
    ...rows.map(r => `${r.label.padEnd(15)}${names.map(n => (r.overnight[n] ?? '').padEnd(10)).join('')}`),
    rule,
    '',
    'Daily Journeys',
    rule,
    `${'Date'.padEnd(15)}${'School'.padEnd(20)}${'Minutes'.padEnd(10)}`,
    ...rows.map(r => `${r.date.padEnd(15)}${r.schoolName.padEnd(20)}${String(r.totalMinutes).padEnd(10)}`),
    rule,
  ];

  if (warnings.length) {
    lines.push('', 'Warnings', ...warnings.map(w => `! ${w}`));
  }

  return lines.join('\n');
}
