import {
  TimeOfDay,
  type JourneyLeg,
  type JourneyResult,
  type JourneyScenario,
  type PlannerConfig,
} from '@school-run/shared-types';
import { buildCatalog, schoolsOf } from '../catalog';
import { silentLogger, type BaseLogger } from '../logger';
import type { TravelTimeLookup } from '../travel';
import { sum } from '../utils';

export type JourneyDeps = {
  lookup: TravelTimeLookup;
  logger?: BaseLogger;
};

type Stop = { label: string; address: string };

/**
 * Enumerates journey scenarios.
 *
 * For every parent, parent address and candidate school of the primary child,
 * emits the primary child travelling with the parent's companion child (when
 * the parent has one) and then the primary child alone. The companion always
 * goes to its first school.
 */
export const enumerateScenarios = (config: PlannerConfig): JourneyScenario[] => {
  const catalog = buildCatalog(config);
  const primary = catalog.child(config.journeys.primaryChildId);
  const scenarios: JourneyScenario[] = [];

  for (const parent of config.parents) {
    const companionRef = config.journeys.companions.find(c => c.parentId === parent.id);
    const companion = companionRef ? catalog.child(companionRef.childId) : undefined;

    for (const address of parent.addresses) {
      for (const school of schoolsOf(catalog, primary)) {
        if (companion) {
          const [companionSchool] = schoolsOf(catalog, companion);
          if (companionSchool) {
            scenarios.push({
              parent,
              address,
              children: [primary, companion],
              schools: [school, companionSchool],
            });
          }
        }
        scenarios.push({ parent, address, children: [primary], schools: [school] });
      }
    }
  }

  return scenarios;
};

/**
 * Home -> each school in scenario order -> back home. Pick-ups use the same
 * order as drop-offs.
 */
export function journeyStops(scenario: JourneyScenario): Stop[] {
  const home = scenario.address.address;
  return [
    { label: 'Home', address: home },
    ...scenario.schools.map(s => ({ label: s.shortName, address: s.address })),
    { label: 'Return Home', address: home },
  ];
}

export function scenarioName(scenario: JourneyScenario, timeOfDay: TimeOfDay): string {
  const schools = scenario.schools.map(s => s.shortName).join(' + ');
  return `${scenario.parent.name} Home (${scenario.address.label}) > ${schools} ${timeOfDay}`;
}

export async function calculateJourney(
  scenario: JourneyScenario,
  timeOfDay: TimeOfDay,
  deps: JourneyDeps
): Promise<JourneyResult> {
  const logger = deps.logger ?? silentLogger;
  const stops = journeyStops(scenario);

  const legs: JourneyLeg[] = [];
  for (let i = 0; i < stops.length - 1; i++) {
    const from = stops[i];
    const to = stops[i + 1];
    const minutes = await deps.lookup.lookup(from.address, to.address);
    legs.push({ from: from.label, to: to.label, origin: from.address, destination: to.address, minutes });
  }

  const [primarySchool] = scenario.schools;
  const result: JourneyResult = {
    scenarioName: scenarioName(scenario, timeOfDay),
    parentId: scenario.parent.id,
    parentName: scenario.parent.name,
    addressLabel: scenario.address.label,
    children: scenario.children.map(c => c.name).join(', '),
    primarySchoolId: primarySchool?.id ?? '',
    primarySchool: primarySchool?.shortName ?? '',
    schools: scenario.schools.map(s => s.shortName).join(', '),
    timeOfDay,
    totalMinutes: sum(legs.map(l => l.minutes)),
    legs,
  };

  logger.info({ totalMinutes: result.totalMinutes }, `Calculated ${timeOfDay} journey for scenario: ${result.scenarioName}`);
  return result;
}

/**
 * All scenarios, each evaluated as a drop-off and then a pick-up
 */
export async function calculatePermutations(
  config: PlannerConfig,
  deps: JourneyDeps
): Promise<JourneyResult[]> {
  const results: JourneyResult[] = [];
  for (const scenario of enumerateScenarios(config)) {
    for (const timeOfDay of [TimeOfDay.DROP_OFF, TimeOfDay.PICK_UP]) {
      results.push(await calculateJourney(scenario, timeOfDay, deps));
    }
  }
  return results;
}
