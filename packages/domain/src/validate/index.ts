import { IANAZone } from 'luxon';
import { ROTATION_WEEKS, WEEKDAY_NAMES, type PlannerConfig } from '@school-run/shared-types';
import { hhmmToMin } from '../utils';

export type ValidationResult = {
  valid: boolean;
  errors: string[];
};

function duplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

/**
 * Cross-reference and coverage checks over a parsed planner config
 */
export const validate = (config: PlannerConfig): ValidationResult => {
  const errors: string[] = [];

  if (!IANAZone.isValidZone(config.timezone)) errors.push(`Unknown timezone=${config.timezone}`);

  for (const id of duplicates(config.parents.map(p => p.id))) errors.push(`Duplicate parent id=${id}`);
  for (const id of duplicates(config.schools.map(s => s.id))) errors.push(`Duplicate school id=${id}`);
  for (const id of duplicates(config.children.map(c => c.id))) errors.push(`Duplicate child id=${id}`);

  const parents = new Map(config.parents.map(p => [p.id, p] as const));
  const schoolIds = new Set(config.schools.map(s => s.id));
  const childIds = new Set(config.children.map(c => c.id));

  for (const p of config.parents) {
    if (!p.addresses.length) errors.push(`Parent ${p.id} has no address`);
    for (const label of duplicates(p.addresses.map(a => a.label))) {
      errors.push(`Parent ${p.id} has duplicate address label=${label}`);
    }
  }

  for (const s of config.schools) {
    if (hhmmToMin(s.normalStart) >= hhmmToMin(s.normalEnd)) {
      errors.push(`School ${s.id} starts at ${s.normalStart} but ends at ${s.normalEnd}`);
    }
    if (hhmmToMin(s.breakfastClubStart) > hhmmToMin(s.normalStart)) {
      errors.push(`School ${s.id} breakfast club ${s.breakfastClubStart} is after normal start ${s.normalStart}`);
    }
    if (hhmmToMin(s.aftercareEnd) < hhmmToMin(s.normalEnd)) {
      errors.push(`School ${s.id} aftercare ${s.aftercareEnd} ends before normal end ${s.normalEnd}`);
    }
  }

  for (const c of config.children) {
    if (!c.schoolIds.length) errors.push(`Child ${c.id} has no candidate school`);
    for (const schoolId of c.schoolIds) {
      if (!schoolIds.has(schoolId)) errors.push(`Child ${c.id} references unknown schoolId=${schoolId}`);
    }

    // Exactly one entry per (week, weekday)
    const covered = new Set<string>();
    for (const entry of c.custody) {
      const key = `${entry.week}::${entry.day}`;
      if (covered.has(key)) errors.push(`Child ${c.id} has multiple custody entries for week ${entry.week} day ${entry.day}`);
      covered.add(key);
      for (const parentId of [entry.am, entry.pm, entry.overnight]) {
        if (!parents.has(parentId)) {
          errors.push(`Child ${c.id} custody week ${entry.week} day ${entry.day} references unknown parentId=${parentId}`);
        }
      }
    }
    for (const week of ROTATION_WEEKS) {
      WEEKDAY_NAMES.forEach((name, day) => {
        if (!covered.has(`${week}::${day}`)) errors.push(`Child ${c.id} has no custody entry for week ${week} ${name}`);
      });
    }
  }

  const { journeys, optimizer, ordering } = config;

  if (!childIds.has(journeys.primaryChildId)) errors.push(`journeys.primaryChildId=${journeys.primaryChildId} is unknown`);
  for (const companion of journeys.companions) {
    if (!parents.has(companion.parentId)) errors.push(`Companion references unknown parentId=${companion.parentId}`);
    if (!childIds.has(companion.childId)) errors.push(`Companion references unknown childId=${companion.childId}`);
    if (companion.childId === journeys.primaryChildId) {
      errors.push(`Companion of parent ${companion.parentId} is the primary child`);
    }
  }
  for (const parentId of duplicates(journeys.companions.map(c => c.parentId))) {
    errors.push(`Parent ${parentId} has more than one companion child`);
  }

  if (!childIds.has(optimizer.variableChildId)) errors.push(`optimizer.variableChildId=${optimizer.variableChildId} is unknown`);
  for (const id of optimizer.fixedChildIds) {
    if (!childIds.has(id)) errors.push(`optimizer.fixedChildIds references unknown childId=${id}`);
    if (id === optimizer.variableChildId) errors.push(`Child ${id} is both variable and fixed`);
  }

  for (const schoolId of Object.keys(ordering.schoolRank)) {
    if (!schoolIds.has(schoolId)) errors.push(`ordering.schoolRank references unknown schoolId=${schoolId}`);
  }
  for (const entry of ordering.parentAddressRank) {
    const parent = parents.get(entry.parentId);
    if (!parent) errors.push(`ordering.parentAddressRank references unknown parentId=${entry.parentId}`);
    else if (!parent.addresses.some(a => a.label === entry.addressLabel)) {
      errors.push(`ordering.parentAddressRank references unknown address '${entry.addressLabel}' of parent ${entry.parentId}`);
    }
  }

  return { valid: errors.length === 0, errors };
};
