import type { Child, CustodyDay, Parent, PlannerConfig, School } from '@school-run/shared-types';

/**
 * Id-keyed view over the reference data of a planner config
 */
export type Catalog = {
  parents: Map<string, Parent>;
  schools: Map<string, School>;
  children: Map<string, Child>;
  parent(id: string): Parent;
  school(id: string): School;
  child(id: string): Child;
};

function getOrThrow<T>(map: Map<string, T>, id: string, kind: string): T {
  const found = map.get(id);
  if (!found) throw new Error(`Unknown ${kind} id=${id}`);
  return found;
}

export const buildCatalog = (config: PlannerConfig): Catalog => {
  const parents = new Map<string, Parent>(config.parents.map(p => [p.id, p] as const));
  const schools = new Map<string, School>(config.schools.map(s => [s.id, s] as const));
  const children = new Map<string, Child>(config.children.map(c => [c.id, c] as const));

  return {
    parents,
    schools,
    children,
    parent: id => getOrThrow(parents, id, 'parent'),
    school: id => getOrThrow(schools, id, 'school'),
    child: id => getOrThrow(children, id, 'child'),
  };
};

/**
 * Candidate schools of a child, in configured order
 */
export function schoolsOf(catalog: Catalog, child: Child): School[] {
  return child.schoolIds.map(id => catalog.school(id));
}

export function custodyFor(child: Child, week: number, day: number): CustodyDay {
  const entry = child.custody.find(c => c.week === week && c.day === day);
  if (!entry) throw new Error(`Child ${child.id} has no custody entry for week ${week} day ${day}`);
  return entry;
}

export function primaryAddress(parent: Parent): string {
  const [first] = parent.addresses;
  if (!first) throw new Error(`Parent ${parent.id} has no address`);
  return first.address;
}
