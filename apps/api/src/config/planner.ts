import { readFile } from 'node:fs/promises';
import { normalize, validate } from '@school-run/domain';
import type { PlannerConfig } from '@school-run/shared-types';
import { ConfigurationError } from '../errors';

/**
 * Loads the planner data file (parents, schools, children, custody, ordering)
 */
export async function loadPlannerConfig(path: string): Promise<PlannerConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read planner config ${path}`, [reason]);
  }

  const normalized = normalize(raw);
  if (!normalized.data) {
    throw new ConfigurationError(`Invalid planner config ${path}`, normalized.errors);
  }

  const validation = validate(normalized.data);
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid planner config ${path}`, validation.errors);
  }

  return normalized.data;
}
