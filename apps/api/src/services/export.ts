import { writeFile } from 'node:fs/promises';
import { toJourneyCsv } from '@school-run/domain';
import type { JourneyResult } from '@school-run/shared-types';

/**
 * Overwrites `path` with one CSV row per journey result
 */
export async function writeJourneyCsv(path: string, results: JourneyResult[]): Promise<void> {
  await writeFile(path, toJourneyCsv(results), 'utf8');
}
