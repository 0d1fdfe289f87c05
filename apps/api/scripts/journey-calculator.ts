/**
 * Journey calculator
 *
 * Enumerates every parent / address / school combination for the primary
 * child, prints the journeys sorted by the configured ordering and writes them
 * to a CSV file.
 *
 * Usage: npm run journeys
 */

import { calculatePermutations, formatJourneyTable, sortJourneyResults } from '@school-run/domain';
import { loadEnv } from '../src/config/env';
import { createPlannerContext } from '../src/services/context';
import { writeJourneyCsv } from '../src/services/export';
import { createLogger } from '../src/services/logger';

const logger = createLogger();

async function runJourneyCalculator() {
  const env = loadEnv();
  logger.level = env.LOG_LEVEL;

  const { config, lookup } = await createPlannerContext(env, logger);
  const results = await calculatePermutations(config, { lookup, logger });
  const sorted = sortJourneyResults(results, config.ordering);

  console.log(formatJourneyTable(sorted));

  await writeJourneyCsv(env.JOURNEY_EXPORT_PATH, sorted);
  logger.info({ rows: sorted.length, path: env.JOURNEY_EXPORT_PATH, lookups: lookup.stats() }, 'Journey scenarios exported');
}

runJourneyCalculator().catch(err => {
  logger.fatal({ err }, 'Error running journey calculator');
  process.exit(1);
});
