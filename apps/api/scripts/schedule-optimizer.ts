/**
 * Two-week schedule optimizer
 *
 * For the fixed custody rotation, picks per weekday the variable child's
 * school with the least total driving, then prints the two-week total and
 * the overnight custody table.
 *
 * Usage: npm run optimize [-- YYYY-MM-DD]
 */

import { DateTime } from 'luxon';
import { formatTwoWeekSchedule, generateTwoWeekSchedules, validateTwoWeekSchedule } from '@school-run/domain';
import { loadEnv } from '../src/config/env';
import { createPlannerContext } from '../src/services/context';
import { createLogger } from '../src/services/logger';

const logger = createLogger();

async function runScheduleOptimizer(startArg?: string) {
  const env = loadEnv();
  logger.level = env.LOG_LEVEL;

  const { config, lookup } = await createPlannerContext(env, logger);
  const startDate = startArg ?? DateTime.now().setZone(config.timezone).toISODate() ?? '';

  const [schedule] = await generateTwoWeekSchedules(config, { lookup, logger }, { startDate });
  if (!schedule) {
    console.log('No feasible two-week schedules found.');
    return;
  }

  const { violations } = validateTwoWeekSchedule(schedule);
  console.log(formatTwoWeekSchedule(schedule, config, violations));
  logger.info({ lookups: lookup.stats() }, 'Two-week schedule complete');
}

runScheduleOptimizer(process.argv[2]).catch(err => {
  logger.fatal({ err }, 'Error running optimizer');
  process.exit(1);
});
