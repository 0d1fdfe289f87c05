import { createTravelTimeLookup, type BaseLogger, type TravelTimeLookup } from '@school-run/domain';
import type { PlannerConfig } from '@school-run/shared-types';
import type { PlannerEnv } from '../config/env';
import { loadPlannerConfig } from '../config/planner';
import { GoogleMapsDistanceMatrixProvider } from './google-maps';

export type PlannerContext = {
  config: PlannerConfig;
  lookup: TravelTimeLookup;
};

/**
 * Data file plus a cached Google Maps lookup, shared by the scripts and the
 * server for the whole run
 */
export async function createPlannerContext(env: PlannerEnv, logger: BaseLogger): Promise<PlannerContext> {
  const config = await loadPlannerConfig(env.PLANNER_CONFIG);
  const provider = new GoogleMapsDistanceMatrixProvider({
    apiKey: env.GOOGLE_MAPS_API_KEY,
    apiBase: env.GOOGLE_MAPS_API_BASE,
  });
  const lookup = createTravelTimeLookup(provider, {
    fallbackMinutes: env.TRAVEL_FALLBACK_MINUTES,
    logger,
  });

  logger.info(
    { parents: config.parents.length, schools: config.schools.length, children: config.children.length },
    'Initialization complete'
  );
  return { config, lookup };
}
