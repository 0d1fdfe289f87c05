import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { FALLBACK_MINUTES } from '@school-run/domain';
import { ConfigurationError } from '../errors';

export const DEFAULT_PLANNER_CONFIG_PATH = fileURLToPath(new URL('../../config/planner.json', import.meta.url));

export const GOOGLE_MAPS_API_BASE = 'https://maps.googleapis.com/maps/api';

// An empty `KEY=` line means "not set", not zero
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const envSchema = z.object({
  GOOGLE_MAPS_API_KEY: z.string().trim().optional(),
  GOOGLE_MAPS_API_BASE: z.string().url().default(GOOGLE_MAPS_API_BASE),
  PLANNER_CONFIG: z.string().trim().min(1).default(DEFAULT_PLANNER_CONFIG_PATH),
  JOURNEY_EXPORT_PATH: z.string().trim().min(1).default('journey_scenarios.csv'),
  TRAVEL_FALLBACK_MINUTES: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(FALLBACK_MINUTES)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65535).default(4000)),
});

export type PlannerEnv = Omit<z.infer<typeof envSchema>, 'GOOGLE_MAPS_API_KEY'> & {
  GOOGLE_MAPS_API_KEY: string;
};

/**
 * Reads the process environment. A missing Google Maps key is fatal.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): PlannerEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid environment',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }

  const { GOOGLE_MAPS_API_KEY, ...rest } = parsed.data;
  if (!GOOGLE_MAPS_API_KEY) {
    throw new ConfigurationError('GOOGLE_MAPS_API_KEY is not configured');
  }

  return { ...rest, GOOGLE_MAPS_API_KEY };
}
