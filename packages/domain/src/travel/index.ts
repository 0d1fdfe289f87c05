import { silentLogger, type BaseLogger } from '../logger';

/** Minutes returned whenever a lookup cannot be completed */
export const FALLBACK_MINUTES = 60;

export type TravelTimeRequest = {
  origin: string;
  destination: string;
  /** ISO-8601 instant the traveller must arrive by; absent means depart now */
  arrivalTime?: string;
};

/**
 * Source of travel times (e.g., a mapping service). Implementations throw on
 * any failure; the lookup decides what to do with it.
 */
export interface TravelTimeProvider {
  fetchMinutes(request: TravelTimeRequest): Promise<number>;
}

export class TravelTimeError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'TravelTimeError';
  }
}

export type LookupStats = {
  providerCalls: number;
  cacheHits: number;
  fallbacks: number;
};

export interface TravelTimeLookup {
  lookup(origin: string, destination: string, arrivalTime?: string): Promise<number>;
  stats(): LookupStats;
}

export type TravelTimeLookupOptions = {
  fallbackMinutes?: number;
  logger?: BaseLogger;
};

function cacheKey(request: TravelTimeRequest): string {
  return JSON.stringify([request.origin, request.destination, request.arrivalTime ?? null]);
}

/**
 * Memoizing lookup over a provider.
 *
 * Keys are the full (origin, destination, arrivalTime) tuple and live as long
 * as the lookup. Identical requests in flight share one provider call.
 * A failure resolves to the fallback, which is cached like any other result.
 */
export function createTravelTimeLookup(
  provider: TravelTimeProvider,
  options: TravelTimeLookupOptions = {}
): TravelTimeLookup {
  const fallbackMinutes = options.fallbackMinutes ?? FALLBACK_MINUTES;
  const logger = options.logger ?? silentLogger;
  const cache = new Map<string, Promise<number>>();
  const counters: LookupStats = { providerCalls: 0, cacheHits: 0, fallbacks: 0 };

  const fetchOnce = async (request: TravelTimeRequest): Promise<number> => {
    counters.providerCalls++;
    try {
      const minutes = await provider.fetchMinutes(request);
      if (!Number.isFinite(minutes) || minutes < 0) {
        throw new TravelTimeError(`Provider returned invalid minutes=${minutes}`);
      }
      logger.debug({ ...request, minutes }, 'Journey time fetched');
      return minutes;
    } catch (err) {
      counters.fallbacks++;
      logger.warn(
        { err, origin: request.origin, destination: request.destination, fallbackMinutes },
        'Travel time lookup failed, using fallback'
      );
      return fallbackMinutes;
    }
  };

  return {
    async lookup(origin, destination, arrivalTime) {
      const request: TravelTimeRequest = { origin, destination, arrivalTime };
      const key = cacheKey(request);

      let pending = cache.get(key);
      if (pending) {
        counters.cacheHits++;
        logger.debug({ origin, destination, arrivalTime }, 'Using cached journey time');
      } else {
        pending = fetchOnce(request);
        cache.set(key, pending);
      }

      return pending;
    },

    stats: () => ({ ...counters }),
  };
}
