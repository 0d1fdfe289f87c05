import { DateTime } from 'luxon';
import { z } from 'zod';
import { TravelTimeError, type TravelTimeProvider, type TravelTimeRequest } from '@school-run/domain';

const durationSchema = z.object({ value: z.number() });

const distanceMatrixSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  rows: z
    .array(
      z.object({
        elements: z.array(
          z.object({
            status: z.string(),
            duration: durationSchema.optional(),
            duration_in_traffic: durationSchema.optional(),
          })
        ),
      })
    )
    .default([]),
});

export type DistanceMatrixResponse = z.infer<typeof distanceMatrixSchema>;

export type GoogleMapsOptions = {
  apiKey: string;
  apiBase: string;
  fetch?: typeof fetch;
};

/**
 * Driving time between two free-text addresses from the Distance Matrix API.
 *
 * Without an arrival time the request departs now with the best-guess traffic
 * model and reads `duration_in_traffic`. With one it asks to arrive by that
 * instant and reads `duration`. Any problem throws a TravelTimeError.
 */
export class GoogleMapsDistanceMatrixProvider implements TravelTimeProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GoogleMapsOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(request: TravelTimeRequest): URL {
    const url = new URL(`${this.options.apiBase}/distancematrix/json`);
    url.searchParams.set('origins', request.origin);
    url.searchParams.set('destinations', request.destination);
    url.searchParams.set('key', this.options.apiKey);
    url.searchParams.set('mode', 'driving');

    if (request.arrivalTime) {
      const arrival = DateTime.fromISO(request.arrivalTime, { setZone: true });
      if (!arrival.isValid) throw new TravelTimeError(`Invalid arrival time ${request.arrivalTime}`);
      url.searchParams.set('arrival_time', String(Math.floor(arrival.toSeconds())));
    } else {
      url.searchParams.set('departure_time', 'now');
      url.searchParams.set('traffic_model', 'best_guess');
    }

    return url;
  }

  async fetchMinutes(request: TravelTimeRequest): Promise<number> {
    const url = this.buildUrl(request);

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });
      if (!response.ok) {
        throw new TravelTimeError(`Distance Matrix error ${response.status}`);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof TravelTimeError) throw err;
      throw new TravelTimeError('Distance Matrix request failed', err);
    }

    return Math.floor(this.parseSeconds(body, Boolean(request.arrivalTime)) / 60);
  }

  parseSeconds(body: unknown, hasArrivalTime: boolean): number {
    const parsed = distanceMatrixSchema.safeParse(body);
    if (!parsed.success) {
      throw new TravelTimeError('Invalid Distance Matrix response', parsed.error.issues);
    }

    const data = parsed.data;
    if (data.status !== 'OK') {
      throw new TravelTimeError(`Distance Matrix status ${data.status}`, data.error_message);
    }

    const element = data.rows[0]?.elements[0];
    if (!element) throw new TravelTimeError('No route found');
    if (element.status !== 'OK') throw new TravelTimeError(`Route calculation failed: ${element.status}`);

    const duration = hasArrivalTime ? element.duration : element.duration_in_traffic;
    if (!duration) {
      throw new TravelTimeError(`Response has no ${hasArrivalTime ? 'duration' : 'duration_in_traffic'}`);
    }

    return duration.value;
  }
}
