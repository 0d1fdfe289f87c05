import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { calculatePermutations, sortJourneyResults } from '@school-run/domain';
import { TimeOfDay } from '@school-run/shared-types';
import type { PlannerContext } from '../services/context';

const querySchema = z.object({
  timeOfDay: z.nativeEnum(TimeOfDay).optional(),
});

export function registerJourneyRoutes(app: FastifyInstance, ctx: PlannerContext) {
  // All journey scenarios, sorted by the configured ordering
  app.get('/journeys', async (req, reply) => {
    const query = querySchema.safeParse(req.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid query', details: query.error.issues });
    }

    const results = await calculatePermutations(ctx.config, { lookup: ctx.lookup, logger: req.log });
    const sorted = sortJourneyResults(results, ctx.config.ordering);
    const { timeOfDay } = query.data;

    return { results: timeOfDay ? sorted.filter(r => r.timeOfDay === timeOfDay) : sorted };
  });
}
