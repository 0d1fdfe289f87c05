import type { FastifyInstance } from 'fastify';
import type { PlannerContext } from '../services/context';

export function registerHealthRoutes(app: FastifyInstance, ctx: PlannerContext) {
  // Liveness plus how many lookups hit the cache or fell back
  app.get('/health', async () => ({ status: 'ok', lookups: ctx.lookup.stats() }));
}
