import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadEnv } from './config/env';
import { createLogger } from './services/logger';
import { createPlannerContext, type PlannerContext } from './services/context';
import { registerHealthRoutes } from './routes/health';
import { registerJourneyRoutes } from './routes/journeys';
import { registerScheduleRoutes } from './routes/schedule';

export async function buildServer(ctx: PlannerContext, logger: boolean | { level: string } = true) {
  const app = Fastify({ logger });
  await app.register(cors, { origin: true });

  // Register all route modules
  registerHealthRoutes(app, ctx);
  registerJourneyRoutes(app, ctx);
  registerScheduleRoutes(app, ctx);

  return app;
}

// Bootstrap if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const log = createLogger();
  try {
    const env = loadEnv();
    const ctx = await createPlannerContext(env, log);
    const app = await buildServer(ctx, { level: env.LOG_LEVEL });
    await app.listen({ port: env.PORT, host: '0.0.0.0' });
  } catch (err) {
    log.fatal({ err }, 'Error starting planner API');
    process.exit(1);
  }
}
