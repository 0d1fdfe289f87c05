import type { FastifyInstance } from 'fastify';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { generateTwoWeekSchedules, overnightRows, validateTwoWeekSchedule } from '@school-run/domain';
import type { PlannerContext } from '../services/context';

const querySchema = z.object({
  start: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
    .refine(v => DateTime.fromISO(v).isValid, 'Invalid date')
    .optional(),
});

export function registerScheduleRoutes(app: FastifyInstance, ctx: PlannerContext) {
  // Two-week schedule starting on the first Monday on or after `start` (default today)
  app.get('/schedule', async (req, reply) => {
    const query = querySchema.safeParse(req.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid query', details: query.error.issues });
    }

    const startDate = query.data.start ?? DateTime.now().setZone(ctx.config.timezone).toISODate() ?? '';
    const [schedule] = await generateTwoWeekSchedules(
      ctx.config,
      { lookup: ctx.lookup, logger: req.log },
      { startDate }
    );
    if (!schedule) {
      return reply.code(422).send({ error: 'No feasible two-week schedule found' });
    }

    return {
      totalMinutes: schedule.totalMinutes,
      days: overnightRows(schedule, ctx.config),
      warnings: validateTwoWeekSchedule(schedule).violations,
    };
  });
}
