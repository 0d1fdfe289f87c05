import { z } from 'zod';
import { WEEKDAY_NAMES, type PlannerConfig } from '@school-run/shared-types';
import type { ValidationResult } from '../validate';

const TIME_REGEX = /^(?:[01]\d|2[0-3]):[0-5]\d$/;

const timeSchema = z.string().regex(TIME_REGEX, 'Expected HH:mm');
const idSchema = z.string().trim().min(1);

const parentSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
  addresses: z
    .array(z.object({ label: z.string().trim().min(1), address: z.string().trim().min(1) }))
    .min(1, 'A parent needs at least one address'),
  availability: z.record(z.enum(WEEKDAY_NAMES), z.object({ start: timeSchema, end: timeSchema })).default({}),
});

const schoolSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
  shortName: z.string().trim().min(1),
  address: z.string().trim().min(1),
  normalStart: timeSchema,
  normalEnd: timeSchema,
  breakfastClubStart: timeSchema,
  aftercareEnd: timeSchema,
  source: z.string().optional(),
});

// Overnight defaults to the PM parent
const custodySchema = z
  .object({
    week: z.union([z.literal(1), z.literal(2)]),
    day: z.number().int().min(0).max(4),
    am: idSchema,
    pm: idSchema,
    overnight: idSchema.optional(),
  })
  .transform(c => ({ ...c, overnight: c.overnight ?? c.pm }));

const childSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
  schoolIds: z.array(idSchema),
  custody: z.array(custodySchema),
});

export const plannerConfigSchema = z.object({
  timezone: z.string().trim().min(1).default('Europe/London'),
  parents: z.array(parentSchema),
  schools: z.array(schoolSchema),
  children: z.array(childSchema),
  journeys: z.object({
    primaryChildId: idSchema,
    companions: z.array(z.object({ parentId: idSchema, childId: idSchema })).default([]),
  }),
  optimizer: z.object({
    variableChildId: idSchema,
    fixedChildIds: z.array(idSchema).default([]),
  }),
  ordering: z
    .object({
      schoolRank: z.record(z.string(), z.number()).default({}),
      parentAddressRank: z
        .array(z.object({ parentId: idSchema, addressLabel: z.string().trim().min(1), rank: z.number() }))
        .default([]),
    })
    .default({}),
});

export type NormalizeResult = ValidationResult & {
  data?: PlannerConfig;
};

/**
 * Parses loosely typed input (e.g., a JSON file) into a planner config.
 * Shape problems are reported one per line; cross references are left to
 * `validate`.
 */
export const normalize = (input: unknown): NormalizeResult => {
  const parsed = plannerConfigSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return { valid: false, errors };
  }

  const data: PlannerConfig = parsed.data;
  return { valid: true, errors: [], data };
};
