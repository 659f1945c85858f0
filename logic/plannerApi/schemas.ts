/**
 * Zod schemas for service fields and planner responses
 */
import { z } from 'zod';
import { parsePowerKwText } from '../utils/powerUtils';

const SOC_RANGE_MESSAGE = 'must be between 0 and 100';

/**
 * Accepts a finite number or a numeric string, as the planner may send either
 */
export const numericSchema = z.unknown().transform((value, ctx) => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const numeric = Number(value.trim());
    if (Number.isFinite(numeric)) {
      return numeric;
    }
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a finite number' });
  return z.NEVER;
});

/**
 * Fields of the create_plan service call
 */
export const createPlanFieldsSchema = z.object({
  power_kw: z.preprocess(
    (value) => (typeof value === 'string' ? parsePowerKwText(value) : value),
    z.array(z.number().finite()).min(1, 'must contain at least one value'),
  ),
  battery_current_soc: z.number().finite().min(0, SOC_RANGE_MESSAGE).max(100, SOC_RANGE_MESSAGE),
  allow_export: z.boolean(),
  update_sensors: z.boolean().optional().default(true),
});

export type CreatePlanFields = z.input<typeof createPlanFieldsSchema>;

const timestampSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO timestamp',
});

export const planScheduleEntrySchema = z.object({
  time: timestampSchema,
  action: z.object({
    name: z.string().min(1),
    power: numericSchema,
  }),
  cost: z.object({
    baseline: numericSchema,
    optimized: numericSchema,
  }),
  price: z.object({
    import: numericSchema,
    export: numericSchema,
  }),
  soc: z.object({
    start: numericSchema,
    end: numericSchema,
    delta: numericSchema,
  }),
});

export const planScheduleSchema = z.array(planScheduleEntrySchema);

export const planResponseSchema = z.object({
  baseline_cost: numericSchema,
  optimized_cost: numericSchema,
  schedule: planScheduleSchema,
});

/**
 * Flatten zod issues into "path: message; path: message"
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
