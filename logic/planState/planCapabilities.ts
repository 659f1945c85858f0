/**
 * Plan Capabilities
 *
 * Maps a plan snapshot onto Homey capability values.
 * Kept free of Homey imports so it can be tested directly.
 */
import type { PlannerLogger, PlanSchedule, PlanScheduleEntry } from '../plannerApi/types';
import { planScheduleSchema, formatZodIssues } from '../plannerApi/schemas';
import type { PlanSnapshot } from './planStateStore';
import { formatLocalTimestamp } from '../utils/dateUtils';
import { extractErrorMessage } from '../utils/errorUtils';

export const CAPABILITY_BASELINE_COST = 'plan_baseline_cost';
export const CAPABILITY_OPTIMIZED_COST = 'plan_optimized_cost';
export const CAPABILITY_COST_DELTA = 'plan_cost_delta';
export const CAPABILITY_CURRENT_ACTION = 'plan_current_action';
export const CAPABILITY_SCHEDULE = 'plan_schedule';
export const CAPABILITY_STATUS = 'plan_status';
export const CAPABILITY_LAST_UPDATE = 'last_plan_update';

export const PLAN_CAPABILITIES = [
  CAPABILITY_BASELINE_COST,
  CAPABILITY_OPTIMIZED_COST,
  CAPABILITY_COST_DELTA,
  CAPABILITY_CURRENT_ACTION,
  CAPABILITY_SCHEDULE,
  CAPABILITY_STATUS,
  CAPABILITY_LAST_UPDATE,
] as const;

export type PlanCapability = typeof PLAN_CAPABILITIES[number];

export type PlanCapabilityValues = Record<PlanCapability, string | number>;

export const NO_ACTION = 'none';

export const PLAN_STATUS_UNKNOWN = 'unknown';
export const PLAN_STATUS_ACTIVE = 'active';
export const PLAN_STATUS_ERROR = 'error';

export type CapabilityValue = string | number | boolean | null;

/**
 * The part of a Homey device that holds capability values
 */
export interface CapabilityTarget {
  getCapabilityValue(capabilityId: string): unknown;
  setCapabilityValue(capabilityId: string, value: CapabilityValue): Promise<void>;
}

function toCapabilityValue(value: unknown): CapabilityValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Serialize a schedule for the schedule capability
 */
export function serializeSchedule(schedule: PlanSchedule): string {
  return JSON.stringify(schedule.map((entry) => ({
    time: entry.time,
    action: { name: entry.action.name, power: entry.action.power },
    cost: { baseline: entry.cost.baseline, optimized: entry.cost.optimized },
    price: { import: entry.price.import, export: entry.price.export },
    soc: { start: entry.soc.start, end: entry.soc.end, delta: entry.soc.delta },
  })));
}

/**
 * Read a schedule back from the schedule capability
 */
export function parseScheduleAttribute(value: string): PlanScheduleEntry[] {
  const parsed = planScheduleSchema.safeParse(JSON.parse(value));
  if (!parsed.success) {
    throw new Error(`Invalid schedule attribute: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function costDelta(snapshot: Pick<PlanSnapshot, 'baselineCost' | 'optimizedCost'>): number {
  return snapshot.baselineCost - snapshot.optimizedCost;
}

export function currentActionName(schedule: PlanSchedule): string {
  return schedule[0]?.action.name ?? NO_ACTION;
}

/**
 * All capability values of one snapshot
 */
export function buildPlanCapabilityValues(snapshot: PlanSnapshot, timezone: string): PlanCapabilityValues {
  return {
    [CAPABILITY_BASELINE_COST]: snapshot.baselineCost,
    [CAPABILITY_OPTIMIZED_COST]: snapshot.optimizedCost,
    [CAPABILITY_COST_DELTA]: costDelta(snapshot),
    [CAPABILITY_CURRENT_ACTION]: currentActionName(snapshot.schedule),
    [CAPABILITY_SCHEDULE]: serializeSchedule(snapshot.schedule),
    [CAPABILITY_STATUS]: PLAN_STATUS_ACTIVE,
    [CAPABILITY_LAST_UPDATE]: formatLocalTimestamp(snapshot.updatedAt, timezone),
  };
}

/**
 * Write all plan capabilities. When a write fails, the capabilities already
 * written get their previous values back, plan_status becomes "error" and
 * the write error is rethrown.
 */
export async function applyPlanCapabilities(
  target: CapabilityTarget,
  values: PlanCapabilityValues,
  logger: PlannerLogger,
): Promise<void> {
  const previous = new Map<PlanCapability, CapabilityValue>();
  for (const capability of PLAN_CAPABILITIES) {
    previous.set(capability, toCapabilityValue(target.getCapabilityValue(capability)));
  }

  const written: PlanCapability[] = [];
  try {
    for (const capability of PLAN_CAPABILITIES) {
      await target.setCapabilityValue(capability, values[capability]);
      written.push(capability);
    }
  } catch (error: unknown) {
    for (const capability of written) {
      await target.setCapabilityValue(capability, previous.get(capability) ?? null).catch((restoreError: unknown) => {
        logger.error(`[PLAN_STATE] Failed to restore ${capability}:`, extractErrorMessage(restoreError));
      });
    }
    await target.setCapabilityValue(CAPABILITY_STATUS, PLAN_STATUS_ERROR).catch((statusError: unknown) => {
      logger.error(`[PLAN_STATE] Failed to set ${CAPABILITY_STATUS}:`, extractErrorMessage(statusError));
    });
    throw error;
  }
}
