/**
 * Flow card mapping for create_plan and plan_updated
 */
import type { PlanResult } from '../plannerApi/types';
import type { PlanSnapshot } from '../planState/planStateStore';
import { costDelta, currentActionName, serializeSchedule } from '../planState/planCapabilities';

export const CREATE_PLAN_CARD_ID = 'create_plan';
export const PLAN_UPDATED_TRIGGER_ID = 'plan_updated';

/**
 * Tokens returned by the create_plan action card.
 * Flow tokens cannot be absent, so a failure carries zeros and an empty schedule.
 */
export interface CreatePlanTokens {
  success: boolean;
  baseline_cost: number;
  optimized_cost: number;
  schedule: string;
  error: string;
}

export interface PlanUpdatedTokens {
  baseline_cost: number;
  optimized_cost: number;
  cost_delta: number;
  current_action: string;
}

/**
 * Pick the service fields out of the card arguments (which also hold the device)
 */
export function createPlanFieldsFromCardArgs(args: Record<string, unknown>): Record<string, unknown> {
  return {
    power_kw: args.power_kw,
    battery_current_soc: args.battery_current_soc,
    allow_export: args.allow_export,
    update_sensors: args.update_sensors,
  };
}

export function toCreatePlanTokens(result: PlanResult): CreatePlanTokens {
  if (!result.success) {
    return {
      success: false,
      baseline_cost: 0,
      optimized_cost: 0,
      schedule: '[]',
      error: result.error,
    };
  }

  return {
    success: true,
    baseline_cost: result.baselineCost,
    optimized_cost: result.optimizedCost,
    schedule: serializeSchedule(result.schedule),
    error: '',
  };
}

export function toPlanUpdatedTokens(snapshot: PlanSnapshot): PlanUpdatedTokens {
  return {
    baseline_cost: snapshot.baselineCost,
    optimized_cost: snapshot.optimizedCost,
    cost_delta: costDelta(snapshot),
    current_action: currentActionName(snapshot.schedule),
  };
}
