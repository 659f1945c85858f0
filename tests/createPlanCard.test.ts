/**
 * Tests for the create_plan and plan_updated flow card mapping
 */
import {
  createPlanFieldsFromCardArgs,
  toCreatePlanTokens,
  toPlanUpdatedTokens,
} from '../logic/flow/createPlanCard';
import { serializeSchedule } from '../logic/planState/planCapabilities';
import { scheduleEntry } from './helpers/fetchMocks';

describe('createPlanCard', () => {
  test('picks the service fields from the card arguments', () => {
    const args = {
      device: { name: 'Battery System sys-1' },
      power_kw: '1.5, 2.0',
      battery_current_soc: 42,
      allow_export: true,
      update_sensors: false,
    };

    expect(createPlanFieldsFromCardArgs(args)).toEqual({
      power_kw: '1.5, 2.0',
      battery_current_soc: 42,
      allow_export: true,
      update_sensors: false,
    });
  });

  test('success tokens carry the plan', () => {
    expect(toCreatePlanTokens({
      success: true,
      baselineCost: 10,
      optimizedCost: 8,
      schedule: [scheduleEntry],
    })).toEqual({
      success: true,
      baseline_cost: 10,
      optimized_cost: 8,
      schedule: serializeSchedule([scheduleEntry]),
      error: '',
    });
  });

  test('failure tokens carry the error and neutral values', () => {
    expect(toCreatePlanTokens({
      success: false,
      error: 'Failed to create battery plan: HTTP 404',
      errorKind: 'upstream',
    })).toEqual({
      success: false,
      baseline_cost: 0,
      optimized_cost: 0,
      schedule: '[]',
      error: 'Failed to create battery plan: HTTP 404',
    });
  });

  test('plan_updated tokens summarize the snapshot', () => {
    expect(toPlanUpdatedTokens({
      baselineCost: 12.5,
      optimizedCost: 10.25,
      schedule: [{ ...scheduleEntry, action: { name: 'idle', power: 0 } }],
      updatedAt: 0,
    })).toEqual({
      baseline_cost: 12.5,
      optimized_cost: 10.25,
      cost_delta: 2.25,
      current_action: 'idle',
    });
  });
});
