'use strict';

import Homey from 'homey';
import { validatePairingInput, type PairingSuccess } from '../../logic/config/pairing';
import { entryIdFromDeviceData, toDeviceSettings } from '../../logic/config/plannerSettings';
import {
  CREATE_PLAN_CARD_ID,
  createPlanFieldsFromCardArgs,
  toCreatePlanTokens,
  type CreatePlanTokens,
} from '../../logic/flow/createPlanCard';
import { resolvePlannerServices } from '../../logic/hostServices';

/**
 * Battery Planner Driver
 * Handles pairing (system id / API token) and the create_plan action card
 */
class BatteryPlannerDriver extends Homey.Driver {

  /**
   * onInit is called when the driver is initialized.
   */
  async onInit(): Promise<void> {
    this.homey.flow
      .getActionCard(CREATE_PLAN_CARD_ID)
      .registerRunListener(async (args: Record<string, unknown>) => this.runCreatePlan(args));

    this.log('BatteryPlannerDriver has been initialized');
  }

  /**
   * Run listener of the create_plan card. Always resolves with tokens;
   * a failed plan is reported through the success/error tokens.
   */
  private async runCreatePlan(args: Record<string, unknown>): Promise<CreatePlanTokens> {
    const { planService } = resolvePlannerServices(this.homey.app);
    const device = args.device;
    const entryId = device instanceof Homey.Device ? entryIdFromDeviceData(device.getData()) : undefined;

    if (!entryId) {
      this.error('[FLOW] create_plan called without a battery planner device');
      return toCreatePlanTokens({
        success: false,
        error: 'No battery planner device selected',
        errorKind: 'configuration',
      });
    }

    const result = await planService.createPlan(entryId, createPlanFieldsFromCardArgs(args));
    this.log(`[FLOW] create_plan for ${entryId}: ${result.success ? 'success' : result.error}`);
    return toCreatePlanTokens(result);
  }

  /**
   * onPair is called when a user starts pairing
   */
  async onPair(session: Homey.Driver.PairSession): Promise<void> {
    let paired: PairingSuccess | undefined;

    // Handle credentials from the pairing view
    session.setHandler('configure', async (data: Record<string, unknown>) => {
      this.log('[PAIR] Received configuration:', {
        system_id: data.system_id,
        base_url: data.base_url,
        api_token: '***',
      });

      paired = undefined;
      const result = await validatePairingInput(data);

      if (!result.ok) {
        this.error(`[PAIR] Configuration failed (${result.code}):`, result.detail);
        return { success: false, error: result.code, message: result.message };
      }

      this.log(`[PAIR] Token accepted for system ${result.credentials.systemId}`);
      paired = result;
      return { success: true, title: result.title };
    });

    // List devices - called after successful configuration
    session.setHandler('list_devices', async () => {
      if (!paired) {
        throw new Error('Please configure the battery planner connection first');
      }

      this.log('[PAIR] Creating device for system:', paired.credentials.systemId);

      return [
        {
          name: paired.title,
          data: {
            id: paired.entryId,
          },
          settings: toDeviceSettings(paired.credentials),
        },
      ];
    });
  }

}

module.exports = BatteryPlannerDriver;
