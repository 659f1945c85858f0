'use strict';

import Homey from 'homey';
import { checkCredentials, validatePairingInput } from '../../logic/config/pairing';
import {
  SYSTEM_ID_LOCKED_MESSAGE,
  entryIdFromDeviceData,
  parsePlannerSettings,
  systemIdChanged,
} from '../../logic/config/plannerSettings';
import { PLAN_UPDATED_TRIGGER_ID, toPlanUpdatedTokens } from '../../logic/flow/createPlanCard';
import { resolvePlannerServices, type PlannerServices } from '../../logic/hostServices';
import {
  CAPABILITY_STATUS,
  PLAN_CAPABILITIES,
  PLAN_STATUS_UNKNOWN,
  applyPlanCapabilities,
  buildPlanCapabilityValues,
} from '../../logic/planState/planCapabilities';
import type { PlanSnapshot, PlanStatePublisher } from '../../logic/planState/planStateStore';
import type { Credentials } from '../../logic/plannerApi/types';
import { extractErrorMessage } from '../../logic/utils/errorUtils';

const CREDENTIAL_SETTINGS = ['system_id', 'api_token', 'base_url'];

/**
 * Battery Planner Device
 * One configured system: holds its credentials and shows the latest plan
 */
class BatteryPlannerDevice extends Homey.Device implements PlanStatePublisher {

  private services!: PlannerServices;
  private entryId?: string;

  /**
   * onInit is called when the device is initialized.
   */
  async onInit(): Promise<void> {
    this.log('BatteryPlannerDevice has been initialized');

    this.services = resolvePlannerServices(this.homey.app);
    this.entryId = entryIdFromDeviceData(this.getData());
    if (!this.entryId) {
      await this.setUnavailable('Device has no id').catch(() => { });
      return;
    }

    await this.ensurePlanCapabilities();
    if (this.getCapabilityValue(CAPABILITY_STATUS) === null) {
      await this.setCapabilityValue(CAPABILITY_STATUS, PLAN_STATUS_UNKNOWN).catch(() => { });
    }

    this.services.planState.attach(this.entryId, this);

    let credentials: Credentials;
    try {
      credentials = parsePlannerSettings(this.getSettings());
    } catch (error: unknown) {
      const errorMessage = extractErrorMessage(error);
      this.error('[INIT] Invalid settings:', errorMessage);
      await this.setUnavailable(`Invalid settings: ${errorMessage}`).catch(() => { });
      return;
    }

    this.services.credentials.set(this.entryId, credentials);

    // One check per start; a later successful plan makes the device available again
    const failure = await checkCredentials(credentials);
    if (failure) {
      this.error(`[INIT] Token check failed (${failure.code}):`, failure.detail);
      await this.setUnavailable(failure.message).catch(() => { });
    } else {
      await this.setAvailable().catch(() => { });
    }

    this.log(`[INIT] Device initialization completed for system ${credentials.systemId}`);
  }

  /**
   * onUninit is called when the device is unloaded (app stop or restart).
   */
  async onUninit(): Promise<void> {
    this.releaseEntry();
  }

  /**
   * onDeleted is called when the user deleted the device.
   */
  async onDeleted(): Promise<void> {
    this.releaseEntry();
    this.log('BatteryPlannerDevice has been deleted');
  }

  /**
   * onSettings is called when the user updates the device settings.
   * Credential changes are checked against the planner before they are accepted.
   */
  async onSettings(event: {
    oldSettings: Record<string, unknown>;
    newSettings: Record<string, unknown>;
    changedKeys: string[];
  }): Promise<string | void> {
    this.log('[SETTINGS] Settings changed:', event.changedKeys);

    const credentialsChanged = event.changedKeys.some((key) => CREDENTIAL_SETTINGS.includes(key));
    if (!credentialsChanged || !this.entryId) {
      return;
    }

    if (systemIdChanged(event.oldSettings, event.newSettings)) {
      throw new Error(SYSTEM_ID_LOCKED_MESSAGE);
    }

    const result = await validatePairingInput(event.newSettings);
    if (!result.ok) {
      this.error(`[SETTINGS] Rejected new credentials (${result.code}):`, result.detail);
      throw new Error(result.message);
    }

    this.services.credentials.set(this.entryId, result.credentials);
    await this.setAvailable().catch(() => { });
    this.log(`[SETTINGS] Credentials updated for system ${result.credentials.systemId}`);
  }

  /**
   * Show a new plan. Called by the plan state store, one snapshot at a time.
   * A failed write leaves the previous plan on display and rejects.
   */
  async publishPlanState(snapshot: PlanSnapshot): Promise<void> {
    const values = buildPlanCapabilityValues(snapshot, this.homey.clock.getTimezone());

    await applyPlanCapabilities(this, values, this);
    await this.setAvailable().catch(() => { });

    this.log(
      `[PLAN_STATE] Published plan: baseline=${snapshot.baselineCost}, optimized=${snapshot.optimizedCost}, `
      + `action=${values.plan_current_action}`,
    );

    try {
      const triggerCard = this.homey.flow.getDeviceTriggerCard(PLAN_UPDATED_TRIGGER_ID);
      await triggerCard.trigger(this, toPlanUpdatedTokens(snapshot));
    } catch (error: unknown) {
      this.error('[PLAN_STATE] Failed to trigger plan_updated:', extractErrorMessage(error));
    }
  }

  /**
   * Devices paired by an older version may miss capabilities
   */
  private async ensurePlanCapabilities(): Promise<void> {
    for (const capability of PLAN_CAPABILITIES) {
      if (!this.hasCapability(capability)) {
        await this.addCapability(capability).catch((error: unknown) => {
          this.error(`[INIT] Failed to add capability ${capability}:`, extractErrorMessage(error));
        });
      }
    }
  }

  private releaseEntry(): void {
    if (!this.entryId) {
      return;
    }
    const aborted = this.services.planService.abortEntry(this.entryId);
    if (aborted > 0) {
      this.log(`[PLAN] Aborted ${aborted} in-flight plan request(s)`);
    }
    this.services.planState.detach(this.entryId);
    this.services.credentials.delete(this.entryId);
  }

}

module.exports = BatteryPlannerDevice;
