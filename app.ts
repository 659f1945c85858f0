'use strict';

import Homey from 'homey';
import { extractErrorMessage } from './logic/utils/errorUtils';
import { CredentialStore } from './logic/plannerApi/credentialStore';
import { PlanService } from './logic/plannerApi/planService';
import { PlanStateStore } from './logic/planState/planStateStore';
import type { PlannerServices } from './logic/hostServices';

/**
 * Battery Planner App
 * Requests charge/discharge plans from the battery planning service
 */
module.exports = class BatteryPlannerApp extends Homey.App {

  /**
   * Shared by the driver and all devices, see resolvePlannerServices()
   */
  plannerServices!: PlannerServices;

  /**
   * onInit is called when the app is initialized.
   */
  async onInit() {
    // Set up global error handlers to prevent crashes
    process.on('unhandledRejection', (reason: unknown) => {
      this.error('[UNHANDLED] Unhandled promise rejection:', extractErrorMessage(reason));
    });

    process.on('uncaughtException', (error: Error) => {
      this.error('[UNHANDLED] Uncaught exception:', extractErrorMessage(error));
    });

    const credentials = new CredentialStore();
    const planState = new PlanStateStore(this);
    this.plannerServices = {
      credentials,
      planState,
      planService: new PlanService(credentials, planState, this),
    };

    this.log('BatteryPlannerApp has been initialized');
  }

  /**
   * onUninit is called when the app is stopped; in-flight plan requests are aborted.
   */
  async onUninit() {
    const aborted = this.plannerServices.planService.abortAll();
    if (aborted > 0) {
      this.log(`[SHUTDOWN] Aborted ${aborted} plan request(s)`);
    }
  }

};
