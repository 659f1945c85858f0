'use strict';

import { handleCreatePlanRequest } from './logic/api/planApi';
import { resolvePlannerServices } from './logic/hostServices';

interface ApiRequest {
  homey: { app: unknown };
  params: unknown;
  body: unknown;
}

/**
 * Homey Web API, routes are declared under "api" in the app manifest
 */
module.exports = {
  // POST /entries/:entryId/plan
  async createPlan({ homey, params, body }: ApiRequest) {
    const { planService } = resolvePlannerServices(homey.app);
    return handleCreatePlanRequest(planService, params, body);
  },
};
