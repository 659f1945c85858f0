/**
 * Shared services owned by the Homey app and used by the driver and devices
 */
import { CredentialStore } from './plannerApi/credentialStore';
import { PlanService } from './plannerApi/planService';
import { PlanStateStore } from './planState/planStateStore';

export interface PlannerServices {
  credentials: CredentialStore;
  planState: PlanStateStore;
  planService: PlanService;
}

function isPlannerServices(value: unknown): value is PlannerServices {
  return typeof value === 'object'
    && value !== null
    && 'credentials' in value && value.credentials instanceof CredentialStore
    && 'planState' in value && value.planState instanceof PlanStateStore
    && 'planService' in value && value.planService instanceof PlanService;
}

/**
 * Get the services from `this.homey.app`
 * @throws when the app has not exposed them (not initialized yet)
 */
export function resolvePlannerServices(app: unknown): PlannerServices {
  if (typeof app === 'object' && app !== null && 'plannerServices' in app && isPlannerServices(app.plannerServices)) {
    return app.plannerServices;
  }
  throw new Error('Battery planner app is not initialized');
}
