/**
 * Plan Request Service
 * Implements the create_plan service call: validate, request, publish
 */
import type {
  CreatePlanServiceResponse,
  PlanFailure,
  PlannerLogger,
  PlanRequest,
  PlanResult,
} from './types';
import { ConfigurationError, ConnectivityError, toPlannerError } from './errors';
import { createPlanFieldsSchema, formatZodIssues } from './schemas';
import { PLAN_REQUEST_TIMEOUT_MS, requestPlan } from './apiClient';
import type { CredentialStore } from './credentialStore';
import type { PlanStateStore } from '../planState/planStateStore';

export interface PlanServiceOptions {
  timeoutMs?: number;
}

/**
 * Validate raw service fields into a PlanRequest
 * @throws ConfigurationError when a field is missing or out of range
 */
export function parseCreatePlanFields(fields: unknown): PlanRequest {
  const parsed = createPlanFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid plan request: ${formatZodIssues(parsed.error)}`);
  }

  return {
    powerKw: parsed.data.power_kw,
    batteryCurrentSoc: parsed.data.battery_current_soc,
    allowExport: parsed.data.allow_export,
    updateSensors: parsed.data.update_sensors,
  };
}

/**
 * Convert a result into the service call's response fields
 */
export function toServiceResponse(result: PlanResult): CreatePlanServiceResponse {
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return {
    success: true,
    baseline_cost: result.baselineCost,
    optimized_cost: result.optimizedCost,
    schedule: result.schedule.map((entry) => ({ ...entry })),
  };
}

export class PlanService {
  private readonly credentials: CredentialStore;
  private readonly planState: PlanStateStore;
  private readonly logger: PlannerLogger;
  private readonly timeoutMs: number;
  private readonly inFlight = new Map<string, Set<AbortController>>();

  constructor(
    credentials: CredentialStore,
    planState: PlanStateStore,
    logger: PlannerLogger,
    options: PlanServiceOptions = {},
  ) {
    this.credentials = credentials;
    this.planState = planState;
    this.logger = logger;
    this.timeoutMs = options.timeoutMs ?? PLAN_REQUEST_TIMEOUT_MS;
  }

  /**
   * Create a battery plan for one entry.
   * Never throws: every failure is returned as a PlanFailure.
   * @param signal Aborts the request; nothing is published afterwards
   */
  async createPlan(entryId: string, fields: unknown, signal?: AbortSignal): Promise<PlanResult> {
    try {
      const request = parseCreatePlanFields(fields);
      const credentials = this.credentials.get(entryId);
      if (!credentials) {
        throw new ConfigurationError(`No battery planner device found for entry ${entryId}`);
      }

      const { controller, release } = this.track(entryId, signal);
      try {
        this.logger.log(
          `[PLAN] Requesting plan for system ${credentials.systemId} `
          + `(${request.powerKw.length} slots, soc=${request.batteryCurrentSoc}%, export=${request.allowExport})`,
        );

        const plan = await requestPlan(credentials, request, {
          timeoutMs: this.timeoutMs,
          signal: controller.signal,
        });

        if (controller.signal.aborted) {
          throw new ConnectivityError('Plan request was cancelled');
        }

        this.logger.log(
          `[PLAN] Received plan: baseline=${plan.baselineCost}, optimized=${plan.optimizedCost}, `
          + `${plan.schedule.length} schedule entries`,
        );

        if (request.updateSensors) {
          await this.planState.replace(entryId, plan);
        }

        return { success: true, ...plan };
      } catch (error: unknown) {
        if (controller.signal.aborted) {
          throw new ConnectivityError('Plan request was cancelled');
        }
        throw error;
      } finally {
        release();
      }
    } catch (error: unknown) {
      return this.toFailure(entryId, error);
    }
  }

  /**
   * Abort all in-flight requests of an entry
   * @returns number of aborted requests
   */
  abortEntry(entryId: string): number {
    const controllers = this.inFlight.get(entryId);
    if (!controllers) {
      return 0;
    }
    const count = controllers.size;
    for (const controller of controllers) {
      controller.abort();
    }
    this.inFlight.delete(entryId);
    return count;
  }

  abortAll(): number {
    let count = 0;
    for (const entryId of Array.from(this.inFlight.keys())) {
      count += this.abortEntry(entryId);
    }
    return count;
  }

  /**
   * Register an in-flight request; `release` must be called once it settles
   */
  private track(entryId: string, signal?: AbortSignal): { controller: AbortController; release: () => void } {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const controllers = this.inFlight.get(entryId) ?? new Set<AbortController>();
    controllers.add(controller);
    this.inFlight.set(entryId, controllers);

    const release = (): void => {
      signal?.removeEventListener('abort', forwardAbort);
      const current = this.inFlight.get(entryId);
      if (!current) {
        return;
      }
      current.delete(controller);
      if (current.size === 0) {
        this.inFlight.delete(entryId);
      }
    };

    return { controller, release };
  }

  private toFailure(entryId: string, error: unknown): PlanFailure {
    const plannerError = toPlannerError(error);

    switch (plannerError.kind) {
      case 'configuration':
      case 'connectivity':
        this.logger.log(`[PLAN] ${entryId}: ${plannerError.message}`);
        break;
      case 'auth':
      case 'upstream':
      case 'publish':
      default:
        this.logger.error(`[PLAN] ${entryId}: ${plannerError.message}`);
        break;
    }

    return { success: false, error: plannerError.message, errorKind: plannerError.kind };
  }
}
