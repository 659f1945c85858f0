/**
 * Battery Planner API Client
 * Functions for talking to the remote battery planning service
 */
import type { Credentials, PlanRequest, PlanRequestBody, PlanResponse, PlanScheduleEntry } from './types';
import {
  AuthError,
  ConnectivityError,
  PlannerError,
  UpstreamError,
  isAuthStatus,
} from './errors';
import { formatZodIssues, planResponseSchema } from './schemas';
import { extractErrorMessage } from '../utils/errorUtils';
import { MILLISECONDS_PER_SECOND } from '../utils/dateUtils';

export const DEFAULT_BASE_URL = 'https://bp.stenite.com';

/**
 * Plan creation is a synchronous user-facing call, so it gets a low ceiling
 */
export const PLAN_REQUEST_TIMEOUT_MS = 30 * MILLISECONDS_PER_SECOND;
export const VALIDATE_TOKEN_TIMEOUT_MS = 10 * MILLISECONDS_PER_SECOND;

const MAX_UPSTREAM_BODY_LENGTH = 200;

export interface RequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Make a single request to the planner API and hand the response to `handle`.
 * The timeout covers reading the body too. Never retries.
 * Network failures, timeouts and cancellation surface as ConnectivityError.
 */
async function plannerRequest<T>(
  baseUrl: string,
  apiToken: string,
  method: 'GET' | 'POST',
  path: string,
  options: RequestOptions,
  handle: (response: Response) => Promise<T>,
  body?: unknown,
): Promise<T> {
  const url = `${baseUrl}${path}`;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const external = options.signal;
  const forwardAbort = (): void => controller.abort();
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener('abort', forwardAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      method,
      headers: {
        'Authorization': `Token ${apiToken}`,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });
    return await handle(response);
  } catch (error: unknown) {
    if (error instanceof PlannerError) {
      throw error;
    }
    if (timedOut) {
      throw new ConnectivityError(
        `Battery planner did not respond within ${options.timeoutMs / MILLISECONDS_PER_SECOND}s`,
      );
    }
    if (external?.aborted) {
      throw new ConnectivityError('Plan request was cancelled');
    }
    throw new ConnectivityError(`Failed to connect to battery planner: ${extractErrorMessage(error)}`);
  } finally {
    clearTimeout(timer);
    external?.removeEventListener('abort', forwardAbort);
  }
}

async function readUpstreamBody(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  const trimmed = text.trim();
  return trimmed.length > MAX_UPSTREAM_BODY_LENGTH
    ? `${trimmed.slice(0, MAX_UPSTREAM_BODY_LENGTH)}...`
    : trimmed;
}

/**
 * Check that the planner is reachable and accepts the token
 */
export async function validateApiToken(
  baseUrl: string,
  apiToken: string,
  options: RequestOptions = { timeoutMs: VALIDATE_TOKEN_TIMEOUT_MS },
): Promise<void> {
  await plannerRequest(baseUrl, apiToken, 'GET', '/auth/api/validate-api-token', options, async (response) => {
    if (isAuthStatus(response.status)) {
      throw new AuthError(`Invalid authentication for battery planner: HTTP ${response.status}`, response.status);
    }

    if (!response.ok) {
      const upstreamBody = await readUpstreamBody(response);
      throw new UpstreamError(
        `Unexpected response from battery planner: HTTP ${response.status}`,
        response.status,
        upstreamBody,
      );
    }
  });
}

export function buildPlanRequestBody(request: PlanRequest): PlanRequestBody {
  return {
    power_kw: request.powerKw,
    battery_current_soc: request.batteryCurrentSoc,
    allow_export: request.allowExport,
  };
}

/**
 * Entries are shared between results and stored snapshots, so nothing in them may change
 */
function freezeScheduleEntry(entry: PlanScheduleEntry): Readonly<PlanScheduleEntry> {
  return Object.freeze({
    time: entry.time,
    action: Object.freeze({ ...entry.action }),
    cost: Object.freeze({ ...entry.cost }),
    price: Object.freeze({ ...entry.price }),
    soc: Object.freeze({ ...entry.soc }),
  });
}

/**
 * Parse a successful planner response body
 */
export function parsePlanResponse(status: number, responseText: string): PlanResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(responseText);
  } catch {
    throw new UpstreamError(`Malformed response from battery planner: HTTP ${status}`, status);
  }

  const parsed = planResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamError(
      `Invalid battery plan from planner (HTTP ${status}): ${formatZodIssues(parsed.error)}`,
      status,
    );
  }

  return {
    baselineCost: parsed.data.baseline_cost,
    optimizedCost: parsed.data.optimized_cost,
    schedule: Object.freeze(parsed.data.schedule.map(freezeScheduleEntry)),
  };
}

/**
 * Request a new battery plan for the given system
 */
export async function requestPlan(
  credentials: Credentials,
  request: PlanRequest,
  options: RequestOptions = { timeoutMs: PLAN_REQUEST_TIMEOUT_MS },
): Promise<PlanResponse> {
  const path = `/api/battery_planner/${encodeURIComponent(credentials.systemId)}/plan`;

  return plannerRequest(
    credentials.baseUrl,
    credentials.apiToken,
    'POST',
    path,
    options,
    async (response) => {
      if (isAuthStatus(response.status)) {
        throw new AuthError(
          `Failed to create battery plan: HTTP ${response.status} (check the API token)`,
          response.status,
        );
      }

      if (!response.ok) {
        const upstreamBody = await readUpstreamBody(response);
        const suffix = upstreamBody ? ` - ${upstreamBody}` : '';
        throw new UpstreamError(
          `Failed to create battery plan: HTTP ${response.status}${suffix}`,
          response.status,
          upstreamBody,
        );
      }

      const responseText = await response.text();
      return parsePlanResponse(response.status, responseText);
    },
    buildPlanRequestBody(request),
  );
}
