/**
 * Battery Planner error taxonomy
 */
import type { PlannerErrorKind } from './types';
import { extractErrorMessage } from '../utils/errorUtils';

export abstract class PlannerError extends Error {
  abstract readonly kind: PlannerErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing entry or invalid call parameters, detected before any request
 */
export class ConfigurationError extends PlannerError {
  readonly kind = 'configuration';
}

/**
 * Network failure, timeout or cancellation
 */
export class ConnectivityError extends PlannerError {
  readonly kind = 'connectivity';
}

/**
 * Planner rejected the API token (401/403)
 */
export class AuthError extends PlannerError {
  readonly kind = 'auth';
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
  }
}

/**
 * Any other non-2xx status or an unusable response body
 */
export class UpstreamError extends PlannerError {
  readonly kind = 'upstream';
  readonly statusCode?: number;
  readonly upstreamBody?: string;

  constructor(message: string, statusCode?: number, upstreamBody?: string) {
    super(message);
    this.statusCode = statusCode;
    this.upstreamBody = upstreamBody;
  }
}

/**
 * The plan was received but the device sensors could not be updated
 */
export class PublishError extends PlannerError {
  readonly kind = 'publish';
}

export function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}

/**
 * Normalize anything thrown into a PlannerError
 */
export function toPlannerError(error: unknown): PlannerError {
  if (error instanceof PlannerError) {
    return error;
  }
  return new UpstreamError(`Unexpected error: ${extractErrorMessage(error)}`);
}
