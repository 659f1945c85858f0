/**
 * Pairing validation
 *
 * Checks user-entered credentials against the planner once and maps every
 * failure to a pairing error code the pair view can show.
 */
import type { Credentials } from '../plannerApi/types';
import { PlannerError } from '../plannerApi/errors';
import { validateApiToken } from '../plannerApi/apiClient';
import { entryIdForSystem, parsePlannerSettings } from './plannerSettings';
import { extractErrorMessage } from '../utils/errorUtils';

export type PairingErrorCode = 'invalid_input' | 'cannot_connect' | 'invalid_auth' | 'unknown';

export const PAIRING_ERROR_MESSAGES: Record<PairingErrorCode, string> = {
  invalid_input: 'System ID and API token are required',
  cannot_connect: 'Cannot connect to the battery planner',
  invalid_auth: 'The battery planner rejected the API token',
  unknown: 'Unexpected error while contacting the battery planner',
};

export interface PairingSuccess {
  ok: true;
  entryId: string;
  title: string;
  credentials: Credentials;
}

export interface PairingFailure {
  ok: false;
  code: PairingErrorCode;
  message: string;
  detail: string;
}

export type PairingResult = PairingSuccess | PairingFailure;

export type TokenValidator = (baseUrl: string, apiToken: string) => Promise<void>;

export function pairingErrorCode(error: unknown): PairingErrorCode {
  if (!(error instanceof PlannerError)) {
    return 'unknown';
  }
  switch (error.kind) {
    case 'configuration':
      return 'invalid_input';
    case 'connectivity':
      return 'cannot_connect';
    case 'auth':
      return 'invalid_auth';
    case 'upstream':
    case 'publish':
    default:
      return 'unknown';
  }
}

function toFailure(error: unknown): PairingFailure {
  const code = pairingErrorCode(error);
  const detail = extractErrorMessage(error);
  const message = code === 'invalid_input'
    ? `${PAIRING_ERROR_MESSAGES.invalid_input} (${detail})`
    : PAIRING_ERROR_MESSAGES[code];
  return { ok: false, code, message, detail };
}

/**
 * Check stored credentials against the planner once
 * @returns the failure, or undefined when the token was accepted
 */
export async function checkCredentials(
  credentials: Credentials,
  validate: TokenValidator = validateApiToken,
): Promise<PairingFailure | undefined> {
  try {
    await validate(credentials.baseUrl, credentials.apiToken);
    return undefined;
  } catch (error: unknown) {
    return toFailure(error);
  }
}

/**
 * Validate pairing or reconfiguration input. Nothing is retried.
 */
export async function validatePairingInput(
  input: unknown,
  validate: TokenValidator = validateApiToken,
): Promise<PairingResult> {
  try {
    const credentials = parsePlannerSettings(input);
    const failure = await checkCredentials(credentials, validate);
    if (failure) {
      return failure;
    }

    return {
      ok: true,
      entryId: entryIdForSystem(credentials.systemId),
      title: `Battery System ${credentials.systemId}`,
      credentials,
    };
  } catch (error: unknown) {
    return toFailure(error);
  }
}
