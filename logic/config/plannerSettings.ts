/**
 * Planner settings
 * Validates pairing input and device settings into Credentials
 */
import { z } from 'zod';
import type { Credentials } from '../plannerApi/types';
import { ConfigurationError } from '../plannerApi/errors';
import { formatZodIssues } from '../plannerApi/schemas';
import { DEFAULT_BASE_URL } from '../plannerApi/apiClient';

const ENTRY_ID_PREFIX = 'battery-planner-';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

export const plannerSettingsSchema = z.object({
  system_id: z.string().trim().min(1, 'is required'),
  api_token: z.string().trim().min(1, 'is required'),
  base_url: z.preprocess(
    (value) => (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')
      ? DEFAULT_BASE_URL
      : value),
    z.string()
      .trim()
      .refine(isHttpUrl, 'must be an http(s) URL')
      .transform((value) => value.replace(/\/+$/, '')),
  ),
});

/**
 * @throws ConfigurationError listing every invalid field
 */
export function parsePlannerSettings(raw: unknown): Credentials {
  const parsed = plannerSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(formatZodIssues(parsed.error));
  }

  return {
    systemId: parsed.data.system_id,
    apiToken: parsed.data.api_token,
    baseUrl: parsed.data.base_url,
  };
}

/**
 * Settings as stored on the Homey device
 */
export function toDeviceSettings(credentials: Credentials): Record<string, string> {
  return {
    system_id: credentials.systemId,
    api_token: credentials.apiToken,
    base_url: credentials.baseUrl,
  };
}

export const SYSTEM_ID_LOCKED_MESSAGE =
  'The system ID cannot be changed. Remove this device and pair the other system instead.';

function settingText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * The device id is derived from the system id, so a device stays bound to its system
 */
export function systemIdChanged(
  oldSettings: Record<string, unknown>,
  newSettings: Record<string, unknown>,
): boolean {
  return settingText(oldSettings.system_id) !== settingText(newSettings.system_id);
}

/**
 * One entry per system: the id is derived from the system id
 */
export function entryIdForSystem(systemId: string): string {
  return `${ENTRY_ID_PREFIX}${systemId}`;
}

const deviceDataSchema = z.object({ id: z.string().min(1) });

/**
 * Read the entry id from Homey device data ({ id })
 */
export function entryIdFromDeviceData(data: unknown): string | undefined {
  const parsed = deviceDataSchema.safeParse(data);
  return parsed.success ? parsed.data.id : undefined;
}
