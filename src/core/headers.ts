import { mergeHeaderOptions } from '../fetch/utils.js';
import type { HeaderOptions } from '../types/request.js';

/** The parts of the client configuration that end up in request headers. */
export interface HeaderConfig {
  organisation: string;
  userType: string;
  apiKey?: string | null;
  regionId?: string | null;
  locationId?: string | null;
  customHeaders?: HeaderOptions;
}

/**
 * Builds the headers for one request. Sources are applied lowest to highest:
 * built-in defaults, API key, region and location, custom headers from the
 * client configuration, then per-call overrides.
 *
 * Keys compare case-insensitively, and a `null` in custom headers or overrides
 * removes the header altogether.
 */
export function buildHeaders(config: HeaderConfig, overrides?: HeaderOptions): Headers {
  return mergeHeaderOptions(
    {
      organisation: config.organisation,
      usertype: config.userType,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    { 'x-api-key': config.apiKey || undefined },
    { region: config.regionId || undefined, location: config.locationId || undefined },
    config.customHeaders,
    overrides,
  );
}
