/**
 * HTTP failures in the gateway error taxonomy
 */

import {
  ObjectNotFoundError,
  ProviderAccessDeniedError,
  ProviderNetworkError,
} from './errors.js';
import { HTTPError, isAbortError } from './http-client.js';

/**
 * Map an HTTPClient failure onto a provider-local gateway error.
 * Aborts pass through unchanged so the caller can tell cancellation apart.
 *
 * @param location - host or service name reported in ObjectNotFound
 * @param resource - URL path or product id reported in ObjectNotFound
 */
export function classifyHttpError(error: unknown, location: string, resource: string): unknown {
  if (isAbortError(error)) {
    return error;
  }
  if (error instanceof HTTPError) {
    if (error.statusCode === 404) {
      return new ObjectNotFoundError(location, resource);
    }
    if (error.statusCode === 401 || error.statusCode === 403) {
      return new ProviderAccessDeniedError(error.url, error);
    }
  }
  return new ProviderNetworkError(`${location}/${resource}`, error);
}
