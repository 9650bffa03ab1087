import { ServerError } from '../errors';
import type { JsonObject, JsonValue, RequestParams } from './http.types';

/**
 * Ensures the base URL ends with a slash so that relative method paths are
 * appended rather than replacing the last segment.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}

/**
 * Builds `<baseUrl><method>?<formatParam>=json`, stripping leading slashes
 * from the method path.
 */
export function buildMethodUrl(baseUrl: string, method: string, formatParam: string): string {
  const url = new URL(method.replace(/^\/+/, ''), normalizeBaseUrl(baseUrl));
  url.searchParams.set(formatParam, 'json');
  return url.toString();
}

/**
 * Form-encodes request parameters.
 */
export function encodeParams(params: RequestParams): URLSearchParams {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        body.append(key, String(item));
      }
    } else if (typeof value === 'object') {
      body.append(key, JSON.stringify(value));
    } else {
      body.append(key, String(value));
    }
  }
  return body;
}

export function hasParams(params: RequestParams | undefined): params is RequestParams {
  return params !== undefined && Object.keys(params).length > 0;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes a response body that must be a JSON object.
 * @throws ServerError when the body is not JSON (e.g. an HTML error page)
 */
export function parseJsonObject(body: string): JsonObject {
  let data: JsonValue;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new ServerError(
      error instanceof Error ? error.message : String(error),
      'INVALID_RESPONSE'
    );
  }
  if (!isJsonObject(data)) {
    throw new ServerError('Server response is not a JSON object', 'INVALID_RESPONSE');
  }
  return data;
}
