/**
 * Shared HTTP types for the Authenticator and BaseClient.
 */

/**
 * The slice of a fetch Response the client reads.
 * A real `Response` satisfies it; tests hand in plain objects.
 */
export type HttpResponse = {
  status: number;
  statusText: string;
  ok: boolean;
  headers: {
    get(name: string): string | null;
    getSetCookie(): string[];
  };
  text(): Promise<string>;
};

/**
 * HTTP fetch function signature for dependency injection (testability).
 * Defaults to globalThis.fetch in production.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<HttpResponse>;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * A single request parameter value. Arrays repeat the key, objects are
 * sent JSON-encoded, null/undefined entries are dropped.
 */
export type RequestParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly (string | number | boolean)[]
  | JsonObject;

export type RequestParams = Record<string, RequestParamValue>;
