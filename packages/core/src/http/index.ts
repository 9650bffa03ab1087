export {
  normalizeBaseUrl,
  buildMethodUrl,
  encodeParams,
  hasParams,
  isJsonObject,
  parseJsonObject,
} from './request_encoding';
export type {
  FetchFn,
  HttpResponse,
  JsonPrimitive,
  JsonValue,
  JsonObject,
  RequestParamValue,
  RequestParams,
} from './http.types';
