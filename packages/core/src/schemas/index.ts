export {
  SchemaValidationCache,
  validateSessionRecord,
  validateClientConfigFile,
} from './schema_cache';
export type { SessionStoreRecord, SchemaCheck } from './schema_cache';
