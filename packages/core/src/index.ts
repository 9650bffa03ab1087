export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Errors from "./errors";
export * as Http from "./http";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as SessionStore from "./session_store";

// Clients
export { BaseClient } from "./base_client";
export type { BaseClientOptions, SendRequestOptions } from "./base_client";
export { PackageDB, DEFAULT_PACKAGEDB_URL, COLLECTION_MAP, PACKAGE_ACLS } from "./package_db";
export type {
  PackageDBOptions,
  Collection,
  CollectionEntry,
  PackageEditOptions,
  SetCritpathOptions,
  PackageAcl,
} from "./package_db";
export { Authenticator } from "./authenticator";
export { SessionCredential } from "./session_credential";
export type { JsonObject, JsonValue } from "./http";
export type { SessionCookie, SessionCredentialData } from "./session_credential";

// Errors
export {
  ClientError,
  ServerError,
  AuthError,
  AppError,
  PackageDBError,
  errorMessage,
} from "./errors";

// Persistence and configuration
export { FsSessionStore, MemorySessionStore, DEFAULT_SESSION_FILE } from "./session_store";
export { FsConfigStore, MemoryConfigStore, DEFAULT_CONFIG_FILE } from "./config_store";
export { ConfigManager } from "./config_manager";
export type { ClientConfig, ConfigOverrides } from "./config_manager";
export { createLogger } from "./logger";

export { VERSION } from "./version";
