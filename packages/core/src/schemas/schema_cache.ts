import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import sessionRecordSchema from "./session_record.schema.json";
import clientConfigSchema from "./client_config.schema.json";
import type { SessionCredentialData } from "../session_credential/session_credential.types";
import type { ClientConfigFile } from "../config_manager/config_manager.types";

/**
 * Persisted session file layout: username -> credential.
 */
export type SessionStoreRecord = Record<string, SessionCredentialData>;

/**
 * Result of a schema check with AJV messages flattened for logging.
 */
export type SchemaCheck<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

/**
 * Singleton cache for compiled validators so each schema is compiled once.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object; its $id is the cache key
   */
  static getValidatorFromSchema<T>(schema: { $id: string }): ValidateFunction<T> {
    const cached = this.validators.get(schema.$id);
    if (cached) {
      return cached as ValidateFunction<T>;
    }
    const validator = this.getAjv().compile<T>(schema);
    this.validators.set(schema.$id, validator);
    return validator;
  }
}

function check<T>(validator: ValidateFunction<T>, data: unknown): SchemaCheck<T> {
  if (validator(data)) {
    return { valid: true, value: data };
  }
  const errors = (validator.errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`
  );
  return { valid: false, errors };
}

export function validateSessionRecord(data: unknown): SchemaCheck<SessionStoreRecord> {
  return check(
    SchemaValidationCache.getValidatorFromSchema<SessionStoreRecord>(sessionRecordSchema),
    data
  );
}

export function validateClientConfigFile(data: unknown): SchemaCheck<ClientConfigFile> {
  return check(
    SchemaValidationCache.getValidatorFromSchema<ClientConfigFile>(clientConfigSchema),
    data
  );
}
