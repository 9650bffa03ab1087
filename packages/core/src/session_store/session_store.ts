/**
 * SessionStore - Session credential persistence abstraction
 *
 * One credential per username, kept in a single shared record so that a user
 * does not have to type their password on every invocation.
 *
 * Implementations:
 * - FsSessionStore: owner-only JSON file in the home directory (production)
 * - MemorySessionStore: In-memory (tests, cacheSession: false)
 */

import type { SessionCredential, SessionCredentialData } from '../session_credential';
import type { SessionStoreRecord } from '../schemas';

/**
 * Interface for session credential persistence.
 *
 * Persistence is a convenience: neither method may fail the caller.
 * Read problems degrade to "no session", write problems are logged.
 */
export interface SessionStore {
  /**
   * Load the stored credential for a user.
   *
   * @returns The credential, or null if none is stored or the record is unreadable
   */
  load(username: string): Promise<SessionCredential | null>;

  /**
   * Store a user's credential, preserving every other user's entry.
   */
  save(username: string, credential: SessionCredential): Promise<void>;
}

/**
 * Own entry of `username` in a record. Usernames such as "constructor" or
 * "__proto__" never resolve to inherited properties.
 */
export function getRecordEntry(record: SessionStoreRecord, username: string): SessionCredentialData | null {
  return Object.hasOwn(record, username) ? record[username] ?? null : null;
}

/**
 * Copy of `record` with `username` set to `entry` as an own property.
 */
export function withRecordEntry(
  record: SessionStoreRecord,
  username: string,
  entry: SessionCredentialData
): SessionStoreRecord {
  return Object.fromEntries([...Object.entries(record), [username, entry]]);
}
