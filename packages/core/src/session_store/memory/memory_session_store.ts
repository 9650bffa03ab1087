/**
 * MemorySessionStore - In-memory implementation of SessionStore
 *
 * Used by tests and by clients created with `cacheSession: false`, where
 * nothing should touch the filesystem.
 */

import type { SessionStore } from '../session_store';
import { getRecordEntry, withRecordEntry } from '../session_store';
import { SessionCredential } from '../../session_credential';
import type { SessionStoreRecord } from '../../schemas';

/**
 * In-memory SessionStore. Stores the serialized form so that loaded
 * credentials never alias the saved instances.
 *
 * @example
 * ```typescript
 * const store = new MemorySessionStore();
 * store.setRecord({ alice: { cookies: [{ name: 'tg-visit', value: 'abc', attributes: {} }] } });
 * const client = new BaseClient({ baseUrl, username: 'alice', sessionStore: store });
 * ```
 */
export class MemorySessionStore implements SessionStore {
  private record: SessionStoreRecord = {};

  async load(username: string): Promise<SessionCredential | null> {
    const entry = getRecordEntry(this.record, username);
    return entry ? SessionCredential.fromJSON(entry) : null;
  }

  async save(username: string, credential: SessionCredential): Promise<void> {
    this.record = withRecordEntry(this.record, username, credential.toJSON());
  }

  // ==================== Test Helper Methods ====================

  /**
   * Replace the whole record (for test setup)
   */
  setRecord(record: SessionStoreRecord): void {
    this.record = structuredClone(record);
  }

  /**
   * Get a copy of the current record (for test assertions)
   */
  getRecord(): SessionStoreRecord {
    return structuredClone(this.record);
  }

  /**
   * Clear all stored sessions
   */
  clear(): void {
    this.record = {};
  }
}
