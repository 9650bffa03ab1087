/**
 * SessionStore - Session credential persistence
 *
 * @example
 * ```typescript
 * import { FsSessionStore, MemorySessionStore } from '@pkgdb-client/core';
 *
 * const store = new FsSessionStore({ sessionFile: '/home/alice/.pkgdb_session.json' });
 * const credential = await store.load('alice');
 * ```
 */
export type { SessionStore } from './session_store';
export { FsSessionStore, DEFAULT_SESSION_FILE } from './fs';
export type { FsSessionStoreOptions } from './fs';
export { MemorySessionStore } from './memory';
