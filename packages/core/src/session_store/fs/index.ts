export { FsSessionStore, DEFAULT_SESSION_FILE } from './fs_session_store';
export type { FsSessionStoreOptions } from './fs_session_store';
