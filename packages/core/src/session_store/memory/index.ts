export { MemorySessionStore } from './memory_session_store';
