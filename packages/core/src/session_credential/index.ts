export { SessionCredential, parseSetCookie } from './session_credential';
export type { SessionCookie, SessionCredentialData } from './session_credential.types';
