export { BaseClient } from './base_client';
export type { BaseClientOptions, SendRequestOptions, DispatchAttempt } from './base_client.types';
