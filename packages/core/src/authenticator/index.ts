export { Authenticator, LOGIN_METHOD } from './authenticator';
export type { AuthenticatorOptions, Identity } from './authenticator.types';
