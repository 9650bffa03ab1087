export {
  ClientError,
  ServerError,
  AuthError,
  AppError,
  PackageDBError,
  errorMessage,
} from './client.errors';
export type { ClientErrorCode, ServerErrorCode, AuthErrorCode } from './client.errors';
