export { createLogger, redact, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  ApiConfigSchema,
} from './config';
export { ObjectIdGenerator } from './id';
export { generateInviteCode, INVITE_CODE_ALPHABET, DEFAULT_INVITE_CODE_LENGTH } from './invite-code';
export { JoseTokenService } from './auth/token-service';
export { type TokenService } from '@cad/domain';
