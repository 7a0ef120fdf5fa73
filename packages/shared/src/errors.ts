export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  INVALID_INVITE = 'INVALID_INVITE',
  EXPIRED_INVITE = 'EXPIRED_INVITE',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.STORE_UNAVAILABLE]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.INVALID_INVITE]: 400,
  [ErrorCode.EXPIRED_INVITE]: 400,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.CONFLICT]: 409,
};

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.safeMeta = safeMeta;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}
