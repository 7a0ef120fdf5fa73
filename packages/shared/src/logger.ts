import pino from 'pino';

const PII_PATTERNS = new Set([
  'password',
  'token',
  'accesstoken',
  'secret',
  'email',
  'ip',
  'ipaddress',
  'remoteaddress',
  'authorization',
  'cookie',
  'invitecode',
  'body',
]);

function isPiiKey(key: string): boolean {
  return PII_PATTERNS.has(key.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function redact(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPiiKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redact(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? redact(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(redact(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(redact(meta), msg);
    },
    error(meta, msg) {
      logger.error(redact(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(redact(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(redact(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(redact(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
