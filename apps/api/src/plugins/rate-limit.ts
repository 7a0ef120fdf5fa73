import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@cad/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

/**
 * Fixed-window limiter keyed by the authenticated user, falling back to the
 * client address. State lives in process memory, so each API instance
 * enforces its own budget.
 */
export function createUserRateLimiter(opts: RateLimitOptions) {
  const buckets = new Map<string, RateLimitBucket>();
  const now = opts.now ?? Date.now;

  setInterval(() => {
    const current = now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= current) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const key = request.userId ? `user:${request.userId}` : `ip:${request.ip}`;
    const current = now();

    let bucket = buckets.get(key);
    if (!bucket || bucket.resetAt <= current) {
      bucket = { count: 0, resetAt: current + opts.windowMs };
      buckets.set(key, bucket);
    }

    bucket.count++;
    if (bucket.count > opts.maxRequests) {
      const retryAfterSeconds = Math.ceil((bucket.resetAt - current) / 1000);
      reply.header('retry-after', String(retryAfterSeconds));
      logger.warn({ requestId: request.id, userId: request.userId }, 'Rate limit exceeded');
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later', {
        retryAfterSeconds,
      });
    }
  };
}
