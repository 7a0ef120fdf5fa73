import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  DB_QUERY_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
});

const JwtKeysSchema = z
  .array(z.object({ kid: z.string().min(1), secret: z.string().min(32) }))
  .min(1, 'At least one JWT key is required');

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(JwtKeysSchema),
  JWT_ISSUER: z.string().default('dispatch-cad'),
  JWT_ACCESS_TOKEN_TTL: z.string().regex(/^\d+$/, 'JWT_ACCESS_TOKEN_TTL must be a number of seconds').default('900'),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(JwtConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    JOIN_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(10),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
