import { buildServer } from './server';
import { loadConfig, ApiConfigSchema, createLogger } from '@cad/shared';
import { initPool, closePool } from '@cad/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({
    connectionString: config.DATABASE_URL,
    max: config.DB_POOL_MAX,
    statementTimeoutMs: config.DB_QUERY_TIMEOUT_MS,
  });

  const app = await buildServer({
    jwtActiveKid: config.JWT_ACTIVE_KID,
    jwtKeys: config.JWT_KEYS,
    jwtAccessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
    jwtIssuer: config.JWT_ISSUER,
    joinRateLimitPerMinute: config.JOIN_RATE_LIMIT_PER_MINUTE,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
