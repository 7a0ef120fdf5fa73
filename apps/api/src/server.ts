import Fastify from 'fastify';
import { createLogger, generateInviteCode, JoseTokenService, ObjectIdGenerator } from '@cad/shared';
import {
  CommunityService,
  type CommunityRepository,
  type InviteCodeRepository,
  type MembershipRepository,
  type UserRepository,
} from '@cad/domain';
import {
  withTransaction,
  PgCommunityRepository,
  PgInviteCodeRepository,
  PgMembershipRepository,
  PgUserRepository,
} from '@cad/db';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createUserRateLimiter } from './plugins/rate-limit';
import { registerCommunityRoutes } from './routes/communities';
import { registerInviteCodeRoutes } from './routes/invite-codes';
import { registerUserRoutes } from './routes/users';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  jwtActiveKid: string;
  jwtKeys: Array<{ kid: string; secret: string }>;
  jwtAccessTokenTtl: string;
  jwtIssuer: string;
  joinRateLimitPerMinute: number;
}

/** Storage seams; tests swap in process-local repositories. */
export interface ServerDeps {
  userRepo: UserRepository;
  communityRepo: CommunityRepository;
  membershipRepo: MembershipRepository;
  inviteCodeRepo: InviteCodeRepository;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
}

export async function buildServer(config: ServerConfig, overrides: Partial<ServerDeps> = {}) {
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
  });

  registerErrorHandler(app);

  const idGen = new ObjectIdGenerator();
  const tokenService = new JoseTokenService({
    activeKid: config.jwtActiveKid,
    keys: config.jwtKeys,
    accessTokenTtl: config.jwtAccessTokenTtl,
    issuer: config.jwtIssuer,
  });

  const communityService = new CommunityService({
    userRepo: overrides.userRepo ?? new PgUserRepository(),
    communityRepo: overrides.communityRepo ?? new PgCommunityRepository(),
    membershipRepo: overrides.membershipRepo ?? new PgMembershipRepository(),
    inviteCodeRepo: overrides.inviteCodeRepo ?? new PgInviteCodeRepository(),
    generateId: () => idGen.generate(),
    generateInviteCode: () => generateInviteCode(),
    withTransaction: overrides.withTransaction ?? withTransaction,
  });

  const authenticate = createAuthMiddleware(tokenService);
  const joinRateLimit = createUserRateLimiter({
    windowMs: 60_000,
    maxRequests: config.joinRateLimitPerMinute,
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerCommunityRoutes(app, { communityService, authenticate, joinRateLimit });
  registerInviteCodeRoutes(app, { communityService, authenticate });
  registerUserRoutes(app, { communityService, authenticate });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.routeOptions.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.routeOptions.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
