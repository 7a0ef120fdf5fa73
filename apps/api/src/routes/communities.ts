import { type FastifyInstance } from 'fastify';
import { createLogger } from '@cad/shared';
import { type CommunityService } from '@cad/domain';
import {
  AddMemberRequestSchema,
  BanUserRequestSchema,
  CommunityParamsSchema,
  JoinCommunityRequestSchema,
  ObjectIdSchema,
} from '@cad/proto';
import { requireUserId, type createAuthMiddleware } from '../plugins/auth';
import { type createUserRateLimiter } from '../plugins/rate-limit';
import { mapDomainError, parseOrThrow } from './helpers';

const logger = createLogger({ name: 'api:communities' });

interface CommunityRouteDeps {
  communityService: CommunityService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  joinRateLimit: ReturnType<typeof createUserRateLimiter>;
}

export function registerCommunityRoutes(app: FastifyInstance, deps: CommunityRouteDeps): void {
  const { communityService, authenticate, joinRateLimit } = deps;

  app.post('/communities/join', { preHandler: [authenticate, joinRateLimit] }, async (request, reply) => {
    const userId = requireUserId(request);
    const { inviteCode } = parseOrThrow(JoinCommunityRequestSchema, request.body, 'Invalid join request');

    try {
      const result = await communityService.joinCommunity(userId, inviteCode);
      logger.info({ userId, communityId: result.communityId }, 'User joined community');
      return reply.status(200).send(result);
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post<{ Params: { communityId: string } }>(
    '/communities/:communityId/bans',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const actorId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');
      const { userId } = parseOrThrow(BanUserRequestSchema, request.body, 'Invalid ban request');

      try {
        await communityService.banUser(actorId, communityId, userId);
        logger.info({ actorId, communityId, userId }, 'User banned from community');
        return reply.status(204).send();
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );

  app.delete<{ Params: { communityId: string; userId: string } }>(
    '/communities/:communityId/bans/:userId',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const actorId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');
      const userId = parseOrThrow(ObjectIdSchema, request.params.userId, 'Invalid user id');

      try {
        await communityService.unbanUser(actorId, communityId, userId);
        logger.info({ actorId, communityId, userId }, 'User unbanned from community');
        return reply.status(204).send();
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );

  app.post<{ Params: { communityId: string } }>(
    '/communities/:communityId/members',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const actorId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');
      const { userId, status } = parseOrThrow(AddMemberRequestSchema, request.body, 'Invalid member data');

      try {
        const change = await communityService.addCommunityToUser(actorId, userId, communityId, status);
        return reply.status(200).send(change);
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );

  app.post<{ Params: { communityId: string } }>(
    '/communities/:communityId/requests',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const userId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');

      try {
        const change = await communityService.requestToJoin(userId, communityId);
        return reply.status(200).send(change);
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );

  app.delete<{ Params: { communityId: string } }>(
    '/communities/:communityId/members/me',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const userId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');

      try {
        await communityService.leaveCommunity(userId, communityId);
        logger.info({ userId, communityId }, 'User left community');
        return reply.status(204).send();
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );
}
