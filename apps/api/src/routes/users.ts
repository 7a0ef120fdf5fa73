import { type FastifyInstance } from 'fastify';
import { type CommunityService } from '@cad/domain';
import { requireUserId, type createAuthMiddleware } from '../plugins/auth';
import { toMembershipResponse } from './helpers';

interface UserRouteDeps {
  communityService: CommunityService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { communityService, authenticate } = deps;

  app.get('/users/me/communities', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);
    const records = await communityService.listUserCommunities(userId);
    return reply.status(200).send(records.map(toMembershipResponse));
  });
}
