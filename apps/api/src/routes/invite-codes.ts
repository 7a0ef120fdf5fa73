import { type FastifyInstance } from 'fastify';
import { type CommunityService } from '@cad/domain';
import { CommunityParamsSchema, CreateInviteCodeRequestSchema, ObjectIdSchema } from '@cad/proto';
import { requireUserId, type createAuthMiddleware } from '../plugins/auth';
import { mapDomainError, parseOrThrow, toInviteCodeResponse } from './helpers';

interface InviteCodeRouteDeps {
  communityService: CommunityService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerInviteCodeRoutes(app: FastifyInstance, deps: InviteCodeRouteDeps): void {
  const { communityService, authenticate } = deps;

  app.post<{ Params: { communityId: string } }>(
    '/communities/:communityId/invite-codes',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const actorId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');
      const body = parseOrThrow(CreateInviteCodeRequestSchema, request.body ?? {}, 'Invalid invite data');

      try {
        const invite = await communityService.createInviteCode(actorId, communityId, body);
        return reply.status(201).send(toInviteCodeResponse(invite));
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );

  app.get<{ Params: { communityId: string } }>(
    '/communities/:communityId/invite-codes',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const actorId = requireUserId(request);
      const { communityId } = parseOrThrow(CommunityParamsSchema, request.params, 'Invalid community id');

      try {
        const invites = await communityService.listInviteCodes(actorId, communityId);
        return reply.status(200).send(invites.map(toInviteCodeResponse));
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );

  // Public: lets a prospective member preview a code before signing in.
  app.get<{ Params: { code: string } }>('/invite-codes/:code', async (request, reply) => {
    try {
      const invite = await communityService.getInviteCode(request.params.code);
      return reply.status(200).send(toInviteCodeResponse(invite));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete<{ Params: { inviteCodeId: string } }>(
    '/invite-codes/:inviteCodeId',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const actorId = requireUserId(request);
      const inviteCodeId = parseOrThrow(ObjectIdSchema, request.params.inviteCodeId, 'Invalid invite code id');

      try {
        await communityService.deleteInviteCode(actorId, inviteCodeId);
        return reply.status(204).send();
      } catch (err) {
        return mapDomainError(err);
      }
    },
  );
}
