import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@cad/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Malformed JSON bodies and schema failures raised by Fastify itself.
    if (error.validation || error.statusCode === 400) {
      logger.warn({ code: ErrorCode.VALIDATION, fastifyCode: error.code, requestId: request.id }, error.message);
      return reply.status(400).send({
        code: ErrorCode.VALIDATION,
        message: 'Invalid request',
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: ErrorCode.NOT_FOUND,
      message: `Route ${request.method} ${request.url} not found`,
    });
  });
}
