import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ValidationController } from '../controllers/validationController';

export function registerValidationRoutes(
  fastify: FastifyInstance,
  controller: ValidationController,
  preHandler: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
) {
  // POST /api/validations - validate one document
  fastify.post('/api/validations', { preHandler }, async (request, reply) => {
    await controller.validate(request, reply);
  });
}
