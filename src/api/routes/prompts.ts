import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ValidationController } from '../controllers/validationController';

export function registerPromptRoutes(
  fastify: FastifyInstance,
  controller: ValidationController,
  preHandler: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
) {
  // POST /api/prompts/reload - re-read prompt templates from disk
  fastify.post('/api/prompts/reload', { preHandler }, async (request, reply) => {
    await controller.reloadPrompts(request, reply);
  });
}
