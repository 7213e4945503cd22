import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { formatValidationErrors } from '../../errors';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}

export async function errorHandler(
  error: FastifyError | ApiError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  if (error instanceof ZodError) {
    reply.status(400).send({
      error: {
        message: `Invalid request:\n${formatValidationErrors(error)}`,
        code: 'VALIDATION_ERROR',
        statusCode: 400,
      },
    });
    return;
  }

  const statusCode = error.statusCode || 500;
  const message = error.message || 'Internal Server Error';

  request.log.error(error, 'Request error');

  reply.status(statusCode).send({
    error: {
      message,
      code: error.code || 'INTERNAL_ERROR',
      statusCode,
    },
  });
}
