import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError, isAppError, toErrorBody, type ErrorCode } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

const logger = createChildLogger('error-handler');

function codeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 429:
      return 'TOO_MANY_REQUESTS';
    default:
      return 'VALIDATION_ERROR';
  }
}

/** Anything thrown on the way to a response is converted into the error envelope here. */
function toAppError(error: FastifyError): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return new AppError(
      'VALIDATION_ERROR',
      'Invalid input data',
      error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }

  // Fastify's own client errors: bad JSON, unsupported media type, body too large
  const { statusCode } = error;
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return new AppError(codeForStatus(statusCode), error.message, null, statusCode);
  }

  return new AppError('INTERNAL_ERROR', 'Internal server error');
}

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): FastifyReply {
  const appError = toAppError(error);

  if (appError.statusCode >= 500) {
    logger.error(
      { err: error, requestId: request.id, method: request.method, url: request.url },
      'Request failed'
    );
  } else {
    logger.debug({ code: appError.code, requestId: request.id }, appError.message);
  }

  return reply.status(appError.statusCode).send(toErrorBody(appError));
}

export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): FastifyReply {
  const appError = new AppError('NOT_FOUND', `Route ${request.method}:${request.url} not found`);
  return reply.status(404).send(toErrorBody(appError));
}
