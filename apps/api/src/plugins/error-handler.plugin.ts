import { type FastifyError, type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import {
  AppError,
  DuplicateBlockedError,
  DuplicateWarningError,
  ValidationError,
  fieldErrorsFromZod,
  type FieldError,
} from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Field error helpers
// ---------------------------------------------------------------------------

function fieldErrorsFromValidation(error: FastifyError): FieldError[] {
  const context = error.validationContext ?? 'body';
  return (error.validation ?? []).map((item) => {
    const path = item.instancePath.replace(/^\//, '').replace(/\//g, '.');
    return {
      field: path ? `${context}.${path}` : context,
      message: item.message ?? 'Invalid value',
    };
  });
}

// ---------------------------------------------------------------------------
// Error handler
// ---------------------------------------------------------------------------

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof DuplicateWarningError) {
      return reply.code(409).send({
        type: 'warning',
        error: { code: error.code, message: error.message },
        warnings: error.warnings,
        notices: error.notices,
      });
    }

    if (error instanceof DuplicateBlockedError) {
      return reply.code(409).send({
        type: 'error',
        error: { code: error.code, message: error.message },
        errors: error.errors,
        notices: error.notices,
      });
    }

    if (error instanceof ValidationError) {
      return reply.code(400).send({
        type: 'error',
        error: { code: error.code, message: error.message },
        errors: error.errors,
      });
    }

    if (error instanceof AppError) {
      return reply.code(error.statusCode).send({
        type: 'error',
        error: { code: error.code, message: error.message },
      });
    }

    if (error instanceof ZodError) {
      return reply.code(400).send({
        type: 'error',
        error: { code: 'VALIDATION_ERROR', message: 'Validation failed' },
        errors: fieldErrorsFromZod(error),
      });
    }

    if (error.validation) {
      return reply.code(400).send({
        type: 'error',
        error: { code: 'VALIDATION_ERROR', message: 'Validation failed' },
        errors: fieldErrorsFromValidation(error),
      });
    }

    const statusCode = error.statusCode ?? 500;

    if (statusCode === 429) {
      return reply.code(429).send({
        type: 'error',
        error: { code: 'RATE_LIMITED', message: 'Rate limit exceeded' },
      });
    }

    // Framework 4xx (malformed JSON, unsupported media type, body too large)
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        type: 'error',
        error: { code: error.code ?? 'BAD_REQUEST', message: error.message },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      type: 'error',
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({
      type: 'error',
      error: { code: 'NOT_FOUND', message: 'Route not found' },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});

export { errorHandlerPlugin };
