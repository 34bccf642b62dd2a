import { type FastifyInstance, type FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import { ErrorCategory } from '@snfadmit/shared/constants/admission.constants.js';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error envelope: { error: { code, category, message, details } }
//   AppError           -> its own status, code and category
//   schema validation  -> 400 VALIDATION_ERROR
//   anything else      -> 500 INTERNAL_ERROR (logged, message hidden)
// ---------------------------------------------------------------------------

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          category: error.category,
          message: error.message,
          details: error.details,
        },
      });
    }

    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          category: ErrorCategory.VALIDATION,
          message: 'Validation failed',
          details: error.validation,
        },
      });
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          category: ErrorCategory.VALIDATION,
          message: error.message,
        },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});

export { errorHandlerPlugin };
