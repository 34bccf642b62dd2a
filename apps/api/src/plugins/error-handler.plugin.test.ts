import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { NoActiveRateError, NotFoundError } from '../lib/errors.js';
import { errorHandlerPluginFp } from './error-handler.plugin.js';

let app: FastifyInstance;

beforeAll(async () => {
  app = Fastify({ logger: false });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  await app.register(errorHandlerPluginFp);

  app.get('/not-found', async () => {
    throw new NotFoundError('Facility');
  });
  app.get('/no-rate', async () => {
    throw new NoActiveRateError('fac-1', 'MEDICAID', '2025-03-15');
  });
  app.post('/validated', {
    schema: { body: z.object({ los: z.number().int() }) },
    handler: async () => ({ ok: true }),
  });
  app.get('/too-large', async () => {
    throw Object.assign(new Error('Request body is too large'), {
      statusCode: 413,
      code: 'FST_ERR_CTP_BODY_TOO_LARGE',
    });
  });
  app.get('/boom', async () => {
    throw new Error('database password rejected');
  });

  await app.ready();
});

afterAll(async () => {
  await app.close();
});

describe('error handler plugin', () => {
  it('renders an AppError with its category', async () => {
    const res = await app.inject({ method: 'GET', url: '/not-found' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: 'NOT_FOUND', category: 'lookup', message: 'Facility not found' },
    });
  });

  it('renders a configuration error as 422 with details', async () => {
    const res = await app.inject({ method: 'GET', url: '/no-rate' });

    expect(res.statusCode).toBe(422);
    expect(res.json().error).toEqual({
      code: 'NO_ACTIVE_RATE',
      category: 'configuration',
      message: 'No active MEDICAID rate record for facility fac-1 on 2025-03-15',
      details: { facilityId: 'fac-1', payerType: 'MEDICAID', asOfDate: '2025-03-15' },
    });
  });

  it('renders schema validation failures as 400', async () => {
    const res = await app.inject({ method: 'POST', url: '/validated', payload: { los: 'ten' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
    expect(res.json().error.message).toBe('Validation failed');
  });

  it('passes other client errors through', async () => {
    const res = await app.inject({ method: 'GET', url: '/too-large' });

    expect(res.statusCode).toBe(413);
    expect(res.json().error).toEqual({
      code: 'FST_ERR_CTP_BODY_TOO_LARGE',
      category: 'validation',
      message: 'Request body is too large',
    });
  });

  it('hides unexpected errors', async () => {
    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
});
