import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';
import { RateLimitError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Rate limit tiers:
//   Default:                    100 req/min per IP
//   Evaluate / recalculate:     30 req/min per IP
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
    // Thrown by the plugin, so the error handler renders the 429 envelope
    errorResponseBuilder: (_request, context) =>
      new RateLimitError(Math.ceil(context.ttl / 1000)),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * Pipeline endpoints: 30 req/min per IP.
 * Use as route-level config: { config: { rateLimit: evaluationRateLimit() } }
 */
export function evaluationRateLimit() {
  return {
    max: 30,
    timeWindow: '1 minute',
    keyGenerator: (request: FastifyRequest) => request.ip,
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});

export { rateLimitPlugin };
