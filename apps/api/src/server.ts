import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { getEnv, type Env } from './lib/env.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { admissionRoutes } from './domains/admission/routes/admission.routes.js';
import { createConfigRepository } from './domains/admission/repos/config.repo.js';
import { createEvaluationRepository } from './domains/admission/repos/evaluation.repo.js';
import { loadPdpmTables } from './domains/admission/services/pdpm-tables.service.js';

export interface BuildAppOptions {
  env: Env;
  db: NodePgDatabase;
  fastify?: FastifyServerOptions;
}

export async function buildApp(opts: BuildAppOptions) {
  const { env, db } = opts;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    genReqId: () => randomUUID(),
    ...opts.fastify,
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  await app.register(helmet);
  await app.register(cors, { origin: env.CORS_ORIGIN });
  await app.register(rateLimitPluginFp, { defaultMax: env.RATE_LIMIT_MAX });
  await app.register(errorHandlerPluginFp);

  // Tables are validated at start-up so a bad file fails fast
  const tables = loadPdpmTables(env.PDPM_TABLES_VERSION);

  await app.register(admissionRoutes, {
    deps: {
      service: {
        configRepo: createConfigRepository(db),
        evaluationRepo: createEvaluationRepository(db),
        tables,
        maxLosDays: env.MAX_LOS_DAYS,
        logger: app.log,
      },
    },
  });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  return app;
}

// Start server when run directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const env = getEnv();
  const pool = new pg.Pool({ connectionString: env.DATABASE_URL });
  const db = drizzle(pool);

  buildApp({ env, db })
    .then((app) =>
      app.listen({ port: env.API_PORT, host: env.API_HOST }).then(() => {
        const shutdown = () => {
          app
            .close()
            .then(() => pool.end())
            .then(() => process.exit(0))
            .catch((err: unknown) => {
              app.log.error({ err }, 'Shutdown failed');
              process.exit(1);
            });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      }),
    )
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
