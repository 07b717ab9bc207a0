import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { getEnv } from './lib/env.js';
import { baseLoggerOptions, createLogger } from './lib/logger.js';
import { createLoggerAuditRepo, createLoggerEventEmitter } from './lib/audit.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { intakeRoutes } from './domains/intake/intake.routes.js';
import { orderRoutes } from './domains/order/order.routes.js';
import { lookupRoutes } from './domains/lookup/lookup.routes.js';
import { reportRoutes } from './domains/report/report.routes.js';
import type { IntakeServiceDeps } from './domains/intake/intake.service.js';
import type { OrderServiceDeps } from './domains/order/order.service.js';
import type { ReportServiceDeps } from './domains/report/report.service.js';
import {
  createOrderRepository,
  createTransactionRunner,
} from './domains/order/order.repository.js';
import { createReportRepository } from './domains/report/report.repository.js';
import {
  createMemoryGenerationQueue,
  createPgGenerationQueue,
  type GenerationQueue,
} from './domains/generation/generation.queue.js';

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export interface AppDeps {
  intake: IntakeServiceDeps;
  orders: OrderServiceDeps;
  reports: ReportServiceDeps;
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigin?: string;
  rateLimitMax?: number;
}

export async function buildApp(deps: AppDeps, opts: BuildAppOptions = {}) {
  const app = Fastify({
    logger: opts.logger ?? false,
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(helmet);
  await app.register(cors, {
    origin: opts.corsOrigin ?? 'http://localhost:3000',
  });
  await app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });
  await app.register(errorHandlerPluginFp);

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  await app.register(intakeRoutes, { deps: { serviceDeps: deps.intake } });
  await app.register(orderRoutes, { deps: { serviceDeps: deps.orders } });
  await app.register(lookupRoutes, { deps: { serviceDeps: { repo: deps.orders.repo } } });
  await app.register(reportRoutes, { deps: { serviceDeps: deps.reports } });

  return app;
}

// ---------------------------------------------------------------------------
// Start server when run directly
// ---------------------------------------------------------------------------

function isMain(): boolean {
  const entry = process.argv[1];
  return !!entry && path.resolve(entry) === fileURLToPath(import.meta.url);
}

async function main(): Promise<void> {
  const env = getEnv();
  const logger = createLogger({ name: 'api', level: env.LOG_LEVEL });

  const pool = new pg.Pool({ connectionString: env.DATABASE_URL });
  const db = drizzle(pool);

  if (env.QUEUE_DRIVER === 'memory') {
    // The in-process queue is not shared with a separate worker process.
    logger.warn('QUEUE_DRIVER=memory: messages are only visible to this process');
  }
  const queue: GenerationQueue =
    env.QUEUE_DRIVER === 'memory'
      ? createMemoryGenerationQueue({ visibilityTimeoutMs: env.QUEUE_VISIBILITY_TIMEOUT_MS })
      : createPgGenerationQueue(db, { visibilityTimeoutMs: env.QUEUE_VISIBILITY_TIMEOUT_MS });

  const auditRepo = createLoggerAuditRepo(logger);
  const events = createLoggerEventEmitter(logger);
  const repo = createOrderRepository(db);

  const app = await buildApp(
    {
      intake: {
        transactions: createTransactionRunner(db),
        queue,
        auditRepo,
        events,
        logger,
      },
      orders: {
        repo,
        queue,
        auditRepo,
        events,
        logger,
      },
      reports: {
        reports: createReportRepository(db),
        repo,
        auditRepo,
      },
    },
    {
      logger: baseLoggerOptions(env.LOG_LEVEL),
      corsOrigin: env.CORS_ORIGIN,
    },
  );

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    await pool.end();
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.API_PORT, host: env.API_HOST });
}

if (isMain()) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
