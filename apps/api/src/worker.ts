import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { getEnv } from './lib/env.js';
import { createLogger } from './lib/logger.js';
import { createLoggerAuditRepo, createLoggerEventEmitter } from './lib/audit.js';
import { createOrderRepository } from './domains/order/order.repository.js';
import {
  createMemoryDeadLetterSink,
  createMemoryGenerationQueue,
  createPgDeadLetterSink,
  createPgGenerationQueue,
} from './domains/generation/generation.queue.js';
import { createRetryPolicy } from './domains/generation/generation.policy.js';
import { createCarePlanGenerator } from './domains/generation/generation.llm.js';
import {
  createWorkerPool,
  recoverPendingOrders,
} from './domains/generation/generation.worker.js';

// ---------------------------------------------------------------------------
// Generation worker process
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const env = getEnv();
  const logger = createLogger({ name: 'generation-worker', level: env.LOG_LEVEL });

  const pool = new pg.Pool({ connectionString: env.DATABASE_URL });
  const db = drizzle(pool);

  const memory = env.QUEUE_DRIVER === 'memory';
  const queue = memory
    ? createMemoryGenerationQueue({ visibilityTimeoutMs: env.QUEUE_VISIBILITY_TIMEOUT_MS })
    : createPgGenerationQueue(db, { visibilityTimeoutMs: env.QUEUE_VISIBILITY_TIMEOUT_MS });
  const deadLetters = memory ? createMemoryDeadLetterSink() : createPgDeadLetterSink(db);

  const deps = {
    repo: createOrderRepository(db),
    queue,
    policy: createRetryPolicy({ maxAttempts: env.GENERATION_MAX_ATTEMPTS, deadLetters }),
    generator: createCarePlanGenerator(env),
    auditRepo: createLoggerAuditRepo(logger),
    events: createLoggerEventEmitter(logger),
    logger,
    timeoutMs: env.LLM_TIMEOUT_MS,
  };

  logger.info(
    { provider: env.LLM_PROVIDER, model: deps.generator.model, queue: env.QUEUE_DRIVER },
    'Starting generation worker',
  );

  // Orders committed while no message was written (enqueue failure, crash)
  // are picked up here.
  await recoverPendingOrders(deps);

  const workers = createWorkerPool(deps, {
    concurrency: env.WORKER_CONCURRENCY,
    pollIntervalMs: env.QUEUE_POLL_INTERVAL_MS,
  });
  workers.start();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Stopping generation worker');
    await workers.stop();
    await pool.end();
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

const entry = process.argv[1];
if (entry && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
