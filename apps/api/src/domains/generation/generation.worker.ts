// ============================================================================
// Care plan generation worker
// Pulls id-only messages, claims the order, calls the generator and writes
// the terminal result back. Safe to run in several processes against one
// queue: every status write is conditional on the order's job_id.
// ============================================================================

import {
  GENERATION_FAILURE_MESSAGES,
  GENERATION_TIMEOUT_MS,
  GenerationFailureCategory,
  OrderAuditAction,
  QUEUE_POLL_INTERVAL_MS,
  REQUIRED_CARE_PLAN_SECTIONS,
  WORKER_CONCURRENCY,
} from '@careplan/shared/constants/order.constants.js';
import { maskIdentifier } from '@careplan/shared/utils/identifier.utils.js';
import type { OrderRepository } from '../order/order.repository.js';
import type { AuditRepo, EventEmitter } from '../../lib/audit.js';
import type { Logger } from '../../lib/logger.js';
import {
  GenerationError,
  GenerationPermanentError,
  GenerationTransientError,
} from '../../lib/errors.js';
import type { GenerationQueue, QueueMessage } from './generation.queue.js';
import type { RetryPolicy } from './generation.policy.js';
import type { CarePlanGenerator, ChatMessage, GenerationResult } from './generation.llm.js';
import { buildCarePlanMessages } from './generation.prompt.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface GenerationWorkerDeps {
  repo: OrderRepository;
  queue: GenerationQueue;
  policy: RetryPolicy;
  generator: CarePlanGenerator;
  auditRepo: AuditRepo;
  events: EventEmitter;
  logger: Logger;
  /** Bound on a single generator call. */
  timeoutMs?: number;
}

export type ProcessOutcome =
  | 'completed'
  | 'failed'
  | 'retried'
  | 'dead_lettered'
  | 'stale'
  | 'missing';

const AUDIT_CATEGORY = 'generation';

// ---------------------------------------------------------------------------
// Result checks
// ---------------------------------------------------------------------------

/** Labels of required sections absent from `content`. */
export function missingSections(content: string): string[] {
  return REQUIRED_CARE_PLAN_SECTIONS.filter((section) => !section.pattern.test(content)).map(
    (section) => section.label,
  );
}

function assertCompletePlan(result: GenerationResult): void {
  if (result.content.trim().length === 0) {
    throw new GenerationPermanentError(GenerationFailureCategory.MALFORMED_RESULT, 'empty content');
  }
  const missing = missingSections(result.content);
  if (missing.length > 0) {
    throw new GenerationPermanentError(
      GenerationFailureCategory.MALFORMED_RESULT,
      `missing sections: ${missing.join(', ')}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Generator call with a bounded timeout
// ---------------------------------------------------------------------------

export async function generateWithTimeout(
  generator: CarePlanGenerator,
  messages: ChatMessage[],
  timeoutMs: number,
): Promise<GenerationResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    // Reject before aborting so the race settles on the timeout.
    timer = setTimeout(() => {
      reject(new GenerationTransientError(GenerationFailureCategory.TIMEOUT));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      generator.generate(messages, { signal: controller.signal }),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/** Anything that is not already a GenerationError is retried. */
function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) {
    return err;
  }
  return new GenerationTransientError(
    GenerationFailureCategory.UPSTREAM_UNAVAILABLE,
    err instanceof Error ? err.message : 'unknown error',
  );
}

// ---------------------------------------------------------------------------
// Failure recording
// ---------------------------------------------------------------------------

async function recordPermanentFailure(
  deps: GenerationWorkerDeps,
  message: QueueMessage,
  category: GenerationFailureCategory,
): Promise<void> {
  await deps.auditRepo.appendAuditLog({
    action: OrderAuditAction.GENERATION_FAILED,
    category: AUDIT_CATEGORY,
    resourceType: 'order',
    resourceId: message.orderId,
    detail: { category, attempt: message.attempt, jobId: message.messageId },
  });
  deps.events.emit(OrderAuditAction.GENERATION_FAILED, {
    orderId: message.orderId,
    category,
  });
}

/**
 * Dead-letter the message and fail the order. The failure is recorded only
 * if this call made the FAIL transition.
 */
async function deadLetterAndFail(
  deps: GenerationWorkerDeps,
  message: QueueMessage,
  reason: GenerationFailureCategory,
): Promise<ProcessOutcome> {
  await deps.policy.deadLetters.deadLetter({
    messageId: message.messageId,
    orderId: message.orderId,
    attempt: message.attempt,
    reason,
  });

  const failed = await deps.repo.failOrder(
    message.orderId,
    message.messageId,
    GENERATION_FAILURE_MESSAGES[GenerationFailureCategory.ATTEMPTS_EXHAUSTED],
  );
  if (failed) {
    await recordPermanentFailure(deps, message, GenerationFailureCategory.ATTEMPTS_EXHAUSTED);
  }
  await message.ack();
  return 'dead_lettered';
}

// ---------------------------------------------------------------------------
// Process one message
// ---------------------------------------------------------------------------

export async function processMessage(
  deps: GenerationWorkerDeps,
  message: QueueMessage,
): Promise<ProcessOutcome> {
  const log = deps.logger.child({
    orderId: message.orderId,
    messageId: message.messageId,
    attempt: message.attempt,
  });

  if (message.attempt > deps.policy.maxAttempts) {
    log.warn('Delivery count exceeded, dead-lettering');
    return deadLetterAndFail(deps, message, GenerationFailureCategory.ATTEMPTS_EXHAUSTED);
  }

  const detail = await deps.repo.findOrderDetail(message.orderId);
  if (!detail) {
    log.warn('Order not found, dropping message');
    await message.ack();
    return 'missing';
  }

  const claimed = await deps.repo.claimOrder(message.orderId, message.messageId);
  if (!claimed) {
    log.info({ status: detail.order.status }, 'Order not claimable, dropping stale message');
    await message.ack();
    return 'stale';
  }

  log.info(
    { mrn: maskIdentifier(detail.patient.mrn), npi: maskIdentifier(detail.provider.npi) },
    'Generating care plan',
  );

  const startedAt = Date.now();
  try {
    const result = await generateWithTimeout(
      deps.generator,
      buildCarePlanMessages(detail),
      deps.timeoutMs ?? GENERATION_TIMEOUT_MS,
    );
    assertCompletePlan(result);

    const generationTimeMs = Date.now() - startedAt;
    const completed = await deps.repo.completeOrder(message.orderId, message.messageId, {
      content: result.content,
      model: result.model,
      promptTokens: result.promptTokens,
      completionTokens: result.completionTokens,
      generationTimeMs,
      generatedAt: new Date(),
    });
    await message.ack();

    if (!completed) {
      log.info('Order changed owner during generation, result discarded');
      return 'stale';
    }

    await deps.auditRepo.appendAuditLog({
      action: OrderAuditAction.GENERATION_COMPLETED,
      category: AUDIT_CATEGORY,
      resourceType: 'order',
      resourceId: message.orderId,
      detail: { model: result.model, generationTimeMs, attempt: message.attempt },
    });
    deps.events.emit(OrderAuditAction.GENERATION_COMPLETED, { orderId: message.orderId });
    log.info({ generationTimeMs }, 'Care plan generated');
    return 'completed';
  } catch (err) {
    const failure = toGenerationError(err);

    if (failure.retryable) {
      if (deps.policy.isExhausted(message.attempt)) {
        log.warn({ category: failure.category }, 'Transient failure on last attempt, dead-lettering');
        return deadLetterAndFail(deps, message, failure.category);
      }
      const delayMs = deps.policy.backoffMs(message.attempt);
      log.warn({ category: failure.category, delayMs, detail: failure.message }, 'Transient failure, retrying');
      await message.nack(delayMs);
      return 'retried';
    }

    log.error({ category: failure.category, detail: failure.message }, 'Permanent generation failure');
    const failed = await deps.repo.failOrder(
      message.orderId,
      message.messageId,
      failure.sanitizedMessage,
    );
    if (failed) {
      await recordPermanentFailure(deps, message, failure.category);
    }
    await message.ack();
    return 'failed';
  }
}

// ---------------------------------------------------------------------------
// Startup recovery
// ---------------------------------------------------------------------------

/**
 * Re-enqueue pending orders under their current job id. Enqueue is
 * idempotent on the message id, so orders that still have a live message are
 * left alone.
 */
export async function recoverPendingOrders(
  deps: Pick<GenerationWorkerDeps, 'repo' | 'queue' | 'logger'>,
  limit = 1000,
): Promise<number> {
  const pending = await deps.repo.findPendingOrders(limit);
  let recovered = 0;
  for (const order of pending) {
    if (!order.jobId) {
      continue;
    }
    await deps.queue.enqueue(order.orderId, order.jobId);
    recovered++;
  }
  if (recovered > 0) {
    deps.logger.info({ recovered }, 'Re-enqueued pending orders');
  }
  return recovered;
}

// ---------------------------------------------------------------------------
// Worker pool
// ---------------------------------------------------------------------------

export interface WorkerPoolOptions {
  concurrency?: number;
  pollIntervalMs?: number;
}

export interface WorkerPool {
  start(): void;
  /** Stop polling and wait for in-flight messages to finish. */
  stop(): Promise<void>;
  readonly running: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createWorkerPool(
  deps: GenerationWorkerDeps,
  opts: WorkerPoolOptions = {},
): WorkerPool {
  const concurrency = opts.concurrency ?? WORKER_CONCURRENCY;
  const pollIntervalMs = opts.pollIntervalMs ?? QUEUE_POLL_INTERVAL_MS;
  let running = false;
  let loops: Promise<void>[] = [];

  async function loop(workerId: number): Promise<void> {
    const log = deps.logger.child({ workerId });
    while (running) {
      let message: QueueMessage | null;
      try {
        message = await deps.queue.receive();
      } catch (err) {
        log.error({ err }, 'Queue receive failed');
        await sleep(pollIntervalMs);
        continue;
      }

      if (!message) {
        await sleep(pollIntervalMs);
        continue;
      }

      try {
        await processMessage(deps, message);
      } catch (err) {
        // Left unacked: redelivered once the visibility timeout lapses.
        log.error({ err, orderId: message.orderId }, 'Message processing failed');
      }
    }
  }

  return {
    start() {
      if (running) return;
      running = true;
      loops = Array.from({ length: concurrency }, (_, i) => loop(i + 1));
      deps.logger.info({ concurrency }, 'Worker pool started');
    },

    async stop() {
      running = false;
      await Promise.all(loops);
      loops = [];
      deps.logger.info('Worker pool stopped');
    },

    get running() {
      return running;
    },
  };
}
