// ============================================================================
// Generation task queue
// Id-only, at-least-once. A received message stays invisible for the
// visibility timeout; if it is neither acked nor nacked by then it is
// delivered again with a higher attempt count.
// ============================================================================

import { sql } from 'drizzle-orm';
import { z } from 'zod';
import {
  generationQueue,
  generationDeadLetters,
} from '@careplan/shared/schemas/db/queue.schema.js';
import type { Database } from '../order/order.repository.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface EnqueueOptions {
  delayMs?: number;
}

export interface QueueMessage {
  messageId: string;
  orderId: string;
  /** 1 on first delivery. */
  attempt: number;
  /** Remove the message. No-op if this delivery has already lapsed. */
  ack(): Promise<void>;
  /** Make the message visible again after `delayMs`. */
  nack(delayMs: number): Promise<void>;
}

export interface GenerationQueue {
  /** Idempotent on messageId. */
  enqueue(orderId: string, messageId: string, opts?: EnqueueOptions): Promise<void>;
  receive(): Promise<QueueMessage | null>;
}

export interface DeadLetterEntry {
  messageId: string;
  orderId: string;
  attempt: number;
  reason: string;
}

export interface DeadLetterSink {
  deadLetter(entry: DeadLetterEntry): Promise<void>;
}

// ---------------------------------------------------------------------------
// PostgreSQL queue
// ---------------------------------------------------------------------------

const claimedRowSchema = z.object({
  message_id: z.string(),
  order_id: z.string(),
  attempt: z.coerce.number().int(),
});

export interface PgQueueOptions {
  visibilityTimeoutMs: number;
}

export function createPgGenerationQueue(db: Database, opts: PgQueueOptions): GenerationQueue {
  // ack/nack match on (message_id, attempt) so a worker whose delivery lapsed
  // cannot touch the redelivered copy.
  async function ack(messageId: string, attempt: number): Promise<void> {
    await db.execute(sql`
      DELETE FROM ${generationQueue}
      WHERE ${generationQueue.messageId} = ${messageId}
        AND ${generationQueue.attempt} = ${attempt}
    `);
  }

  async function nack(messageId: string, attempt: number, delayMs: number): Promise<void> {
    await db.execute(sql`
      UPDATE ${generationQueue}
      SET visible_at = now() + (${Math.max(0, Math.round(delayMs))} * interval '1 millisecond')
      WHERE ${generationQueue.messageId} = ${messageId}
        AND ${generationQueue.attempt} = ${attempt}
    `);
  }

  return {
    async enqueue(orderId, messageId, enqueueOpts) {
      const delayMs = Math.max(0, Math.round(enqueueOpts?.delayMs ?? 0));
      await db
        .insert(generationQueue)
        .values({
          messageId,
          orderId,
          attempt: 0,
          // Database clock, like receive() and nack().
          visibleAt: sql`now() + (${delayMs} * interval '1 millisecond')`,
        })
        .onConflictDoNothing({ target: generationQueue.messageId });
    },

    async receive() {
      const result = await db.execute(sql`
        UPDATE ${generationQueue}
        SET attempt = attempt + 1,
            visible_at = now() + (${opts.visibilityTimeoutMs} * interval '1 millisecond')
        WHERE message_id = (
          SELECT message_id FROM ${generationQueue}
          WHERE visible_at <= now()
          ORDER BY visible_at, enqueued_at
          FOR UPDATE SKIP LOCKED
          LIMIT 1
        )
        RETURNING message_id, order_id, attempt
      `);

      const row = result.rows[0];
      if (!row) {
        return null;
      }
      const claimed = claimedRowSchema.parse(row);
      return {
        messageId: claimed.message_id,
        orderId: claimed.order_id,
        attempt: claimed.attempt,
        ack: () => ack(claimed.message_id, claimed.attempt),
        nack: (delayMs: number) => nack(claimed.message_id, claimed.attempt, delayMs),
      };
    },
  };
}

export function createPgDeadLetterSink(db: Database): DeadLetterSink {
  return {
    async deadLetter(entry) {
      await db.insert(generationDeadLetters).values(entry);
    },
  };
}

// ---------------------------------------------------------------------------
// In-process queue (tests, QUEUE_DRIVER=memory)
// ---------------------------------------------------------------------------

interface StoredMessage {
  messageId: string;
  orderId: string;
  attempt: number;
  visibleAt: number;
  seq: number;
}

export interface MemoryQueueOptions {
  visibilityTimeoutMs: number;
  /** Millisecond clock; defaults to Date.now. */
  now?: () => number;
}

export interface MemoryGenerationQueue extends GenerationQueue {
  /** Messages not yet acked, in delivery order. */
  snapshot(): Array<Omit<StoredMessage, 'seq'>>;
}

export function createMemoryGenerationQueue(opts: MemoryQueueOptions): MemoryGenerationQueue {
  const now = opts.now ?? Date.now;
  const messages = new Map<string, StoredMessage>();
  let seq = 0;

  function byDeliveryOrder(a: StoredMessage, b: StoredMessage): number {
    return a.visibleAt - b.visibleAt || a.seq - b.seq;
  }

  return {
    async enqueue(orderId, messageId, enqueueOpts) {
      if (messages.has(messageId)) {
        return;
      }
      messages.set(messageId, {
        messageId,
        orderId,
        attempt: 0,
        visibleAt: now() + (enqueueOpts?.delayMs ?? 0),
        seq: seq++,
      });
    },

    async receive() {
      const current = now();
      const next = [...messages.values()]
        .filter((m) => m.visibleAt <= current)
        .sort(byDeliveryOrder)[0];
      if (!next) {
        return null;
      }

      next.attempt += 1;
      next.visibleAt = current + opts.visibilityTimeoutMs;
      const attempt = next.attempt;

      const owns = () => messages.get(next.messageId)?.attempt === attempt;

      return {
        messageId: next.messageId,
        orderId: next.orderId,
        attempt,
        async ack() {
          if (owns()) {
            messages.delete(next.messageId);
          }
        },
        async nack(delayMs: number) {
          if (owns()) {
            next.visibleAt = now() + Math.max(0, delayMs);
          }
        },
      };
    },

    snapshot() {
      return [...messages.values()]
        .sort(byDeliveryOrder)
        .map(({ seq: _seq, ...message }) => ({ ...message }));
    },
  };
}

export interface MemoryDeadLetterSink extends DeadLetterSink {
  entries: DeadLetterEntry[];
}

export function createMemoryDeadLetterSink(): MemoryDeadLetterSink {
  const entries: DeadLetterEntry[] = [];
  return {
    entries,
    async deadLetter(entry) {
      entries.push({ ...entry });
    },
  };
}
