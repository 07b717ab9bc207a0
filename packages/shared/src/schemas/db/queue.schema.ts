// ============================================================================
// Generation Queue — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  integer,
  index,
} from 'drizzle-orm/pg-core';

// --- Generation Queue Table ---
// Id-only payload. A row is deliverable once visible_at <= now(); receiving
// pushes visible_at forward by the visibility timeout and bumps attempt.

export const generationQueue = pgTable(
  'generation_queue',
  {
    messageId: uuid('message_id').primaryKey(),
    orderId: uuid('order_id').notNull(),
    attempt: integer('attempt').notNull().default(0),
    visibleAt: timestamp('visible_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    enqueuedAt: timestamp('enqueued_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('generation_queue_visible_at_idx').on(table.visibleAt),
    index('generation_queue_order_idx').on(table.orderId),
  ],
);

// --- Dead Letters Table ---

export const generationDeadLetters = pgTable(
  'generation_dead_letters',
  {
    deadLetterId: uuid('dead_letter_id').primaryKey().defaultRandom(),
    messageId: uuid('message_id').notNull(),
    orderId: uuid('order_id').notNull(),
    attempt: integer('attempt').notNull(),
    reason: varchar('reason', { length: 50 }).notNull(),
    deadLetteredAt: timestamp('dead_lettered_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('generation_dead_letters_order_idx').on(table.orderId)],
);
