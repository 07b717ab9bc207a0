// ============================================================================
// Order lifecycle state machine
// ============================================================================

import {
  OrderEvent,
  OrderStatus,
  TERMINAL_ORDER_STATUSES,
} from '@careplan/shared/constants/order.constants.js';

export interface Transition {
  from: readonly OrderStatus[];
  to: OrderStatus;
}

/**
 * Allowed transitions. Every conditional status update takes its
 * `WHERE status IN (from)` clause from this table.
 *
 * `FAIL` from `pending` is used only when a message is dead-lettered before
 * any worker claimed the order.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderEvent, Transition>> = Object.freeze({
  [OrderEvent.CLAIM]: { from: [OrderStatus.PENDING], to: OrderStatus.PROCESSING },
  [OrderEvent.COMPLETE]: { from: [OrderStatus.PROCESSING], to: OrderStatus.COMPLETED },
  [OrderEvent.FAIL]: {
    from: [OrderStatus.PROCESSING, OrderStatus.PENDING],
    to: OrderStatus.FAILED,
  },
  [OrderEvent.REGENERATE]: {
    from: [OrderStatus.COMPLETED, OrderStatus.FAILED],
    to: OrderStatus.PENDING,
  },
});

export function transitionFor(event: OrderEvent): Transition {
  return ORDER_TRANSITIONS[event];
}

export function canTransition(from: OrderStatus, event: OrderEvent): boolean {
  return ORDER_TRANSITIONS[event].from.includes(from);
}

/** Target status, or null when the event is not allowed from `from`. */
export function nextStatus(from: OrderStatus, event: OrderEvent): OrderStatus | null {
  return canTransition(from, event) ? ORDER_TRANSITIONS[event].to : null;
}

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.includes(status);
}

const STATUS_VALUES: readonly string[] = Object.values(OrderStatus);

export function isOrderStatus(value: string): value is OrderStatus {
  return STATUS_VALUES.includes(value);
}

/** Narrows a stored status column, which Drizzle types as a plain string. */
export function toOrderStatus(value: string): OrderStatus {
  if (!isOrderStatus(value)) {
    throw new Error(`Unknown order status: ${value}`);
  }
  return value;
}
