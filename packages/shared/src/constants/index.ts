export {
  OrderStatus,
  ORDER_STATUSES,
  TERMINAL_ORDER_STATUSES,
  OrderEvent,
  Classification,
  PatientSex,
  IntakeSource,
  IntakeErrorCode,
  DuplicateReason,
  ReuseNotice,
  GenerationFailureCategory,
  GENERATION_FAILURE_MESSAGES,
  REQUIRED_CARE_PLAN_SECTIONS,
  GENERATION_TIMEOUT_MS,
  GENERATION_MAX_ATTEMPTS,
  GENERATION_BACKOFF_BASE_MS,
  GENERATION_BACKOFF_MAX_MS,
  QUEUE_VISIBILITY_TIMEOUT_MS,
  QUEUE_POLL_INTERVAL_MS,
  WORKER_CONCURRENCY,
  STATUS_POLL_AFTER_MS,
  OrderAuditAction,
} from './order.constants.js';
