// ============================================================================
// Order Intake & Care Plan Generation — Constants
// ============================================================================

// --- Order Status ---

export const OrderStatus = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export const ORDER_STATUSES = [
  OrderStatus.PENDING,
  OrderStatus.PROCESSING,
  OrderStatus.COMPLETED,
  OrderStatus.FAILED,
] as const;

/** Statuses after which no automatic transition occurs. */
export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = [
  OrderStatus.COMPLETED,
  OrderStatus.FAILED,
];

// --- Order Lifecycle Events ---

export const OrderEvent = {
  CLAIM: 'CLAIM',
  COMPLETE: 'COMPLETE',
  FAIL: 'FAIL',
  REGENERATE: 'REGENERATE',
} as const;

export type OrderEvent = (typeof OrderEvent)[keyof typeof OrderEvent];

// --- Duplicate Classification ---

export const Classification = {
  OK: 'OK',
  WARNING: 'WARNING',
  BLOCKED: 'BLOCKED',
} as const;

export type Classification = (typeof Classification)[keyof typeof Classification];

// --- Patient Sex ---

export const PatientSex = {
  MALE: 'M',
  FEMALE: 'F',
  OTHER: 'X',
} as const;

export type PatientSex = (typeof PatientSex)[keyof typeof PatientSex];

// --- Intake Sources ---

export const IntakeSource = {
  WEB: 'web',
  CLINIC_B: 'clinic_b',
  NORDIC: 'nordic',
  PHARMACORP: 'pharmacorp',
} as const;

export type IntakeSource = (typeof IntakeSource)[keyof typeof IntakeSource];

// --- Error Codes ---

export const IntakeErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  PROVIDER_NPI_CONFLICT: 'PROVIDER_NPI_CONFLICT',
  PATIENT_DUPLICATE_WARNING: 'PATIENT_DUPLICATE_WARNING',
  ORDER_SAME_DAY_DUPLICATE: 'ORDER_SAME_DAY_DUPLICATE',
  ORDER_PREVIOUS_EXISTS: 'ORDER_PREVIOUS_EXISTS',
  DUPLICATE_BLOCKED: 'DUPLICATE_BLOCKED',
  DUPLICATE_WARNING: 'DUPLICATE_WARNING',
  INTEGRITY_RACE: 'INTEGRITY_RACE',
  UNKNOWN_SOURCE: 'UNKNOWN_SOURCE',
  ADAPTER_ERROR: 'ADAPTER_ERROR',
  GENERATION_IN_PROGRESS: 'GENERATION_IN_PROGRESS',
  GENERATION_QUEUED: 'GENERATION_QUEUED',
} as const;

export type IntakeErrorCode = (typeof IntakeErrorCode)[keyof typeof IntakeErrorCode];

// --- Duplicate Reasons ---
// Human-readable reason text shown to the data-entry user.

export const DuplicateReason = {
  NPI_NAME_MISMATCH: 'NPI already registered to a different provider name',
  MRN_IDENTITY_MISMATCH: 'MRN already belongs to a different patient identity',
  PATIENT_OTHER_MRN: 'possible duplicate patient under a different MRN',
  ORDER_SAME_DAY: 'duplicate order: same patient, medication, and day',
  ORDER_PREVIOUS: 'same patient/medication ordered previously on',
} as const;

export const ReuseNotice = {
  PROVIDER: 'Existing provider record reused',
  PATIENT: 'Existing patient record reused',
} as const;

// --- Generation Failure Categories ---

export const GenerationFailureCategory = {
  TIMEOUT: 'TIMEOUT',
  RATE_LIMITED: 'RATE_LIMITED',
  UPSTREAM_UNAVAILABLE: 'UPSTREAM_UNAVAILABLE',
  NETWORK: 'NETWORK',
  AUTHENTICATION: 'AUTHENTICATION',
  BAD_REQUEST: 'BAD_REQUEST',
  MALFORMED_RESULT: 'MALFORMED_RESULT',
  ATTEMPTS_EXHAUSTED: 'ATTEMPTS_EXHAUSTED',
} as const;

export type GenerationFailureCategory =
  (typeof GenerationFailureCategory)[keyof typeof GenerationFailureCategory];

/**
 * Sanitized, user-visible failure messages. These are the only strings ever
 * written to `orders.error_message`.
 */
export const GENERATION_FAILURE_MESSAGES: Readonly<Record<GenerationFailureCategory, string>> =
  Object.freeze({
    TIMEOUT: 'Care plan generation timed out.',
    RATE_LIMITED: 'Care plan generation service is rate limited.',
    UPSTREAM_UNAVAILABLE: 'Care plan generation service is unavailable.',
    NETWORK: 'Care plan generation service could not be reached.',
    AUTHENTICATION: 'Care plan generation service rejected the configured credentials.',
    BAD_REQUEST: 'Care plan generation service rejected the request.',
    MALFORMED_RESULT: 'Generated care plan was incomplete or malformed.',
    ATTEMPTS_EXHAUSTED: 'Care plan generation failed after all retry attempts.',
  });

// --- Required Care Plan Sections ---
// A generated document must contain a heading for each of these.

export const REQUIRED_CARE_PLAN_SECTIONS = Object.freeze([
  { key: 'problemList', label: 'Problem list', pattern: /problem\s*list|drug\s*therapy\s*problems/i },
  { key: 'goals', label: 'Goals', pattern: /\bgoals?\b/i },
  { key: 'interventions', label: 'Interventions', pattern: /\binterventions?\b/i },
  { key: 'monitoring', label: 'Monitoring', pattern: /\bmonitoring\b/i },
] as const);

// --- Worker & Queue Defaults ---

/** Generation call budget in milliseconds. */
export const GENERATION_TIMEOUT_MS = 45_000;

/** Deliveries per message before it is dead-lettered. */
export const GENERATION_MAX_ATTEMPTS = 4;

/** Exponential backoff: base * 2^(attempt-1), capped. */
export const GENERATION_BACKOFF_BASE_MS = 2_000;
export const GENERATION_BACKOFF_MAX_MS = 60_000;

/** Must exceed the generation timeout so a live worker keeps its message. */
export const QUEUE_VISIBILITY_TIMEOUT_MS = 120_000;

export const QUEUE_POLL_INTERVAL_MS = 1_000;

export const WORKER_CONCURRENCY = 2;

/** Suggested client polling interval while an order is non-terminal. */
export const STATUS_POLL_AFTER_MS = 3_000;

// --- Audit Action Identifiers ---

export const OrderAuditAction = {
  CREATED: 'order.created',
  DUPLICATE_CONFIRMED: 'order.duplicate_confirmed',
  REGENERATE_REQUESTED: 'order.regenerate_requested',
  GENERATION_COMPLETED: 'order.generation_completed',
  GENERATION_FAILED: 'order.generation_failed',
  EXPORT_REQUESTED: 'order.export_requested',
  REPORT_EXPORTED: 'report.exported',
} as const;

export type OrderAuditAction = (typeof OrderAuditAction)[keyof typeof OrderAuditAction];
