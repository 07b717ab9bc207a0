import { randomUUID } from 'node:crypto';
import {
  IntakeErrorCode,
  OrderAuditAction,
  OrderEvent,
  OrderStatus,
  STATUS_POLL_AFTER_MS,
} from '@careplan/shared/constants/order.constants.js';
import type { SelectGeneratedDocument } from '@careplan/shared/schemas/db/order.schema.js';
import type {
  ExportOrdersQuery,
  ListOrdersQuery,
} from '@careplan/shared/schemas/order.schema.js';
import type {
  OrderDetail,
  OrderExportRow,
  OrderRepository,
} from './order.repository.js';
import type { GenerationQueue } from '../generation/generation.queue.js';
import type { AuditRepo, EventEmitter } from '../../lib/audit.js';
import type { Logger } from '../../lib/logger.js';
import { ConflictError, NotFoundError } from '../../lib/errors.js';
import { buildCsv, type CsvExport } from '../../lib/download.js';
import { canTransition, isTerminal, toOrderStatus } from './order.state.js';
import { utcDay } from '../intake/intake.classifier.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface OrderServiceDeps {
  repo: OrderRepository;
  queue: GenerationQueue;
  auditRepo: AuditRepo;
  events: EventEmitter;
  logger: Logger;
}

const AUDIT_CATEGORY = 'order';

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

export interface OrderStatusView {
  order_id: string;
  status: OrderStatus;
  document_available: boolean;
  error_message: string | null;
  terminal: boolean;
  poll_after_ms?: number;
}

export interface OrderView {
  order_id: string;
  status: OrderStatus;
  source: string;
  medication_name: string;
  primary_diagnosis_code: string;
  additional_diagnosis_codes: string[];
  medication_history: string[];
  error_message: string | null;
  document_available: boolean;
  created_at: string;
  updated_at: string;
  patient: {
    mrn: string;
    first_name: string;
    last_name: string;
    date_of_birth: string;
  };
  provider: {
    npi: string;
    name: string;
  };
}

export interface DocumentView {
  order_id: string;
  content: string;
  model: string;
  generated_at: string;
  generation_time_ms: number;
  prompt_tokens: number | null;
  completion_tokens: number | null;
}

export interface DocumentDownload {
  filename: string;
  body: string;
}

export function toOrderView(detail: OrderDetail): OrderView {
  const { order, patient, provider } = detail;
  const status = toOrderStatus(order.status);
  return {
    order_id: order.orderId,
    status,
    source: order.source,
    medication_name: order.medicationName,
    primary_diagnosis_code: order.primaryDiagnosisCode,
    additional_diagnosis_codes: order.additionalDiagnosisCodes,
    medication_history: order.medicationHistory,
    error_message: order.errorMessage,
    document_available: status === OrderStatus.COMPLETED,
    created_at: order.createdAt.toISOString(),
    updated_at: order.updatedAt.toISOString(),
    patient: {
      mrn: patient.mrn,
      first_name: patient.firstName,
      last_name: patient.lastName,
      date_of_birth: patient.dateOfBirth,
    },
    provider: {
      npi: provider.npi,
      name: provider.name,
    },
  };
}

function toDocumentView(document: SelectGeneratedDocument): DocumentView {
  return {
    order_id: document.orderId,
    content: document.content,
    model: document.model,
    generated_at: document.generatedAt.toISOString(),
    generation_time_ms: document.generationTimeMs,
    prompt_tokens: document.promptTokens,
    completion_tokens: document.completionTokens,
  };
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/**
 * Read-only projection for client polling. `poll_after_ms` is present only
 * while the order is non-terminal.
 */
export async function getOrderStatus(
  deps: Pick<OrderServiceDeps, 'repo'>,
  orderId: string,
): Promise<OrderStatusView> {
  const order = await deps.repo.findOrderById(orderId);
  if (!order) {
    throw new NotFoundError('Order');
  }

  const status = toOrderStatus(order.status);
  const terminal = isTerminal(status);
  return {
    order_id: order.orderId,
    status,
    document_available: status === OrderStatus.COMPLETED,
    error_message: status === OrderStatus.FAILED ? order.errorMessage : null,
    terminal,
    ...(terminal ? {} : { poll_after_ms: STATUS_POLL_AFTER_MS }),
  };
}

// ---------------------------------------------------------------------------
// Detail / list
// ---------------------------------------------------------------------------

export async function getOrder(
  deps: Pick<OrderServiceDeps, 'repo'>,
  orderId: string,
): Promise<OrderView> {
  const detail = await deps.repo.findOrderDetail(orderId);
  if (!detail) {
    throw new NotFoundError('Order');
  }
  return toOrderView(detail);
}

export async function listOrders(
  deps: Pick<OrderServiceDeps, 'repo'>,
  query: ListOrdersQuery,
) {
  const result = await deps.repo.listOrders({
    search: query.search || undefined,
    status: query.status,
    page: query.page,
    pageSize: query.page_size,
  });
  return {
    data: result.data.map(toOrderView),
    pagination: result.pagination,
  };
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

async function loadCompletedDocument(
  deps: Pick<OrderServiceDeps, 'repo'>,
  orderId: string,
): Promise<{ detail: OrderDetail; document: SelectGeneratedDocument }> {
  const detail = await deps.repo.findOrderDetail(orderId);
  if (!detail) {
    throw new NotFoundError('Order');
  }
  if (detail.order.status !== OrderStatus.COMPLETED) {
    throw new NotFoundError('Care plan');
  }
  const document = await deps.repo.findDocumentByOrderId(orderId);
  if (!document) {
    throw new NotFoundError('Care plan');
  }
  return { detail, document };
}

export async function getDocument(
  deps: Pick<OrderServiceDeps, 'repo'>,
  orderId: string,
): Promise<DocumentView> {
  const { document } = await loadCompletedDocument(deps, orderId);
  return toDocumentView(document);
}

/** `YYYY-MM-DD HH:MM` in UTC. */
function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function downloadFilename(mrn: string, medicationName: string, orderDate: Date): string {
  return `careplan_${mrn}_${medicationName}_${utcDay(orderDate)}.txt`.replace(/[ /]/g, '_');
}

const RULE = '='.repeat(50);

export function renderDocumentText(detail: OrderDetail, document: SelectGeneratedDocument): string {
  const { order, patient, provider } = detail;
  return [
    'PHARMACEUTICAL CARE PLAN',
    RULE,
    `Patient: ${patient.firstName} ${patient.lastName}`,
    `MRN: ${patient.mrn}`,
    `DOB: ${patient.dateOfBirth}`,
    `Provider: ${provider.name} (NPI: ${provider.npi})`,
    `Medication: ${order.medicationName}`,
    `Primary Diagnosis: ${order.primaryDiagnosisCode}`,
    `Generated: ${formatTimestamp(document.generatedAt)}`,
    RULE,
    '',
    document.content,
    '',
  ].join('\n');
}

export async function downloadDocument(
  deps: Pick<OrderServiceDeps, 'repo'>,
  orderId: string,
): Promise<DocumentDownload> {
  const { detail, document } = await loadCompletedDocument(deps, orderId);
  return {
    filename: downloadFilename(detail.patient.mrn, detail.order.medicationName, detail.order.createdAt),
    body: renderDocumentText(detail, document),
  };
}

// ---------------------------------------------------------------------------
// Regenerate
// ---------------------------------------------------------------------------

/**
 * Move a completed or failed order back to pending under a new job id and
 * enqueue it. The document is deleted in the same transaction.
 */
export async function regenerateOrder(
  deps: OrderServiceDeps,
  orderId: string,
): Promise<OrderStatusView> {
  const current = await deps.repo.findOrderById(orderId);
  if (!current) {
    throw new NotFoundError('Order');
  }

  const status = toOrderStatus(current.status);
  if (status === OrderStatus.PROCESSING) {
    throw new ConflictError(
      'Care plan generation is in progress; try again when it finishes',
      IntakeErrorCode.GENERATION_IN_PROGRESS,
    );
  }
  if (!canTransition(status, OrderEvent.REGENERATE)) {
    throw new ConflictError(
      'Care plan generation is already queued',
      IntakeErrorCode.GENERATION_QUEUED,
    );
  }

  const jobId = randomUUID();
  const updated = await deps.repo.requestRegeneration(orderId, jobId);
  if (!updated) {
    // Status moved between the read and the conditional update.
    const latest = await deps.repo.findOrderById(orderId);
    throw latest?.status === OrderStatus.PROCESSING
      ? new ConflictError(
          'Care plan generation is in progress; try again when it finishes',
          IntakeErrorCode.GENERATION_IN_PROGRESS,
        )
      : new ConflictError('Care plan generation is already queued', IntakeErrorCode.GENERATION_QUEUED);
  }

  try {
    await deps.queue.enqueue(orderId, jobId);
  } catch (err) {
    deps.logger.error({ err, orderId }, 'Enqueue after regenerate failed');
  }

  await deps.auditRepo.appendAuditLog({
    action: OrderAuditAction.REGENERATE_REQUESTED,
    category: AUDIT_CATEGORY,
    resourceType: 'order',
    resourceId: orderId,
    detail: { previousStatus: status },
  });
  deps.events.emit(OrderAuditAction.REGENERATE_REQUESTED, { orderId });

  return {
    order_id: orderId,
    status: OrderStatus.PENDING,
    document_available: false,
    error_message: null,
    terminal: false,
    poll_after_ms: STATUS_POLL_AFTER_MS,
  };
}

// ---------------------------------------------------------------------------
// CSV export
// ---------------------------------------------------------------------------

export const EXPORT_HEADERS = [
  'order_id',
  'order_date',
  'status',
  'patient_mrn',
  'patient_first_name',
  'patient_last_name',
  'patient_date_of_birth',
  'provider_npi',
  'provider_name',
  'medication_name',
  'primary_diagnosis_code',
  'care_plan_generated_at',
  'care_plan_content',
];

function exportRowToCsvFields(row: OrderExportRow): string[] {
  return [
    row.order.orderId,
    formatTimestamp(row.order.createdAt),
    row.order.status,
    row.patient.mrn,
    row.patient.firstName,
    row.patient.lastName,
    row.patient.dateOfBirth,
    row.provider.npi,
    row.provider.name,
    row.order.medicationName,
    row.order.primaryDiagnosisCode,
    row.document ? formatTimestamp(row.document.generatedAt) : '',
    row.document?.content ?? '',
  ];
}

export function buildOrdersCsv(rows: readonly OrderExportRow[]): string {
  return buildCsv(EXPORT_HEADERS, rows.map(exportRowToCsvFields));
}

export async function exportOrdersCsv(
  deps: Pick<OrderServiceDeps, 'repo' | 'auditRepo'>,
  query: ExportOrdersQuery,
): Promise<CsvExport> {
  const rows = await deps.repo.exportOrders({
    status: query.status,
    startDate: query.start_date,
    endDate: query.end_date,
    providerNpi: query.provider_npi,
  });

  await deps.auditRepo.appendAuditLog({
    action: OrderAuditAction.EXPORT_REQUESTED,
    category: AUDIT_CATEGORY,
    resourceType: 'order_export',
    detail: { filters: { ...query }, rowCount: rows.length },
  });

  return {
    filename: `orders_export_${utcDay(new Date())}.csv`,
    csv: buildOrdersCsv(rows),
    rowCount: rows.length,
  };
}
