import { randomUUID } from 'node:crypto';
import {
  IntakeErrorCode,
  IntakeSource,
  OrderAuditAction,
  OrderStatus,
} from '@careplan/shared/constants/order.constants.js';
import { createOrderSchema, type CreateOrder } from '@careplan/shared/schemas/order.schema.js';
import type { SelectOrder } from '@careplan/shared/schemas/db/order.schema.js';
import { maskIdentifier } from '@careplan/shared/utils/identifier.utils.js';
import type { OrderRepository, TransactionRunner } from '../order/order.repository.js';
import type { GenerationQueue } from '../generation/generation.queue.js';
import type { AuditRepo, EventEmitter } from '../../lib/audit.js';
import type { Logger } from '../../lib/logger.js';
import {
  DuplicateBlockedError,
  DuplicateWarningError,
  ValidationError,
  fieldErrorsFromZod,
  type DuplicateFinding,
} from '../../lib/errors.js';
import {
  classifyOrder,
  classifyPatient,
  classifyProvider,
  combineClassifications,
} from './intake.classifier.js';
import { getAdapter } from './intake.adapters.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface IntakeServiceDeps {
  transactions: TransactionRunner;
  queue: GenerationQueue;
  auditRepo: AuditRepo;
  events: EventEmitter;
  logger: Logger;
  now?: () => Date;
}

export interface IntakeResult {
  order: SelectOrder;
  confirmedWarnings: DuplicateFinding[];
  notices: string[];
}

const AUDIT_CATEGORY = 'intake';

/** Attempts at the intake transaction before a unique violation is reported. */
const INTAKE_TRANSACTION_ATTEMPTS = 2;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate a canonical submission. All field problems are reported together
 * in one ValidationError; nothing has touched storage yet.
 */
export function parseSubmission(raw: unknown): CreateOrder {
  const result = createOrderSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Validation failed', fieldErrorsFromZod(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Integrity race
// ---------------------------------------------------------------------------

function hasCode(value: unknown, code: string): boolean {
  return typeof value === 'object' && value !== null && 'code' in value && value.code === code;
}

/** PostgreSQL unique_violation, possibly wrapped by the driver. */
export function isUniqueViolation(err: unknown): boolean {
  if (hasCode(err, '23505')) return true;
  return err instanceof Error && hasCode(err.cause, '23505');
}

// ---------------------------------------------------------------------------
// Classification + writes (one transaction)
// ---------------------------------------------------------------------------

async function intakeInTransaction(
  repo: OrderRepository,
  submission: CreateOrder,
  source: IntakeSource,
  now: Date,
): Promise<IntakeResult> {
  const { patient: p, provider: pr, order: o } = submission;

  const providerResult = classifyProvider(
    { npi: pr.npi, name: pr.name },
    await repo.findProviderByNpi(pr.npi),
  );

  const byMrn = await repo.findPatientByMrn(p.mrn);
  if (byMrn) {
    // Held to commit: a concurrent intake for this patient waits here, then
    // sees this transaction's order in the same-day check.
    await repo.lockPatientForUpdate(byMrn.patientId);
  }
  const byIdentity = await repo.findPatientsByIdentity(p.first_name, p.last_name, p.date_of_birth);
  const patientResult = classifyPatient(
    {
      mrn: p.mrn,
      firstName: p.first_name,
      lastName: p.last_name,
      dateOfBirth: p.date_of_birth,
    },
    byMrn,
    byIdentity,
  );

  // Checked against the MRN row that would be reused, even when the patient
  // identity itself is under warning.
  const prior = byMrn
    ? await repo.findOrdersForPatientMedication(byMrn.patientId, o.medication_name)
    : [];
  const orderResult = classifyOrder(prior, now);

  const combined = combineClassifications(
    [providerResult, patientResult, orderResult],
    submission.confirm_not_duplicate,
  );

  if (combined.outcome === 'blocked') {
    throw new DuplicateBlockedError(
      'Submission blocked by duplicate check',
      combined.errors,
      combined.notices,
    );
  }
  if (combined.outcome === 'warning') {
    throw new DuplicateWarningError(
      'Possible duplicate: resubmit with confirm_not_duplicate to proceed',
      combined.warnings,
      combined.notices,
    );
  }

  const providerId = providerResult.reuse
    ? providerResult.reuse.providerId
    : (await repo.insertProvider({ npi: pr.npi, name: pr.name })).providerId;

  const clinical = {
    sex: p.sex ?? null,
    weightKg: p.weight_kg != null ? String(p.weight_kg) : null,
    allergies: p.allergies ?? null,
    primaryDiagnosisCode: p.primary_diagnosis_code,
    additionalDiagnosisCodes: p.additional_diagnosis_codes,
    medicationHistory: p.medication_history,
  };

  let patientId: string;
  if (patientResult.reuse) {
    patientId = patientResult.reuse.patientId;
    await repo.updatePatientClinical(patientId, clinical);
  } else {
    const created = await repo.insertPatient({
      mrn: p.mrn,
      firstName: p.first_name,
      lastName: p.last_name,
      dateOfBirth: p.date_of_birth,
      ...clinical,
    });
    patientId = created.patientId;
  }

  const order = await repo.insertOrder({
    patientId,
    providerId,
    medicationName: o.medication_name,
    primaryDiagnosisCode: p.primary_diagnosis_code,
    additionalDiagnosisCodes: p.additional_diagnosis_codes,
    medicationHistory: p.medication_history,
    clinicalNotes: o.clinical_notes,
    source,
    status: OrderStatus.PENDING,
    jobId: randomUUID(),
    createdAt: now,
    updatedAt: now,
  });

  return {
    order,
    confirmedWarnings: combined.confirmedWarnings,
    notices: combined.notices,
  };
}

async function runIntakeTransaction(
  deps: IntakeServiceDeps,
  submission: CreateOrder,
  source: IntakeSource,
): Promise<IntakeResult> {
  for (let attempt = 1; ; attempt++) {
    const now = deps.now?.() ?? new Date();
    try {
      return await deps.transactions.run((repo) =>
        intakeInTransaction(repo, submission, source, now),
      );
    } catch (err) {
      if (!isUniqueViolation(err)) {
        throw err;
      }
      if (attempt >= INTAKE_TRANSACTION_ATTEMPTS) {
        throw new DuplicateBlockedError(
          'Submission conflicted with a concurrent submission',
          [
            {
              code: IntakeErrorCode.INTEGRITY_RACE,
              message: 'A concurrent submission created the same provider or patient; please resubmit',
            },
          ],
          [],
          IntakeErrorCode.INTEGRITY_RACE,
        );
      }
      // The competitor has committed; classify again against its rows.
      deps.logger.warn(
        { npi: maskIdentifier(submission.provider.npi), mrn: maskIdentifier(submission.patient.mrn) },
        'Unique violation during intake, retrying classification',
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Submit
// ---------------------------------------------------------------------------

/**
 * Validate, classify and create an order, then enqueue its generation job.
 *
 * Rejections (ValidationError, DuplicateWarningError, DuplicateBlockedError)
 * leave no rows and no queue message behind.
 */
export async function submitOrder(
  deps: IntakeServiceDeps,
  raw: unknown,
  source: IntakeSource = IntakeSource.WEB,
): Promise<IntakeResult> {
  const submission = parseSubmission(raw);
  const result = await runIntakeTransaction(deps, submission, source);
  const { order } = result;

  if (order.jobId) {
    try {
      await deps.queue.enqueue(order.orderId, order.jobId);
    } catch (err) {
      // Committed but not queued: startup recovery re-enqueues pending orders.
      deps.logger.error({ err, orderId: order.orderId }, 'Enqueue after commit failed');
    }
  }

  await deps.auditRepo.appendAuditLog({
    action: OrderAuditAction.CREATED,
    category: AUDIT_CATEGORY,
    resourceType: 'order',
    resourceId: order.orderId,
    detail: {
      source,
      mrn: maskIdentifier(submission.patient.mrn),
      npi: maskIdentifier(submission.provider.npi),
    },
  });

  if (result.confirmedWarnings.length > 0) {
    await deps.auditRepo.appendAuditLog({
      action: OrderAuditAction.DUPLICATE_CONFIRMED,
      category: AUDIT_CATEGORY,
      resourceType: 'order',
      resourceId: order.orderId,
      detail: { warnings: result.confirmedWarnings.map((w) => w.code) },
    });
  }

  deps.events.emit(OrderAuditAction.CREATED, { orderId: order.orderId, source });
  return result;
}

/** Map a partner payload through its adapter, then submit. */
export async function submitFromSource(
  deps: IntakeServiceDeps,
  source: string,
  raw: unknown,
): Promise<IntakeResult> {
  const adapter = getAdapter(source);
  return submitOrder(deps, adapter.toSubmission(raw), adapter.source);
}
