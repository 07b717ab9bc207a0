// ============================================================================
// Duplicate classification: provider, patient, order
// Pure decision tables. Callers load the candidate rows inside the intake
// transaction and pass them in; nothing here touches storage.
// ============================================================================

import {
  Classification,
  DuplicateReason,
  IntakeErrorCode,
  ReuseNotice,
} from '@careplan/shared/constants/order.constants.js';
import type { DuplicateFinding } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Candidate records
// ---------------------------------------------------------------------------

export interface ProviderCandidate {
  providerId: string;
  npi: string;
  name: string;
}

export interface PatientCandidate {
  patientId: string;
  mrn: string;
  firstName: string;
  lastName: string;
  dateOfBirth: string;
}

export interface PriorOrderCandidate {
  orderId: string;
  createdAt: Date;
}

export interface PatientIdentity {
  mrn: string;
  firstName: string;
  lastName: string;
  dateOfBirth: string;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface ClassificationResult {
  classification: Classification;
  findings: DuplicateFinding[];
  notices: string[];
}

export interface ProviderClassification extends ClassificationResult {
  /** Row to reuse; null means a new provider is created. */
  reuse: ProviderCandidate | null;
}

export interface PatientClassification extends ClassificationResult {
  /** Row to reuse (the MRN match); null means a new patient is created. */
  reuse: PatientCandidate | null;
}

export type CombinedClassification =
  | { outcome: 'blocked'; errors: DuplicateFinding[]; notices: string[] }
  | { outcome: 'warning'; warnings: DuplicateFinding[]; notices: string[] }
  | { outcome: 'ok'; confirmedWarnings: DuplicateFinding[]; notices: string[] };

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export function classifyProvider(
  submitted: { npi: string; name: string },
  existing: ProviderCandidate | undefined,
): ProviderClassification {
  if (!existing) {
    return { classification: Classification.OK, findings: [], notices: [], reuse: null };
  }

  if (existing.name === submitted.name) {
    return {
      classification: Classification.OK,
      findings: [],
      notices: [ReuseNotice.PROVIDER],
      reuse: existing,
    };
  }

  return {
    classification: Classification.BLOCKED,
    findings: [
      { code: IntakeErrorCode.PROVIDER_NPI_CONFLICT, message: DuplicateReason.NPI_NAME_MISMATCH },
    ],
    notices: [],
    reuse: null,
  };
}

// ---------------------------------------------------------------------------
// Patient
// ---------------------------------------------------------------------------

function sameIdentity(a: PatientIdentity, b: PatientIdentity): boolean {
  return (
    a.firstName === b.firstName &&
    a.lastName === b.lastName &&
    a.dateOfBirth === b.dateOfBirth
  );
}

/**
 * @param byMrn - the row holding the submitted MRN, if any
 * @param byIdentity - rows with the submitted (first, last, DOB), any MRN
 */
export function classifyPatient(
  submitted: PatientIdentity,
  byMrn: PatientCandidate | undefined,
  byIdentity: readonly PatientCandidate[],
): PatientClassification {
  const findings: DuplicateFinding[] = [];
  const notices: string[] = [];

  if (byMrn) {
    if (sameIdentity(byMrn, submitted)) {
      notices.push(ReuseNotice.PATIENT);
    } else {
      findings.push({
        code: IntakeErrorCode.PATIENT_DUPLICATE_WARNING,
        message: DuplicateReason.MRN_IDENTITY_MISMATCH,
      });
    }
  }

  if (byIdentity.some((candidate) => candidate.mrn !== submitted.mrn)) {
    findings.push({
      code: IntakeErrorCode.PATIENT_DUPLICATE_WARNING,
      message: DuplicateReason.PATIENT_OTHER_MRN,
    });
  }

  return {
    classification: findings.length > 0 ? Classification.WARNING : Classification.OK,
    findings,
    notices,
    reuse: byMrn ?? null,
  };
}

// ---------------------------------------------------------------------------
// Order
// ---------------------------------------------------------------------------

/** Calendar day in UTC, YYYY-MM-DD. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * @param prior - existing orders for the same patient and medication
 *   (case-insensitive), in any order
 */
export function classifyOrder(
  prior: readonly PriorOrderCandidate[],
  now: Date,
): ClassificationResult {
  if (prior.length === 0) {
    return { classification: Classification.OK, findings: [], notices: [] };
  }

  const today = utcDay(now);
  if (prior.some((order) => utcDay(order.createdAt) === today)) {
    return {
      classification: Classification.BLOCKED,
      findings: [
        { code: IntakeErrorCode.ORDER_SAME_DAY_DUPLICATE, message: DuplicateReason.ORDER_SAME_DAY },
      ],
      notices: [],
    };
  }

  const latest = prior.reduce((a, b) => (b.createdAt > a.createdAt ? b : a));
  return {
    classification: Classification.WARNING,
    findings: [
      {
        code: IntakeErrorCode.ORDER_PREVIOUS_EXISTS,
        message: `${DuplicateReason.ORDER_PREVIOUS} ${utcDay(latest.createdAt)}`,
      },
    ],
    notices: [],
  };
}

// ---------------------------------------------------------------------------
// Combine
// ---------------------------------------------------------------------------

/**
 * BLOCKED always wins and cannot be confirmed away. Warnings need
 * `confirmNotDuplicate`; once confirmed they are returned for echoing.
 */
export function combineClassifications(
  results: readonly ClassificationResult[],
  confirmNotDuplicate: boolean,
): CombinedClassification {
  const notices = results.flatMap((r) => r.notices);

  const errors = results
    .filter((r) => r.classification === Classification.BLOCKED)
    .flatMap((r) => r.findings);
  if (errors.length > 0) {
    return { outcome: 'blocked', errors, notices };
  }

  const warnings = results
    .filter((r) => r.classification === Classification.WARNING)
    .flatMap((r) => r.findings);
  if (warnings.length > 0 && !confirmNotDuplicate) {
    return { outcome: 'warning', warnings, notices };
  }

  return { outcome: 'ok', confirmedWarnings: warnings, notices };
}
