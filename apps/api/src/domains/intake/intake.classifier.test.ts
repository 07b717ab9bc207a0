import { describe, it, expect } from 'vitest';
import {
  Classification,
  IntakeErrorCode,
  ReuseNotice,
} from '@careplan/shared/constants/order.constants.js';
import {
  classifyOrder,
  classifyPatient,
  classifyProvider,
  combineClassifications,
  utcDay,
  type ClassificationResult,
  type PatientCandidate,
} from './intake.classifier.js';

const PROVIDER = { providerId: 'prov-1', npi: '1234567893', name: 'Dr. Ada Lane' };

const PATIENT: PatientCandidate = {
  patientId: 'pat-1',
  mrn: '100200',
  firstName: 'Jane',
  lastName: 'Doe',
  dateOfBirth: '1979-06-08',
};

const identity = {
  mrn: PATIENT.mrn,
  firstName: PATIENT.firstName,
  lastName: PATIENT.lastName,
  dateOfBirth: PATIENT.dateOfBirth,
};

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

describe('classifyProvider', () => {
  it('is OK with nothing to reuse for an unknown NPI', () => {
    const result = classifyProvider({ npi: PROVIDER.npi, name: PROVIDER.name }, undefined);
    expect(result.classification).toBe(Classification.OK);
    expect(result.reuse).toBeNull();
    expect(result.notices).toEqual([]);
  });

  it('reuses the existing provider when NPI and name match', () => {
    const result = classifyProvider({ npi: PROVIDER.npi, name: PROVIDER.name }, PROVIDER);
    expect(result.classification).toBe(Classification.OK);
    expect(result.reuse).toBe(PROVIDER);
    expect(result.notices).toEqual([ReuseNotice.PROVIDER]);
  });

  it('blocks the same NPI under a different name', () => {
    const result = classifyProvider({ npi: PROVIDER.npi, name: 'Dr. Ben Ortiz' }, PROVIDER);
    expect(result.classification).toBe(Classification.BLOCKED);
    expect(result.findings.map((f) => f.code)).toEqual([IntakeErrorCode.PROVIDER_NPI_CONFLICT]);
    expect(result.reuse).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Patient
// ---------------------------------------------------------------------------

describe('classifyPatient', () => {
  it('is OK for a new MRN with no identity match', () => {
    const result = classifyPatient(identity, undefined, []);
    expect(result.classification).toBe(Classification.OK);
    expect(result.reuse).toBeNull();
  });

  it('reuses the MRN row when the identity matches', () => {
    const result = classifyPatient(identity, PATIENT, [PATIENT]);
    expect(result.classification).toBe(Classification.OK);
    expect(result.reuse).toBe(PATIENT);
    expect(result.notices).toEqual([ReuseNotice.PATIENT]);
  });

  it('warns when the MRN belongs to a different identity', () => {
    const result = classifyPatient({ ...identity, lastName: 'Smith' }, PATIENT, []);
    expect(result.classification).toBe(Classification.WARNING);
    expect(result.findings).toEqual([
      {
        code: IntakeErrorCode.PATIENT_DUPLICATE_WARNING,
        message: 'MRN already belongs to a different patient identity',
      },
    ]);
    expect(result.reuse).toBe(PATIENT);
  });

  it('warns when the same identity exists under another MRN', () => {
    const result = classifyPatient({ ...identity, mrn: '300400' }, undefined, [PATIENT]);
    expect(result.classification).toBe(Classification.WARNING);
    expect(result.findings.map((f) => f.message)).toEqual([
      'possible duplicate patient under a different MRN',
    ]);
    expect(result.reuse).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Order
// ---------------------------------------------------------------------------

describe('classifyOrder', () => {
  const now = new Date('2026-03-10T15:00:00.000Z');

  it('is OK with no prior order for the patient and medication', () => {
    expect(classifyOrder([], now).classification).toBe(Classification.OK);
  });

  it('blocks a second order on the same UTC day', () => {
    const result = classifyOrder(
      [{ orderId: 'o-1', createdAt: new Date('2026-03-10T00:05:00.000Z') }],
      now,
    );
    expect(result.classification).toBe(Classification.BLOCKED);
    expect(result.findings[0].code).toBe(IntakeErrorCode.ORDER_SAME_DAY_DUPLICATE);
  });

  it('warns about an earlier day and names the most recent one', () => {
    const result = classifyOrder(
      [
        { orderId: 'o-1', createdAt: new Date('2026-01-02T09:00:00.000Z') },
        { orderId: 'o-2', createdAt: new Date('2026-03-09T23:59:00.000Z') },
      ],
      now,
    );
    expect(result.classification).toBe(Classification.WARNING);
    expect(result.findings).toEqual([
      {
        code: IntakeErrorCode.ORDER_PREVIOUS_EXISTS,
        message: 'same patient/medication ordered previously on 2026-03-09',
      },
    ]);
  });

  it('uses UTC calendar days', () => {
    expect(utcDay(new Date('2026-03-09T23:59:59.999Z'))).toBe('2026-03-09');
  });
});

// ---------------------------------------------------------------------------
// Combine
// ---------------------------------------------------------------------------

describe('combineClassifications', () => {
  const ok: ClassificationResult = {
    classification: Classification.OK,
    findings: [],
    notices: [ReuseNotice.PROVIDER],
  };
  const warning: ClassificationResult = {
    classification: Classification.WARNING,
    findings: [{ code: IntakeErrorCode.ORDER_PREVIOUS_EXISTS, message: 'earlier order' }],
    notices: [],
  };
  const blocked: ClassificationResult = {
    classification: Classification.BLOCKED,
    findings: [{ code: IntakeErrorCode.PROVIDER_NPI_CONFLICT, message: 'npi conflict' }],
    notices: [],
  };

  it('returns warnings until they are confirmed', () => {
    expect(combineClassifications([ok, warning], false)).toEqual({
      outcome: 'warning',
      warnings: warning.findings,
      notices: [ReuseNotice.PROVIDER],
    });
  });

  it('proceeds with confirmed warnings echoed', () => {
    expect(combineClassifications([ok, warning], true)).toEqual({
      outcome: 'ok',
      confirmedWarnings: warning.findings,
      notices: [ReuseNotice.PROVIDER],
    });
  });

  it('keeps BLOCKED even when confirmed', () => {
    const result = combineClassifications([warning, blocked], true);
    expect(result.outcome).toBe('blocked');
    if (result.outcome === 'blocked') {
      expect(result.errors).toEqual(blocked.findings);
    }
  });
});
