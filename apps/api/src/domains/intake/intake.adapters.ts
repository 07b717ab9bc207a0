// ============================================================================
// Intake source adapters
// Each adapter maps one partner's payload onto the canonical submission
// shape. Field-level validation happens afterwards, on the canonical shape,
// so every source gets the same error messages.
// ============================================================================

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { IntakeErrorCode, IntakeSource } from '@careplan/shared/constants/order.constants.js';
import { ValidationError } from '../../lib/errors.js';

/** Canonical shape, not yet validated. */
export interface RawSubmission {
  patient: Record<string, unknown>;
  provider: Record<string, unknown>;
  order: Record<string, unknown>;
  confirm_not_duplicate?: unknown;
}

export interface IntakeAdapter {
  readonly source: IntakeSource;
  toSubmission(raw: unknown): RawSubmission;
}

export class AdapterError extends ValidationError {
  constructor(source: string, message: string) {
    super(`Could not read ${source} payload: ${message}`, [{ field: 'body', message }], IntakeErrorCode.ADAPTER_ERROR);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(record: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = record[key];
  return isRecord(value) ? value : {};
}

function str(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

function splitList(value: string, separator: string): string[] {
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Presence check on the mapped payload, before field validation. */
function requireMapped(source: string, submission: RawSubmission): RawSubmission {
  const missing: string[] = [];
  if (!str(submission.patient, 'first_name')) missing.push('patient.first_name');
  if (!str(submission.patient, 'mrn')) missing.push('patient.mrn');
  if (!str(submission.provider, 'npi')) missing.push('provider.npi');
  if (!str(submission.order, 'medication_name')) missing.push('order.medication_name');
  if (missing.length > 0) {
    throw new AdapterError(source, `missing ${missing.join(', ')} after mapping`);
  }
  return submission;
}

// ---------------------------------------------------------------------------
// web: canonical nested JSON, passed through
// ---------------------------------------------------------------------------

export const webAdapter: IntakeAdapter = {
  source: IntakeSource.WEB,
  toSubmission(raw) {
    if (!isRecord(raw)) {
      throw new AdapterError(IntakeSource.WEB, 'expected a JSON object');
    }
    return requireMapped(IntakeSource.WEB, {
      patient: isRecord(raw.patient) ? raw.patient : {},
      provider: isRecord(raw.provider) ? raw.provider : {},
      order: isRecord(raw.order) ? raw.order : {},
      confirm_not_duplicate: raw.confirm_not_duplicate,
    });
  },
};

// ---------------------------------------------------------------------------
// clinic_b: flat JSON
// ---------------------------------------------------------------------------

export const clinicBAdapter: IntakeAdapter = {
  source: IntakeSource.CLINIC_B,
  toSubmission(raw) {
    if (!isRecord(raw)) {
      throw new AdapterError(IntakeSource.CLINIC_B, 'expected a JSON object');
    }
    return requireMapped(IntakeSource.CLINIC_B, {
      patient: {
        first_name: str(raw, 'pt_fname'),
        last_name: str(raw, 'pt_lname'),
        mrn: str(raw, 'pt_id_num'),
        date_of_birth: str(raw, 'birth_date'),
        primary_diagnosis_code: str(raw, 'main_icd10'),
        additional_diagnosis_codes: [],
        medication_history: splitList(str(raw, 'past_meds'), ','),
      },
      provider: {
        name: str(raw, 'doc_name'),
        npi: str(raw, 'doc_npi'),
      },
      order: {
        medication_name: str(raw, 'drug'),
        clinical_notes: '',
      },
      confirm_not_duplicate: raw.is_confirmed === true,
    });
  },
};

// ---------------------------------------------------------------------------
// nordic: pipe-delimited text
//   PATIENT|first|last|mrn|YYYY/MM/DD
//   DOCTOR|name|npi
//   ORDER|medication|icd10|dx;dx|CONFIRMED
// ---------------------------------------------------------------------------

export const nordicAdapter: IntakeAdapter = {
  source: IntakeSource.NORDIC,
  toSubmission(raw) {
    const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
    if (typeof text !== 'string') {
      throw new AdapterError(IntakeSource.NORDIC, 'expected a text/plain body');
    }

    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    let patient: string[] | undefined;
    let doctor: string[] | undefined;
    let order: string[] | undefined;

    for (const line of lines) {
      const parts = line.split('|').map((part) => part.trim());
      switch (parts[0]) {
        case 'PATIENT':
          if (parts.length >= 5) patient = parts;
          break;
        case 'DOCTOR':
          if (parts.length >= 3) doctor = parts;
          break;
        case 'ORDER':
          if (parts.length >= 5) order = parts;
          break;
        default:
          break;
      }
    }

    if (!patient || !doctor || !order) {
      throw new AdapterError(IntakeSource.NORDIC, 'expected PATIENT, DOCTOR and ORDER lines');
    }

    return requireMapped(IntakeSource.NORDIC, {
      patient: {
        first_name: patient[1],
        last_name: patient[2],
        mrn: patient[3],
        date_of_birth: patient[4].replace(/\//g, '-'),
        primary_diagnosis_code: order[2],
        additional_diagnosis_codes: splitList(order[3], ';'),
        medication_history: [],
      },
      provider: {
        name: doctor[1],
        npi: doctor[2],
      },
      order: {
        medication_name: order[1],
        clinical_notes: '',
      },
      confirm_not_duplicate: order[4].toUpperCase() === 'CONFIRMED',
    });
  },
};

// ---------------------------------------------------------------------------
// pharmacorp: XML
//   <PharmacyOrder>
//     <Patient> GivenName, SurName, MedRecordNum, DateOfBirth (MM-DD-YYYY)
//     <Prescriber> FullName, NationalProviderId
//     <ClinicalInfo> DrugName, PrimaryDiagCode
//     <OtherDiagCodes> Code*
// ---------------------------------------------------------------------------

const pharmacorpParser = new XMLParser({
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === 'Code',
});

/** MM-DD-YYYY to YYYY-MM-DD; anything else is left for field validation. */
function usDateToIso(value: string): string {
  const match = /^(\d{2})-(\d{2})-(\d{4})$/.exec(value);
  return match ? `${match[3]}-${match[1]}-${match[2]}` : value;
}

export const pharmacorpAdapter: IntakeAdapter = {
  source: IntakeSource.PHARMACORP,
  toSubmission(raw) {
    const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
    if (typeof text !== 'string' || text.trim().length === 0) {
      throw new AdapterError(IntakeSource.PHARMACORP, 'expected an XML body');
    }

    const valid = XMLValidator.validate(text);
    if (valid !== true) {
      throw new AdapterError(
        IntakeSource.PHARMACORP,
        `invalid XML at line ${valid.err.line}: ${valid.err.msg}`,
      );
    }

    const parsed: unknown = pharmacorpParser.parse(text);
    const root = isRecord(parsed) ? parsed.PharmacyOrder : undefined;
    if (!isRecord(root)) {
      throw new AdapterError(IntakeSource.PHARMACORP, 'expected a PharmacyOrder root element');
    }

    const patient = child(root, 'Patient');
    const prescriber = child(root, 'Prescriber');
    const clinical = child(root, 'ClinicalInfo');
    const codes = child(root, 'OtherDiagCodes').Code;

    return requireMapped(IntakeSource.PHARMACORP, {
      patient: {
        first_name: str(patient, 'GivenName'),
        last_name: str(patient, 'SurName'),
        mrn: str(patient, 'MedRecordNum'),
        date_of_birth: usDateToIso(str(patient, 'DateOfBirth')),
        primary_diagnosis_code: str(clinical, 'PrimaryDiagCode'),
        additional_diagnosis_codes: Array.isArray(codes)
          ? codes.filter((code): code is string => typeof code === 'string' && code.length > 0)
          : [],
        medication_history: [],
      },
      provider: {
        name: str(prescriber, 'FullName'),
        npi: str(prescriber, 'NationalProviderId'),
      },
      order: {
        medication_name: str(clinical, 'DrugName'),
        clinical_notes: '',
      },
      confirm_not_duplicate: false,
    });
  },
};

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

const ADAPTERS: ReadonlyMap<string, IntakeAdapter> = new Map(
  [webAdapter, clinicBAdapter, nordicAdapter, pharmacorpAdapter].map((adapter): [string, IntakeAdapter] => [adapter.source, adapter]),
);

export function getAdapter(source: string): IntakeAdapter {
  const adapter = ADAPTERS.get(source);
  if (!adapter) {
    throw new ValidationError(
      `Unknown intake source '${source}'. Available: ${[...ADAPTERS.keys()].join(', ')}`,
      [{ field: 'source', message: 'Unknown intake source' }],
      IntakeErrorCode.UNKNOWN_SOURCE,
    );
  }
  return adapter;
}
