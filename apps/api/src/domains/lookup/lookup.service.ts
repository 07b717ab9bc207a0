import type { SelectPatient, SelectProvider } from '@careplan/shared/schemas/db/order.schema.js';
import type { OrderRepository } from '../order/order.repository.js';
import { toOrderView, type OrderView } from '../order/order.service.js';
import { NotFoundError } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface LookupServiceDeps {
  repo: OrderRepository;
}

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

export interface PatientView {
  mrn: string;
  first_name: string;
  last_name: string;
  date_of_birth: string;
  sex: string | null;
  weight_kg: number | null;
  allergies: string | null;
  primary_diagnosis_code: string;
  additional_diagnosis_codes: string[];
  medication_history: string[];
  created_at: string;
  updated_at: string;
}

export interface ProviderView {
  npi: string;
  name: string;
  created_at: string;
}

export interface PatientHistoryView {
  patient: PatientView;
  orders: OrderView[];
}

export function toPatientView(patient: SelectPatient): PatientView {
  return {
    mrn: patient.mrn,
    first_name: patient.firstName,
    last_name: patient.lastName,
    date_of_birth: patient.dateOfBirth,
    sex: patient.sex,
    weight_kg: patient.weightKg === null ? null : Number(patient.weightKg),
    allergies: patient.allergies,
    primary_diagnosis_code: patient.primaryDiagnosisCode,
    additional_diagnosis_codes: patient.additionalDiagnosisCodes,
    medication_history: patient.medicationHistory,
    created_at: patient.createdAt.toISOString(),
    updated_at: patient.updatedAt.toISOString(),
  };
}

function toProviderView(provider: SelectProvider): ProviderView {
  return {
    npi: provider.npi,
    name: provider.name,
    created_at: provider.createdAt.toISOString(),
  };
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

async function requirePatient(deps: LookupServiceDeps, mrn: string): Promise<SelectPatient> {
  const patient = await deps.repo.findPatientByMrn(mrn);
  if (!patient) {
    throw new NotFoundError('Patient');
  }
  return patient;
}

export async function getPatientByMrn(deps: LookupServiceDeps, mrn: string): Promise<PatientView> {
  return toPatientView(await requirePatient(deps, mrn));
}

export async function getProviderByNpi(deps: LookupServiceDeps, npi: string): Promise<ProviderView> {
  const provider = await deps.repo.findProviderByNpi(npi);
  if (!provider) {
    throw new NotFoundError('Provider');
  }
  return toProviderView(provider);
}

/** The patient and every order placed for them, newest first. */
export async function getPatientHistory(
  deps: LookupServiceDeps,
  mrn: string,
): Promise<PatientHistoryView> {
  const patient = await requirePatient(deps, mrn);
  const rows = await deps.repo.listOrdersForPatient(patient.patientId);
  return {
    patient: toPatientView(patient),
    orders: rows.map(toOrderView),
  };
}
