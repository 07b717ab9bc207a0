import { randomUUID } from 'node:crypto';
import { vi } from 'vitest';
import { OrderStatus } from '@careplan/shared/constants/order.constants.js';
import type { CreateOrderInput } from '@careplan/shared/schemas/order.schema.js';
import type { SelectOrder } from '@careplan/shared/schemas/db/order.schema.js';
import type { AuditEntry, AuditRepo, EventEmitter } from '../../src/lib/audit.js';
import { createLogger, type Logger } from '../../src/lib/logger.js';
import type { InMemoryStore } from './in-memory-store.js';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export function silentLogger(): Logger {
  return createLogger({ name: 'test', level: 'silent' });
}

export interface AuditRecorder extends AuditRepo {
  entries: AuditEntry[];
  actions(): string[];
}

export function createAuditRecorder(): AuditRecorder {
  const entries: AuditEntry[] = [];
  return {
    entries,
    actions: () => entries.map((e) => e.action),
    async appendAuditLog(entry) {
      entries.push(entry);
    },
  };
}

export function createEventSpy() {
  const emit = vi.fn<EventEmitter['emit']>();
  const events: EventEmitter = { emit };
  return { events, emit };
}

// ---------------------------------------------------------------------------
// Submissions
// ---------------------------------------------------------------------------

export const VALID_NPI = '1234567893';
export const OTHER_VALID_NPI = '1245319599';

export function submission(overrides: {
  patient?: Partial<CreateOrderInput['patient']>;
  provider?: Partial<CreateOrderInput['provider']>;
  order?: Partial<CreateOrderInput['order']>;
  confirm_not_duplicate?: boolean;
} = {}): CreateOrderInput {
  return {
    patient: {
      first_name: 'Jane',
      last_name: 'Doe',
      mrn: '100200',
      date_of_birth: '1979-06-08',
      sex: 'F',
      weight_kg: 68.5,
      allergies: 'None known',
      primary_diagnosis_code: 'G70.01',
      additional_diagnosis_codes: ['I10'],
      medication_history: ['pyridostigmine 60 mg'],
      ...overrides.patient,
    },
    provider: {
      name: 'Dr. Ada Lane',
      npi: VALID_NPI,
      ...overrides.provider,
    },
    order: {
      medication_name: 'IVIG',
      clinical_notes: 'Progressive weakness over two weeks.',
      ...overrides.order,
    },
    confirm_not_duplicate: overrides.confirm_not_duplicate ?? false,
  };
}

// ---------------------------------------------------------------------------
// Stored rows
// ---------------------------------------------------------------------------

export interface SeedOrderOptions {
  status?: OrderStatus;
  jobId?: string | null;
  mrn?: string;
  npi?: string;
  medicationName?: string;
  createdAt?: Date;
}

/** Insert a provider, a patient and one order directly into committed state. */
export async function seedOrder(
  store: InMemoryStore,
  opts: SeedOrderOptions = {},
): Promise<SelectOrder> {
  const npi = opts.npi ?? VALID_NPI;
  const provider =
    (await store.repo.findProviderByNpi(npi)) ??
    (await store.repo.insertProvider({ npi, name: 'Dr. Ada Lane' }));

  const mrn = opts.mrn ?? '100200';
  const patient =
    (await store.repo.findPatientByMrn(mrn)) ??
    (await store.repo.insertPatient({
      mrn,
      firstName: 'Jane',
      lastName: 'Doe',
      dateOfBirth: '1979-06-08',
      primaryDiagnosisCode: 'G70.01',
    }));

  return store.repo.insertOrder({
    patientId: patient.patientId,
    providerId: provider.providerId,
    medicationName: opts.medicationName ?? 'IVIG',
    primaryDiagnosisCode: 'G70.01',
    additionalDiagnosisCodes: ['I10'],
    medicationHistory: ['pyridostigmine 60 mg'],
    status: opts.status ?? OrderStatus.PENDING,
    jobId: opts.jobId === undefined ? randomUUID() : opts.jobId,
    createdAt: opts.createdAt,
    updatedAt: opts.createdAt,
  });
}

/** `seedOrder`, then completed with a document under its own job id. */
export async function seedCompletedOrder(
  store: InMemoryStore,
  opts: Omit<SeedOrderOptions, 'status' | 'jobId'> = {},
  content = 'PLAN',
): Promise<SelectOrder> {
  const order = await seedOrder(store, { ...opts, status: OrderStatus.PROCESSING });
  const completed = await store.repo.completeOrder(order.orderId, order.jobId ?? '', {
    content,
    model: 'test-model',
    generationTimeMs: 1000,
  });
  if (!completed) throw new Error('seed completion failed');
  return order;
}
