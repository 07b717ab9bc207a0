import { describe, it, expect, beforeEach } from 'vitest';
import { OrderStatus } from '@careplan/shared/constants/order.constants.js';
import { NotFoundError } from '../../lib/errors.js';
import { createInMemoryStore, type InMemoryStore } from '../../../test/helpers/in-memory-store.js';
import {
  OTHER_VALID_NPI,
  VALID_NPI,
  seedCompletedOrder,
  seedOrder,
} from '../../../test/helpers/fixtures.js';
import {
  getPatientByMrn,
  getPatientHistory,
  getProviderByNpi,
  type LookupServiceDeps,
} from './lookup.service.js';

let store: InMemoryStore;
let deps: LookupServiceDeps;

beforeEach(() => {
  store = createInMemoryStore();
  deps = { repo: store.repo };
});

describe('getPatientByMrn', () => {
  it('returns the patient with clinical fields', async () => {
    const order = await seedOrder(store);
    await store.repo.updatePatientClinical(order.patientId, {
      sex: 'F',
      weightKg: '68.5',
      allergies: 'Penicillin',
      primaryDiagnosisCode: 'G70.01',
      additionalDiagnosisCodes: ['I10'],
      medicationHistory: ['pyridostigmine 60 mg'],
    });

    expect(await getPatientByMrn(deps, '100200')).toEqual({
      mrn: '100200',
      first_name: 'Jane',
      last_name: 'Doe',
      date_of_birth: '1979-06-08',
      sex: 'F',
      weight_kg: 68.5,
      allergies: 'Penicillin',
      primary_diagnosis_code: 'G70.01',
      additional_diagnosis_codes: ['I10'],
      medication_history: ['pyridostigmine 60 mg'],
      created_at: expect.any(String),
      updated_at: expect.any(String),
    });
  });

  it('reports an unknown MRN as not found', async () => {
    await expect(getPatientByMrn(deps, '999999')).rejects.toThrow(NotFoundError);
    await expect(getPatientByMrn(deps, '999999')).rejects.toThrow('Patient not found');
  });
});

describe('getProviderByNpi', () => {
  it('returns the registered provider', async () => {
    await seedOrder(store);
    const provider = await getProviderByNpi(deps, VALID_NPI);
    expect(provider).toEqual({ npi: VALID_NPI, name: 'Dr. Ada Lane', created_at: expect.any(String) });
  });

  it('reports an unknown NPI as not found', async () => {
    await expect(getProviderByNpi(deps, OTHER_VALID_NPI)).rejects.toThrow('Provider not found');
  });
});

describe('getPatientHistory', () => {
  it('lists every order for the patient, newest first', async () => {
    const first = await seedCompletedOrder(store, {
      createdAt: new Date('2026-03-02T10:00:00.000Z'),
    });
    const second = await seedOrder(store, {
      medicationName: 'Rituximab',
      npi: OTHER_VALID_NPI,
      createdAt: new Date('2026-03-05T10:00:00.000Z'),
    });
    await seedOrder(store, { mrn: '300400' });

    const history = await getPatientHistory(deps, '100200');

    expect(history.patient.mrn).toBe('100200');
    expect(
      history.orders.map((o) => [o.order_id, o.medication_name, o.status, o.document_available]),
    ).toEqual([
      [second.orderId, 'Rituximab', OrderStatus.PENDING, false],
      [first.orderId, 'IVIG', OrderStatus.COMPLETED, true],
    ]);
    expect(history.orders[0].provider).toEqual({ npi: OTHER_VALID_NPI, name: 'Dr. Ada Lane' });
  });

  it('returns an empty list for a patient without orders', async () => {
    await store.repo.insertPatient({
      mrn: '555666',
      firstName: 'Ola',
      lastName: 'Berg',
      dateOfBirth: '1990-01-01',
      primaryDiagnosisCode: 'I10',
    });
    expect((await getPatientHistory(deps, '555666')).orders).toEqual([]);
  });

  it('reports an unknown MRN as not found', async () => {
    await expect(getPatientHistory(deps, '999999')).rejects.toThrow('Patient not found');
  });
});
