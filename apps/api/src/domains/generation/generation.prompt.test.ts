import { describe, it, expect } from 'vitest';
import { createInMemoryStore } from '../../../test/helpers/in-memory-store.js';
import { seedOrder } from '../../../test/helpers/fixtures.js';
import type { OrderDetail } from '../order/order.repository.js';
import {
  CARE_PLAN_SYSTEM_PROMPT,
  buildCarePlanMessages,
  buildCarePlanPrompt,
} from './generation.prompt.js';

async function seededDetail(): Promise<OrderDetail> {
  const store = createInMemoryStore();
  const order = await seedOrder(store, { medicationName: 'IVIG' });
  const detail = await store.repo.findOrderDetail(order.orderId);
  if (!detail) throw new Error('seeded order missing');
  return detail;
}

describe('buildCarePlanPrompt', () => {
  it('lays out patient, provider, medication and history sections', async () => {
    const detail = await seededDetail();

    expect(buildCarePlanPrompt(detail)).toBe(
      [
        'Generate a pharmaceutical care plan for the following order.',
        '',
        '## PATIENT',
        '- Name: Jane Doe',
        '- MRN: 100200',
        '- DOB: 1979-06-08',
        '- Sex: Not provided',
        '- Weight: Not provided',
        '- Allergies: None known',
        '',
        '## PROVIDER',
        '- Dr. Ada Lane (NPI: 1234567893)',
        '',
        '## MEDICATION',
        '- IVIG',
        '',
        '## DIAGNOSES',
        '- Primary (ICD-10): G70.01',
        '- I10',
        '',
        '## MEDICATION HISTORY',
        '- pyridostigmine 60 mg',
        '',
        '## CLINICAL NOTES',
        'None provided',
      ].join('\n'),
    );
  });

  it('reads diagnoses from the order rather than the current patient row', async () => {
    const detail = await seededDetail();
    const prompt = buildCarePlanPrompt({
      ...detail,
      patient: {
        ...detail.patient,
        sex: 'F',
        weightKg: '68.5',
        primaryDiagnosisCode: 'E11.65',
        additionalDiagnosisCodes: [],
      },
      order: { ...detail.order, additionalDiagnosisCodes: [], clinicalNotes: '  Weakness.  ' },
    });

    expect(prompt).toContain('- Sex: F\n- Weight: 68.5 kg\n');
    expect(prompt).toContain('- Primary (ICD-10): G70.01\n- No additional diagnoses\n');
    expect(prompt.endsWith('## CLINICAL NOTES\nWeakness.')).toBe(true);
  });
});

describe('buildCarePlanMessages', () => {
  it('pairs the system prompt with the order prompt', async () => {
    const detail = await seededDetail();
    expect(buildCarePlanMessages(detail)).toEqual([
      { role: 'system', content: CARE_PLAN_SYSTEM_PROMPT },
      { role: 'user', content: buildCarePlanPrompt(detail) },
    ]);
  });
});
