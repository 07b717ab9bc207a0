// ============================================================================
// Care plan prompt
// Diagnoses and medication history come from the order snapshot, never from
// the current patient row, so a regenerate reproduces the original inputs.
// ============================================================================

import type { OrderDetail } from '../order/order.repository.js';
import type { ChatMessage } from './generation.llm.js';

export const CARE_PLAN_SYSTEM_PROMPT = `You are a clinical pharmacist writing a pharmaceutical care plan for a specialty pharmacy order.
Write plain text with exactly these four headed sections, in this order:

1. Problem List / Drug Therapy Problems
2. Goals
3. Pharmacist Interventions
4. Monitoring Plan & Lab Schedule

Be specific to the medication and diagnoses provided. Do not invent patient data.`;

function bulletList(items: readonly string[], empty: string): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : [`- ${empty}`];
}

export function buildCarePlanPrompt(detail: OrderDetail): string {
  const { order, patient, provider } = detail;

  const lines = [
    'Generate a pharmaceutical care plan for the following order.',
    '',
    '## PATIENT',
    `- Name: ${patient.firstName} ${patient.lastName}`,
    `- MRN: ${patient.mrn}`,
    `- DOB: ${patient.dateOfBirth}`,
    `- Sex: ${patient.sex ?? 'Not provided'}`,
    `- Weight: ${patient.weightKg ? `${patient.weightKg} kg` : 'Not provided'}`,
    `- Allergies: ${patient.allergies || 'None known'}`,
    '',
    '## PROVIDER',
    `- ${provider.name} (NPI: ${provider.npi})`,
    '',
    '## MEDICATION',
    `- ${order.medicationName}`,
    '',
    '## DIAGNOSES',
    `- Primary (ICD-10): ${order.primaryDiagnosisCode}`,
    ...bulletList(order.additionalDiagnosisCodes, 'No additional diagnoses'),
    '',
    '## MEDICATION HISTORY',
    ...bulletList(order.medicationHistory, 'None documented'),
    '',
    '## CLINICAL NOTES',
    order.clinicalNotes.trim() || 'None provided',
  ];

  return lines.join('\n');
}

export function buildCarePlanMessages(detail: OrderDetail): ChatMessage[] {
  return [
    { role: 'system', content: CARE_PLAN_SYSTEM_PROMPT },
    { role: 'user', content: buildCarePlanPrompt(detail) },
  ];
}
