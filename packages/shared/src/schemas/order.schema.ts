// ============================================================================
// Order Intake — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { ORDER_STATUSES, PatientSex } from '../constants/order.constants.js';
import {
  validateIcd10,
  validateMrn,
  validateNpi,
  type IdentifierValidation,
} from '../utils/identifier.utils.js';

// --- Enum Value Arrays ---

const SEXES = [PatientSex.MALE, PatientSex.FEMALE, PatientSex.OTHER] as const;

// --- Identifier refinements ---

function identifier(check: (value: string) => IdentifierValidation) {
  return (value: string, ctx: z.RefinementCtx) => {
    const result = check(value);
    if (!result.valid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error ?? 'Invalid identifier',
      });
    }
  };
}

const npiField = z.string().trim().superRefine(identifier(validateNpi));
const mrnField = z.string().trim().superRefine(identifier(validateMrn));
const icd10Field = z.string().trim().superRefine(identifier(validateIcd10));

function todayUtc(): string {
  return new Date().toISOString().slice(0, 10);
}

// ============================================================================
// Order Submission (canonical intake payload)
// ============================================================================

export const orderPatientSchema = z.object({
  first_name: z.string().trim().min(1).max(100),
  last_name: z.string().trim().min(1).max(100),
  mrn: mrnField,
  date_of_birth: z
    .string()
    .date()
    .refine((dob) => dob <= todayUtc(), {
      message: 'Date of birth cannot be in the future',
    }),
  sex: z.enum(SEXES).optional().nullable(),
  weight_kg: z.number().positive().max(1000).optional().nullable(),
  allergies: z.string().max(2000).optional().nullable(),
  primary_diagnosis_code: icd10Field,
  additional_diagnosis_codes: z.array(icd10Field).max(20).default([]),
  medication_history: z.array(z.string().trim().min(1).max(200)).max(100).default([]),
});

export const orderProviderSchema = z.object({
  name: z.string().trim().min(1).max(200),
  npi: npiField,
});

export const orderDetailsSchema = z.object({
  medication_name: z.string().trim().min(1).max(200),
  clinical_notes: z.string().max(20_000).default(''),
});

export const createOrderSchema = z.object({
  patient: orderPatientSchema,
  provider: orderProviderSchema,
  order: orderDetailsSchema,
  confirm_not_duplicate: z.boolean().default(false),
});

export type CreateOrder = z.infer<typeof createOrderSchema>;
export type CreateOrderInput = z.input<typeof createOrderSchema>;

// --- Intake Source Parameter ---

export const intakeSourceParamSchema = z.object({
  source: z.string().min(1).max(50),
});

export type IntakeSourceParam = z.infer<typeof intakeSourceParamSchema>;

// ============================================================================
// Order Reads
// ============================================================================

// --- Order ID Parameter ---

export const orderIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type OrderIdParam = z.infer<typeof orderIdParamSchema>;

// --- List / Search ---

export const listOrdersQuerySchema = z.object({
  search: z.string().trim().max(100).optional(),
  status: z.enum(ORDER_STATUSES).optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListOrdersQuery = z.infer<typeof listOrdersQuerySchema>;

// --- CSV Export ---

const dayRange = {
  start_date: z.string().date().optional(),
  end_date: z.string().date().optional(),
};

function rangeInOrder(q: { start_date?: string; end_date?: string }): boolean {
  return !q.start_date || !q.end_date || q.start_date <= q.end_date;
}

const RANGE_ORDER_ISSUE = {
  message: 'start_date must be on or before end_date',
  path: ['start_date'],
};

export const exportOrdersQuerySchema = z
  .object({
    status: z.enum(ORDER_STATUSES).optional(),
    ...dayRange,
    provider_npi: z.string().regex(/^\d{10}$/).optional(),
  })
  .refine(rangeInOrder, RANGE_ORDER_ISSUE);

export type ExportOrdersQuery = z.infer<typeof exportOrdersQuerySchema>;

// ============================================================================
// Lookups
// ============================================================================

export const mrnParamSchema = z.object({
  mrn: mrnField,
});

export type MrnParam = z.infer<typeof mrnParamSchema>;

export const npiParamSchema = z.object({
  npi: npiField,
});

export type NpiParam = z.infer<typeof npiParamSchema>;

// ============================================================================
// Reports
// ============================================================================

export const reportRangeQuerySchema = z.object(dayRange).refine(rangeInOrder, RANGE_ORDER_ISSUE);

export type ReportRangeQuery = z.infer<typeof reportRangeQuerySchema>;
