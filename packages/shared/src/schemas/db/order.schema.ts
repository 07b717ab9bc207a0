// ============================================================================
// Order Intake — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  date,
  text,
  integer,
  decimal,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// --- Providers Table ---
// NPI is the sole identity key. Same NPI with a different name is a hard
// conflict at intake; the unique index is the backstop for concurrent inserts.

export const providers = pgTable(
  'providers',
  {
    providerId: uuid('provider_id').primaryKey().defaultRandom(),
    npi: varchar('npi', { length: 10 }).notNull(),
    name: varchar('name', { length: 200 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [uniqueIndex('providers_npi_unique_idx').on(table.npi)],
);

// --- Patients Table ---
// MRN is the identity key. (first_name, last_name, date_of_birth) is indexed
// for the cross-MRN duplicate check.

export const patients = pgTable(
  'patients',
  {
    patientId: uuid('patient_id').primaryKey().defaultRandom(),
    mrn: varchar('mrn', { length: 6 }).notNull(),
    firstName: varchar('first_name', { length: 100 }).notNull(),
    lastName: varchar('last_name', { length: 100 }).notNull(),
    dateOfBirth: date('date_of_birth', { mode: 'string' }).notNull(),
    sex: varchar('sex', { length: 1 }),
    weightKg: decimal('weight_kg', { precision: 5, scale: 1 }),
    allergies: text('allergies'),
    primaryDiagnosisCode: varchar('primary_diagnosis_code', { length: 10 }).notNull(),
    additionalDiagnosisCodes: jsonb('additional_diagnosis_codes')
      .$type<string[]>()
      .notNull()
      .default([]),
    medicationHistory: jsonb('medication_history')
      .$type<string[]>()
      .notNull()
      .default([]),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('patients_mrn_unique_idx').on(table.mrn),
    index('patients_name_dob_idx').on(
      table.lastName,
      table.firstName,
      table.dateOfBirth,
    ),
  ],
);

// --- Orders Table ---
// Diagnoses and medication history are snapshotted at submission. job_id is
// the queue message currently allowed to process the order; status writes
// are conditional on it.

export const orders = pgTable(
  'orders',
  {
    orderId: uuid('order_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => patients.patientId),
    providerId: uuid('provider_id')
      .notNull()
      .references(() => providers.providerId),
    medicationName: varchar('medication_name', { length: 200 }).notNull(),
    primaryDiagnosisCode: varchar('primary_diagnosis_code', { length: 10 }).notNull(),
    additionalDiagnosisCodes: jsonb('additional_diagnosis_codes')
      .$type<string[]>()
      .notNull()
      .default([]),
    medicationHistory: jsonb('medication_history')
      .$type<string[]>()
      .notNull()
      .default([]),
    clinicalNotes: text('clinical_notes').notNull().default(''),
    source: varchar('source', { length: 20 }).notNull().default('web'),
    status: varchar('status', { length: 20 }).notNull().default('pending'),
    jobId: uuid('job_id'),
    errorMessage: varchar('error_message', { length: 500 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('orders_patient_medication_idx').on(
      table.patientId,
      table.medicationName,
    ),
    index('orders_status_idx').on(table.status),
    index('orders_created_at_idx').on(table.createdAt),
  ],
);

// --- Generated Documents Table ---
// At most one row per order. Exists iff the order is completed.

export const generatedDocuments = pgTable(
  'generated_documents',
  {
    documentId: uuid('document_id').primaryKey().defaultRandom(),
    orderId: uuid('order_id')
      .notNull()
      .references(() => orders.orderId, { onDelete: 'cascade' }),
    content: text('content').notNull(),
    model: varchar('model', { length: 100 }).notNull(),
    promptTokens: integer('prompt_tokens'),
    completionTokens: integer('completion_tokens'),
    generationTimeMs: integer('generation_time_ms').notNull(),
    generatedAt: timestamp('generated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [uniqueIndex('generated_documents_order_unique_idx').on(table.orderId)],
);

// --- Inferred Types ---

export type InsertProvider = typeof providers.$inferInsert;
export type SelectProvider = typeof providers.$inferSelect;
export type InsertPatient = typeof patients.$inferInsert;
export type SelectPatient = typeof patients.$inferSelect;
export type InsertOrder = typeof orders.$inferInsert;
export type SelectOrder = typeof orders.$inferSelect;
export type InsertGeneratedDocument = typeof generatedDocuments.$inferInsert;
export type SelectGeneratedDocument = typeof generatedDocuments.$inferSelect;
