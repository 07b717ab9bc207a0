import { eq, and, or, sql, desc, count, gte, lt, ilike, inArray, type SQL } from 'drizzle-orm';
import { type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { type PgDatabase } from 'drizzle-orm/pg-core';
import {
  providers,
  patients,
  orders,
  generatedDocuments,
  type InsertProvider,
  type SelectProvider,
  type InsertPatient,
  type SelectPatient,
  type InsertOrder,
  type SelectOrder,
  type InsertGeneratedDocument,
  type SelectGeneratedDocument,
} from '@careplan/shared/schemas/db/order.schema.js';
import { OrderEvent, OrderStatus } from '@careplan/shared/constants/order.constants.js';
import { transitionFor } from './order.state.js';

/** A Drizzle handle or an open transaction on one. */
export type Database = PgDatabase<NodePgQueryResultHKT>;

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface PaginatedResult<T> {
  data: T[];
  pagination: {
    total: number;
    page: number;
    pageSize: number;
    hasMore: boolean;
  };
}

export interface OrderDetail {
  order: SelectOrder;
  patient: SelectPatient;
  provider: SelectProvider;
}

export interface OrderExportRow extends OrderDetail {
  document: SelectGeneratedDocument | null;
}

export interface PriorOrder {
  orderId: string;
  createdAt: Date;
}

export interface PendingOrderRef {
  orderId: string;
  jobId: string | null;
}

export type PatientClinicalUpdate = Pick<
  InsertPatient,
  | 'sex'
  | 'weightKg'
  | 'allergies'
  | 'primaryDiagnosisCode'
  | 'additionalDiagnosisCodes'
  | 'medicationHistory'
>;

export type DocumentWrite = Omit<InsertGeneratedDocument, 'documentId' | 'orderId'>;

export interface OrderListFilter {
  search?: string;
  status?: OrderStatus;
  page: number;
  pageSize: number;
}

/** Inclusive UTC days, `YYYY-MM-DD`. */
export interface DayRange {
  startDate?: string;
  endDate?: string;
}

export interface OrderExportFilter extends DayRange {
  status?: OrderStatus;
  providerNpi?: string;
}

// ---------------------------------------------------------------------------
// Shared conditions
// ---------------------------------------------------------------------------

function startOfUtcDay(day: string, addDays = 0): Date {
  const date = new Date(`${day}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + addDays);
  return date;
}

/** orders.created_at within the range; empty when the range is open. */
export function orderCreatedWithin(range: DayRange): SQL[] {
  const conditions: SQL[] = [];
  if (range.startDate) {
    conditions.push(gte(orders.createdAt, startOfUtcDay(range.startDate)));
  }
  if (range.endDate) {
    conditions.push(lt(orders.createdAt, startOfUtcDay(range.endDate, 1)));
  }
  return conditions;
}

// ---------------------------------------------------------------------------
// Order Repository
// ---------------------------------------------------------------------------

export function createOrderRepository(db: Database) {
  const detailColumns = { order: orders, patient: patients, provider: providers };

  return {
    // =======================================================================
    // Providers
    // =======================================================================

    async findProviderByNpi(npi: string): Promise<SelectProvider | undefined> {
      const rows = await db
        .select()
        .from(providers)
        .where(eq(providers.npi, npi))
        .limit(1);
      return rows[0];
    },

    /** Raises a unique violation (23505) if the NPI was committed concurrently. */
    async insertProvider(data: InsertProvider): Promise<SelectProvider> {
      const rows = await db.insert(providers).values(data).returning();
      return rows[0];
    },

    // =======================================================================
    // Patients
    // =======================================================================

    async findPatientByMrn(mrn: string): Promise<SelectPatient | undefined> {
      const rows = await db
        .select()
        .from(patients)
        .where(eq(patients.mrn, mrn))
        .limit(1);
      return rows[0];
    },

    /**
     * Row lock on the patient until the transaction ends. Serializes intake
     * for one patient so the same-day duplicate check sees committed orders.
     */
    async lockPatientForUpdate(patientId: string): Promise<void> {
      await db
        .select({ patientId: patients.patientId })
        .from(patients)
        .where(eq(patients.patientId, patientId))
        .for('update');
    },

    /** Patients with exactly this (first, last, DOB), under any MRN. */
    async findPatientsByIdentity(
      firstName: string,
      lastName: string,
      dateOfBirth: string,
    ): Promise<SelectPatient[]> {
      return db
        .select()
        .from(patients)
        .where(
          and(
            eq(patients.firstName, firstName),
            eq(patients.lastName, lastName),
            eq(patients.dateOfBirth, dateOfBirth),
          ),
        );
    },

    /** Raises a unique violation (23505) if the MRN was committed concurrently. */
    async insertPatient(data: InsertPatient): Promise<SelectPatient> {
      const rows = await db.insert(patients).values(data).returning();
      return rows[0];
    },

    /** Refresh non-identity attributes. Name and DOB are never touched. */
    async updatePatientClinical(
      patientId: string,
      data: PatientClinicalUpdate,
    ): Promise<SelectPatient | undefined> {
      const rows = await db
        .update(patients)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(patients.patientId, patientId))
        .returning();
      return rows[0];
    },

    // =======================================================================
    // Orders
    // =======================================================================

    async insertOrder(data: InsertOrder): Promise<SelectOrder> {
      const rows = await db.insert(orders).values(data).returning();
      return rows[0];
    },

    /** Orders for this patient and medication, compared case-insensitively. */
    async findOrdersForPatientMedication(
      patientId: string,
      medicationName: string,
    ): Promise<PriorOrder[]> {
      return db
        .select({ orderId: orders.orderId, createdAt: orders.createdAt })
        .from(orders)
        .where(
          and(
            eq(orders.patientId, patientId),
            sql`lower(${orders.medicationName}) = lower(${medicationName})`,
          ),
        )
        .orderBy(desc(orders.createdAt));
    },

    async findOrderById(orderId: string): Promise<SelectOrder | undefined> {
      const rows = await db
        .select()
        .from(orders)
        .where(eq(orders.orderId, orderId))
        .limit(1);
      return rows[0];
    },

    async findOrderDetail(orderId: string): Promise<OrderDetail | undefined> {
      const rows = await db
        .select(detailColumns)
        .from(orders)
        .innerJoin(patients, eq(orders.patientId, patients.patientId))
        .innerJoin(providers, eq(orders.providerId, providers.providerId))
        .where(eq(orders.orderId, orderId))
        .limit(1);
      return rows[0];
    },

    async listOrders(filter: OrderListFilter): Promise<PaginatedResult<OrderDetail>> {
      const conditions: SQL[] = [];
      if (filter.status) {
        conditions.push(eq(orders.status, filter.status));
      }
      if (filter.search) {
        const term = `%${filter.search}%`;
        const match = or(
          ilike(patients.firstName, term),
          ilike(patients.lastName, term),
          ilike(patients.mrn, term),
          ilike(orders.medicationName, term),
        );
        if (match) conditions.push(match);
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;
      const offset = (filter.page - 1) * filter.pageSize;

      const [rows, totals] = await Promise.all([
        db
          .select(detailColumns)
          .from(orders)
          .innerJoin(patients, eq(orders.patientId, patients.patientId))
          .innerJoin(providers, eq(orders.providerId, providers.providerId))
          .where(where)
          .orderBy(desc(orders.createdAt))
          .limit(filter.pageSize)
          .offset(offset),
        db
          .select({ total: count() })
          .from(orders)
          .innerJoin(patients, eq(orders.patientId, patients.patientId))
          .where(where),
      ]);

      const total = totals[0]?.total ?? 0;
      return {
        data: rows,
        pagination: {
          total,
          page: filter.page,
          pageSize: filter.pageSize,
          hasMore: offset + rows.length < total,
        },
      };
    },

    /** Orders with their document (if any), newest first. Dates are UTC days, inclusive. */
    async exportOrders(filter: OrderExportFilter): Promise<OrderExportRow[]> {
      const conditions: SQL[] = orderCreatedWithin(filter);
      if (filter.status) {
        conditions.push(eq(orders.status, filter.status));
      }
      if (filter.providerNpi) {
        conditions.push(eq(providers.npi, filter.providerNpi));
      }

      return db
        .select({ ...detailColumns, document: generatedDocuments })
        .from(orders)
        .innerJoin(patients, eq(orders.patientId, patients.patientId))
        .innerJoin(providers, eq(orders.providerId, providers.providerId))
        .leftJoin(generatedDocuments, eq(generatedDocuments.orderId, orders.orderId))
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(orders.createdAt));
    },

    /** Every order for one patient with its document (if any), newest first. */
    async listOrdersForPatient(patientId: string): Promise<OrderExportRow[]> {
      return db
        .select({ ...detailColumns, document: generatedDocuments })
        .from(orders)
        .innerJoin(patients, eq(orders.patientId, patients.patientId))
        .innerJoin(providers, eq(orders.providerId, providers.providerId))
        .leftJoin(generatedDocuments, eq(generatedDocuments.orderId, orders.orderId))
        .where(eq(orders.patientId, patientId))
        .orderBy(desc(orders.createdAt));
    },

    /** Pending orders, for re-enqueueing after a restart. */
    async findPendingOrders(limit: number): Promise<PendingOrderRef[]> {
      return db
        .select({ orderId: orders.orderId, jobId: orders.jobId })
        .from(orders)
        .where(eq(orders.status, OrderStatus.PENDING))
        .orderBy(orders.createdAt)
        .limit(limit);
    },

    // =======================================================================
    // Conditional status writes
    // An undefined / false result means the row was not in a `from` state
    // (or belonged to another job): a lost race, not an error.
    // =======================================================================

    /**
     * CLAIM: pending → processing, or re-claim of a processing order
     * (redelivery after a crash). Either way job_id must be this message.
     */
    async claimOrder(orderId: string, messageId: string): Promise<SelectOrder | undefined> {
      const claim = transitionFor(OrderEvent.CLAIM);
      const rows = await db
        .update(orders)
        .set({ status: claim.to, updatedAt: new Date() })
        .where(
          and(
            eq(orders.orderId, orderId),
            eq(orders.jobId, messageId),
            inArray(orders.status, [...claim.from, OrderStatus.PROCESSING]),
          ),
        )
        .returning();
      return rows[0];
    },

    /** COMPLETE and upsert the document in one transaction, guarded by job_id. */
    async completeOrder(orderId: string, jobId: string, document: DocumentWrite): Promise<boolean> {
      const complete = transitionFor(OrderEvent.COMPLETE);
      return db.transaction(async (tx) => {
        const rows = await tx
          .update(orders)
          .set({ status: complete.to, errorMessage: null, updatedAt: new Date() })
          .where(
            and(
              eq(orders.orderId, orderId),
              eq(orders.jobId, jobId),
              inArray(orders.status, [...complete.from]),
            ),
          )
          .returning({ orderId: orders.orderId });
        if (rows.length === 0) {
          return false;
        }
        await tx
          .insert(generatedDocuments)
          .values({ ...document, orderId })
          .onConflictDoUpdate({
            target: generatedDocuments.orderId,
            set: {
              content: document.content,
              model: document.model,
              promptTokens: document.promptTokens ?? null,
              completionTokens: document.completionTokens ?? null,
              generationTimeMs: document.generationTimeMs,
              generatedAt: document.generatedAt ?? new Date(),
            },
          });
        return true;
      });
    },

    /** FAIL, guarded by job_id. `errorMessage` must already be sanitized. */
    async failOrder(orderId: string, jobId: string, errorMessage: string): Promise<boolean> {
      const fail = transitionFor(OrderEvent.FAIL);
      const rows = await db
        .update(orders)
        .set({ status: fail.to, errorMessage, updatedAt: new Date() })
        .where(
          and(
            eq(orders.orderId, orderId),
            eq(orders.jobId, jobId),
            inArray(orders.status, [...fail.from]),
          ),
        )
        .returning({ orderId: orders.orderId });
      return rows.length > 0;
    },

    /**
     * REGENERATE: completed/failed → pending with a fresh job_id, error
     * cleared and document deleted, in one transaction.
     */
    async requestRegeneration(orderId: string, jobId: string): Promise<SelectOrder | undefined> {
      const regenerate = transitionFor(OrderEvent.REGENERATE);
      return db.transaction(async (tx) => {
        const rows = await tx
          .update(orders)
          .set({ status: regenerate.to, jobId, errorMessage: null, updatedAt: new Date() })
          .where(
            and(
              eq(orders.orderId, orderId),
              inArray(orders.status, [...regenerate.from]),
            ),
          )
          .returning();
        const updated = rows[0];
        if (updated) {
          await tx.delete(generatedDocuments).where(eq(generatedDocuments.orderId, orderId));
        }
        return updated;
      });
    },

    // =======================================================================
    // Documents
    // =======================================================================

    async findDocumentByOrderId(orderId: string): Promise<SelectGeneratedDocument | undefined> {
      const rows = await db
        .select()
        .from(generatedDocuments)
        .where(eq(generatedDocuments.orderId, orderId))
        .limit(1);
      return rows[0];
    },
  };
}

export type OrderRepository = ReturnType<typeof createOrderRepository>;

// ---------------------------------------------------------------------------
// Transaction runner
// ---------------------------------------------------------------------------

export interface TransactionRunner {
  /** Run `fn` in one READ COMMITTED transaction with a repository bound to it. */
  run<T>(fn: (repo: OrderRepository) => Promise<T>): Promise<T>;
}

export function createTransactionRunner(db: Database): TransactionRunner {
  return {
    async run<T>(fn: (repo: OrderRepository) => Promise<T>): Promise<T> {
      return db.transaction(
        async (tx) => fn(createOrderRepository(tx)),
        { isolationLevel: 'read committed' },
      );
    },
  };
}
