import { eq, and, asc, desc, count, countDistinct } from 'drizzle-orm';
import {
  providers,
  orders,
  generatedDocuments,
} from '@careplan/shared/schemas/db/order.schema.js';
import { orderCreatedWithin, type Database, type DayRange } from '../order/order.repository.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface ProviderSummaryRow {
  npi: string;
  name: string;
  totalOrders: number;
  uniquePatients: number;
  completedCarePlans: number;
}

export interface MedicationSummaryRow {
  medicationName: string;
  totalOrders: number;
  uniquePatients: number;
  uniqueProviders: number;
}

// ---------------------------------------------------------------------------
// Report Repository
// Aggregates over orders created in a day range. Providers and medications
// without orders in the range do not appear.
// ---------------------------------------------------------------------------

export function createReportRepository(db: Database) {
  return {
    /** Busiest providers first, then by NPI. */
    async providerSummary(range: DayRange): Promise<ProviderSummaryRow[]> {
      const conditions = orderCreatedWithin(range);
      const totalOrders = count(orders.orderId);

      return db
        .select({
          npi: providers.npi,
          name: providers.name,
          totalOrders,
          uniquePatients: countDistinct(orders.patientId),
          completedCarePlans: count(generatedDocuments.documentId),
        })
        .from(providers)
        .innerJoin(orders, eq(orders.providerId, providers.providerId))
        .leftJoin(generatedDocuments, eq(generatedDocuments.orderId, orders.orderId))
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .groupBy(providers.providerId, providers.npi, providers.name)
        .orderBy(desc(totalOrders), asc(providers.npi));
    },

    /** Grouped on the name as entered; most ordered first, then by name. */
    async medicationSummary(range: DayRange): Promise<MedicationSummaryRow[]> {
      const conditions = orderCreatedWithin(range);
      const totalOrders = count(orders.orderId);

      return db
        .select({
          medicationName: orders.medicationName,
          totalOrders,
          uniquePatients: countDistinct(orders.patientId),
          uniqueProviders: countDistinct(orders.providerId),
        })
        .from(orders)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .groupBy(orders.medicationName)
        .orderBy(desc(totalOrders), asc(orders.medicationName));
    },
  };
}

export type ReportRepository = ReturnType<typeof createReportRepository>;
