import { OrderAuditAction, OrderStatus } from '@careplan/shared/constants/order.constants.js';
import type { ReportRangeQuery } from '@careplan/shared/schemas/order.schema.js';
import type { DayRange, OrderExportRow, OrderRepository } from '../order/order.repository.js';
import type { AuditRepo } from '../../lib/audit.js';
import { NotFoundError } from '../../lib/errors.js';
import { buildCsv, type CsvExport } from '../../lib/download.js';
import { utcDay } from '../intake/intake.classifier.js';
import type {
  MedicationSummaryRow,
  ProviderSummaryRow,
  ReportRepository,
} from './report.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface ReportServiceDeps {
  reports: ReportRepository;
  repo: OrderRepository;
  auditRepo: AuditRepo;
}

const AUDIT_CATEGORY = 'report';

export const PROVIDER_SUMMARY_HEADERS = [
  'provider_npi',
  'provider_name',
  'total_orders',
  'unique_patients',
  'completed_care_plans',
  'completion_rate_pct',
] as const;

export const MEDICATION_SUMMARY_HEADERS = [
  'medication',
  'total_orders',
  'unique_patients',
  'unique_providers',
] as const;

export const PATIENT_HISTORY_HEADERS = [
  'order_date',
  'medication',
  'provider',
  'provider_npi',
  'status',
  'care_plan_generated',
] as const;

function toDayRange(query: ReportRangeQuery): DayRange {
  return { startDate: query.start_date, endDate: query.end_date };
}

/** Percentage to one decimal place; `0.0` when there are no orders. */
export function completionRate(completed: number, total: number): string {
  return total > 0 ? ((completed / total) * 100).toFixed(1) : '0.0';
}

async function recordExport(
  deps: Pick<ReportServiceDeps, 'auditRepo'>,
  report: string,
  detail: Record<string, unknown>,
  resourceId: string | null = null,
): Promise<void> {
  await deps.auditRepo.appendAuditLog({
    action: OrderAuditAction.REPORT_EXPORTED,
    category: AUDIT_CATEGORY,
    resourceType: report,
    resourceId,
    detail,
  });
}

// ---------------------------------------------------------------------------
// Provider summary
// ---------------------------------------------------------------------------

export function buildProviderSummaryCsv(rows: readonly ProviderSummaryRow[]): string {
  return buildCsv(
    PROVIDER_SUMMARY_HEADERS,
    rows.map((row) => [
      row.npi,
      row.name,
      row.totalOrders,
      row.uniquePatients,
      row.completedCarePlans,
      completionRate(row.completedCarePlans, row.totalOrders),
    ]),
  );
}

export async function exportProviderSummaryCsv(
  deps: Pick<ReportServiceDeps, 'reports' | 'auditRepo'>,
  query: ReportRangeQuery,
): Promise<CsvExport> {
  const rows = await deps.reports.providerSummary(toDayRange(query));
  await recordExport(deps, 'provider_summary', { filters: { ...query }, rowCount: rows.length });
  return {
    filename: `provider_report_${utcDay(new Date())}.csv`,
    csv: buildProviderSummaryCsv(rows),
    rowCount: rows.length,
  };
}

// ---------------------------------------------------------------------------
// Medication summary
// ---------------------------------------------------------------------------

export function buildMedicationSummaryCsv(rows: readonly MedicationSummaryRow[]): string {
  return buildCsv(
    MEDICATION_SUMMARY_HEADERS,
    rows.map((row) => [row.medicationName, row.totalOrders, row.uniquePatients, row.uniqueProviders]),
  );
}

export async function exportMedicationSummaryCsv(
  deps: Pick<ReportServiceDeps, 'reports' | 'auditRepo'>,
  query: ReportRangeQuery,
): Promise<CsvExport> {
  const rows = await deps.reports.medicationSummary(toDayRange(query));
  await recordExport(deps, 'medication_summary', { filters: { ...query }, rowCount: rows.length });
  return {
    filename: `medication_summary_${utcDay(new Date())}.csv`,
    csv: buildMedicationSummaryCsv(rows),
    rowCount: rows.length,
  };
}

// ---------------------------------------------------------------------------
// Patient history
// ---------------------------------------------------------------------------

export function buildPatientHistoryCsv(rows: readonly OrderExportRow[]): string {
  return buildCsv(
    PATIENT_HISTORY_HEADERS,
    rows.map(({ order, provider, document }) => [
      utcDay(order.createdAt),
      order.medicationName,
      provider.name,
      provider.npi,
      order.status,
      document && order.status === OrderStatus.COMPLETED ? 'Yes' : 'No',
    ]),
  );
}

export async function exportPatientHistoryCsv(
  deps: Pick<ReportServiceDeps, 'repo' | 'auditRepo'>,
  mrn: string,
): Promise<CsvExport> {
  const patient = await deps.repo.findPatientByMrn(mrn);
  if (!patient) {
    throw new NotFoundError('Patient');
  }

  const rows = await deps.repo.listOrdersForPatient(patient.patientId);
  await recordExport(deps, 'patient_history', { rowCount: rows.length }, patient.patientId);

  return {
    filename: `patient_${mrn}_history_${utcDay(new Date())}.csv`,
    csv: buildPatientHistoryCsv(rows),
    rowCount: rows.length,
  };
}
