import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type MrnParam,
  type ReportRangeQuery,
} from '@careplan/shared/schemas/order.schema.js';
import {
  exportMedicationSummaryCsv,
  exportPatientHistoryCsv,
  exportProviderSummaryCsv,
  type ReportServiceDeps,
} from './report.service.js';
import { contentDisposition, type CsvExport } from '../../lib/download.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface ReportHandlerDeps {
  serviceDeps: ReportServiceDeps;
}

function sendCsv(reply: FastifyReply, result: CsvExport) {
  return reply
    .code(200)
    .header('Content-Type', 'text/csv; charset=utf-8')
    .header('Content-Disposition', contentDisposition(result.filename))
    .send(result.csv);
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createReportHandlers(deps: ReportHandlerDeps) {
  const { serviceDeps } = deps;

  async function providerSummaryHandler(
    request: FastifyRequest<{ Querystring: ReportRangeQuery }>,
    reply: FastifyReply,
  ) {
    return sendCsv(reply, await exportProviderSummaryCsv(serviceDeps, request.query));
  }

  async function medicationSummaryHandler(
    request: FastifyRequest<{ Querystring: ReportRangeQuery }>,
    reply: FastifyReply,
  ) {
    return sendCsv(reply, await exportMedicationSummaryCsv(serviceDeps, request.query));
  }

  async function patientHistoryHandler(
    request: FastifyRequest<{ Params: MrnParam }>,
    reply: FastifyReply,
  ) {
    return sendCsv(reply, await exportPatientHistoryCsv(serviceDeps, request.params.mrn));
  }

  return {
    providerSummaryHandler,
    medicationSummaryHandler,
    patientHistoryHandler,
  };
}
