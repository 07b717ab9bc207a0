import { type FastifyInstance } from 'fastify';
import {
  mrnParamSchema,
  reportRangeQuerySchema,
} from '@careplan/shared/schemas/order.schema.js';
import { createReportHandlers, type ReportHandlerDeps } from './report.handlers.js';
import { exportRateLimit } from '../../plugins/rate-limit.plugin.js';

// ---------------------------------------------------------------------------
// Report Routes
// CSV downloads; each shares the export rate limit tier.
// ---------------------------------------------------------------------------

export async function reportRoutes(
  app: FastifyInstance,
  opts: { deps: ReportHandlerDeps },
) {
  const handlers = createReportHandlers(opts.deps);

  app.get('/api/v1/reports/providers/export', {
    schema: { querystring: reportRangeQuerySchema },
    config: { rateLimit: exportRateLimit() },
    handler: handlers.providerSummaryHandler,
  });

  app.get('/api/v1/reports/medications/export', {
    schema: { querystring: reportRangeQuerySchema },
    config: { rateLimit: exportRateLimit() },
    handler: handlers.medicationSummaryHandler,
  });

  app.get('/api/v1/reports/patients/:mrn/export', {
    schema: { params: mrnParamSchema },
    config: { rateLimit: exportRateLimit() },
    handler: handlers.patientHistoryHandler,
  });
}
