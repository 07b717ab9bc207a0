import { type FastifyInstance } from 'fastify';
import { mrnParamSchema, npiParamSchema } from '@careplan/shared/schemas/order.schema.js';
import { createLookupHandlers, type LookupHandlerDeps } from './lookup.handlers.js';

// ---------------------------------------------------------------------------
// Lookup Routes
// ---------------------------------------------------------------------------

export async function lookupRoutes(
  app: FastifyInstance,
  opts: { deps: LookupHandlerDeps },
) {
  const handlers = createLookupHandlers(opts.deps);

  app.get('/api/v1/patients/by-mrn/:mrn', {
    schema: { params: mrnParamSchema },
    handler: handlers.patientByMrnHandler,
  });

  app.get('/api/v1/patients/by-mrn/:mrn/history', {
    schema: { params: mrnParamSchema },
    handler: handlers.patientHistoryHandler,
  });

  app.get('/api/v1/providers/by-npi/:npi', {
    schema: { params: npiParamSchema },
    handler: handlers.providerByNpiHandler,
  });
}
