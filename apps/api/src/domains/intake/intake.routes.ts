import { type FastifyInstance } from 'fastify';
import { intakeSourceParamSchema } from '@careplan/shared/schemas/order.schema.js';
import { createIntakeHandlers, type IntakeHandlerDeps } from './intake.handlers.js';
import { intakeRateLimit } from '../../plugins/rate-limit.plugin.js';

// ---------------------------------------------------------------------------
// Intake Routes
// Bodies are validated by the intake service so adapter output and canonical
// JSON report field errors the same way.
// ---------------------------------------------------------------------------

export async function intakeRoutes(
  app: FastifyInstance,
  opts: { deps: IntakeHandlerDeps },
) {
  const handlers = createIntakeHandlers(opts.deps);

  // XML partners (pharmacorp). The adapter parses the raw text.
  app.addContentTypeParser(
    ['application/xml', 'text/xml'],
    { parseAs: 'string' },
    (_request, body, done) => {
      done(null, body);
    },
  );

  app.post('/api/v1/orders', {
    config: { rateLimit: intakeRateLimit() },
    handler: handlers.createOrderHandler,
  });

  app.post('/api/v1/orders/intake/:source', {
    schema: { params: intakeSourceParamSchema },
    config: { rateLimit: intakeRateLimit() },
    handler: handlers.sourceIntakeHandler,
  });
}
