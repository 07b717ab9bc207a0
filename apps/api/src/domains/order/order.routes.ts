import { type FastifyInstance } from 'fastify';
import {
  exportOrdersQuerySchema,
  listOrdersQuerySchema,
  orderIdParamSchema,
} from '@careplan/shared/schemas/order.schema.js';
import { createOrderHandlers, type OrderHandlerDeps } from './order.handlers.js';
import { exportRateLimit } from '../../plugins/rate-limit.plugin.js';

// ---------------------------------------------------------------------------
// Order Routes
// ---------------------------------------------------------------------------

export async function orderRoutes(
  app: FastifyInstance,
  opts: { deps: OrderHandlerDeps },
) {
  const handlers = createOrderHandlers(opts.deps);

  // =========================================================================
  // Collection routes (registered before /:id to avoid param conflicts)
  // =========================================================================

  app.get('/api/v1/orders', {
    schema: { querystring: listOrdersQuerySchema },
    handler: handlers.listOrdersHandler,
  });

  app.get('/api/v1/orders/export', {
    schema: { querystring: exportOrdersQuerySchema },
    config: { rateLimit: exportRateLimit() },
    handler: handlers.exportHandler,
  });

  // =========================================================================
  // Single order
  // =========================================================================

  app.get('/api/v1/orders/:id', {
    schema: { params: orderIdParamSchema },
    handler: handlers.getOrderHandler,
  });

  app.get('/api/v1/orders/:id/status', {
    schema: { params: orderIdParamSchema },
    handler: handlers.getStatusHandler,
  });

  app.get('/api/v1/orders/:id/document', {
    schema: { params: orderIdParamSchema },
    handler: handlers.getDocumentHandler,
  });

  app.get('/api/v1/orders/:id/document/download', {
    schema: { params: orderIdParamSchema },
    handler: handlers.downloadDocumentHandler,
  });

  app.post('/api/v1/orders/:id/regenerate', {
    schema: { params: orderIdParamSchema },
    handler: handlers.regenerateHandler,
  });
}
