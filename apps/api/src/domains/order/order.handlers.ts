import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type ExportOrdersQuery,
  type ListOrdersQuery,
  type OrderIdParam,
} from '@careplan/shared/schemas/order.schema.js';
import {
  downloadDocument,
  exportOrdersCsv,
  getDocument,
  getOrder,
  getOrderStatus,
  listOrders,
  regenerateOrder,
  type OrderServiceDeps,
} from './order.service.js';
import { contentDisposition } from '../../lib/download.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface OrderHandlerDeps {
  serviceDeps: OrderServiceDeps;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createOrderHandlers(deps: OrderHandlerDeps) {
  const { serviceDeps } = deps;

  // =========================================================================
  // Reads
  // =========================================================================

  async function listOrdersHandler(
    request: FastifyRequest<{ Querystring: ListOrdersQuery }>,
    reply: FastifyReply,
  ) {
    const result = await listOrders(serviceDeps, request.query);
    return reply.code(200).send(result);
  }

  async function getOrderHandler(
    request: FastifyRequest<{ Params: OrderIdParam }>,
    reply: FastifyReply,
  ) {
    const order = await getOrder(serviceDeps, request.params.id);
    return reply.code(200).send({ data: order });
  }

  async function getStatusHandler(
    request: FastifyRequest<{ Params: OrderIdParam }>,
    reply: FastifyReply,
  ) {
    const status = await getOrderStatus(serviceDeps, request.params.id);
    return reply.code(200).send({ data: status });
  }

  // =========================================================================
  // Documents
  // =========================================================================

  async function getDocumentHandler(
    request: FastifyRequest<{ Params: OrderIdParam }>,
    reply: FastifyReply,
  ) {
    const document = await getDocument(serviceDeps, request.params.id);
    return reply.code(200).send({ data: document });
  }

  async function downloadDocumentHandler(
    request: FastifyRequest<{ Params: OrderIdParam }>,
    reply: FastifyReply,
  ) {
    const download = await downloadDocument(serviceDeps, request.params.id);
    return reply
      .code(200)
      .header('Content-Type', 'text/plain; charset=utf-8')
      .header('Content-Disposition', contentDisposition(download.filename))
      .send(download.body);
  }

  // =========================================================================
  // Regenerate
  // =========================================================================

  async function regenerateHandler(
    request: FastifyRequest<{ Params: OrderIdParam }>,
    reply: FastifyReply,
  ) {
    const status = await regenerateOrder(serviceDeps, request.params.id);
    return reply.code(202).send({ data: status });
  }

  // =========================================================================
  // Export
  // =========================================================================

  async function exportHandler(
    request: FastifyRequest<{ Querystring: ExportOrdersQuery }>,
    reply: FastifyReply,
  ) {
    const result = await exportOrdersCsv(serviceDeps, request.query);
    return reply
      .code(200)
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', contentDisposition(result.filename))
      .send(result.csv);
  }

  return {
    listOrdersHandler,
    getOrderHandler,
    getStatusHandler,
    getDocumentHandler,
    downloadDocumentHandler,
    regenerateHandler,
    exportHandler,
  };
}
