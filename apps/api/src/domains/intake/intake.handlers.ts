import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type IntakeSourceParam } from '@careplan/shared/schemas/order.schema.js';
import {
  submitFromSource,
  submitOrder,
  type IntakeResult,
  type IntakeServiceDeps,
} from './intake.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface IntakeHandlerDeps {
  serviceDeps: IntakeServiceDeps;
}

const ORDERS_BASE_PATH = '/api/v1/orders';

function toCreatedBody(result: IntakeResult) {
  const orderId = result.order.orderId;
  return {
    data: {
      order_id: orderId,
      status: result.order.status,
      status_url: `${ORDERS_BASE_PATH}/${orderId}/status`,
      document_url: `${ORDERS_BASE_PATH}/${orderId}/document`,
      confirmed_warnings: result.confirmedWarnings,
    },
    notices: result.notices,
  };
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createIntakeHandlers(deps: IntakeHandlerDeps) {
  const { serviceDeps } = deps;

  async function createOrderHandler(request: FastifyRequest, reply: FastifyReply) {
    const result = await submitOrder(serviceDeps, request.body);
    return reply.code(201).send(toCreatedBody(result));
  }

  async function sourceIntakeHandler(
    request: FastifyRequest<{ Params: IntakeSourceParam }>,
    reply: FastifyReply,
  ) {
    const result = await submitFromSource(serviceDeps, request.params.source, request.body);
    return reply.code(201).send(toCreatedBody(result));
  }

  return {
    createOrderHandler,
    sourceIntakeHandler,
  };
}
