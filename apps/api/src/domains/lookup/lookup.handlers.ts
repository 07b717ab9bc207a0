import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type MrnParam, type NpiParam } from '@careplan/shared/schemas/order.schema.js';
import {
  getPatientByMrn,
  getPatientHistory,
  getProviderByNpi,
  type LookupServiceDeps,
} from './lookup.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface LookupHandlerDeps {
  serviceDeps: LookupServiceDeps;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createLookupHandlers(deps: LookupHandlerDeps) {
  const { serviceDeps } = deps;

  async function patientByMrnHandler(
    request: FastifyRequest<{ Params: MrnParam }>,
    reply: FastifyReply,
  ) {
    const patient = await getPatientByMrn(serviceDeps, request.params.mrn);
    return reply.code(200).send({ data: patient });
  }

  async function patientHistoryHandler(
    request: FastifyRequest<{ Params: MrnParam }>,
    reply: FastifyReply,
  ) {
    const history = await getPatientHistory(serviceDeps, request.params.mrn);
    return reply.code(200).send({ data: history });
  }

  async function providerByNpiHandler(
    request: FastifyRequest<{ Params: NpiParam }>,
    reply: FastifyReply,
  ) {
    const provider = await getProviderByNpi(serviceDeps, request.params.npi);
    return reply.code(200).send({ data: provider });
  }

  return {
    patientByMrnHandler,
    patientHistoryHandler,
    providerByNpiHandler,
  };
}
