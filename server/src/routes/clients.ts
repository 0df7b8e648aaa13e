import type { FastifyInstance } from 'fastify';
import * as clientService from '../services/clientService.js';
import type {
  ClientListQuery,
  CreateClientRequest,
  UpdateClientRequest,
} from '@studio-ledger/shared';
import { idParamsSchema, listQuerySchema } from './schemas.js';

// JSON schema for POST /api/clients (create client)
const createClientSchema = {
  body: {
    type: 'object',
    required: ['name', 'email'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 120 },
      email: { type: 'string', format: 'email', maxLength: 255 },
      phone: { type: ['string', 'null'], maxLength: 50 },
    },
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/clients/:id (update client)
const updateClientSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 120 },
      email: { type: 'string', format: 'email', maxLength: 255 },
      phone: { type: ['string', 'null'], maxLength: 50 },
    },
    additionalProperties: false,
    minProperties: 1,
  },
  ...idParamsSchema,
};

export default async function clientRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/clients
   * List clients ordered by id ascending.
   */
  fastify.get<{ Querystring: ClientListQuery }>(
    '/',
    { schema: listQuerySchema },
    async (request, reply) => {
      const result = clientService.listClients(fastify.db, request.query);
      return reply.status(200).send(result);
    },
  );

  /**
   * POST /api/clients
   * Create a client. Returns 409 DUPLICATE_EMAIL if the email is taken.
   */
  fastify.post<{ Body: CreateClientRequest }>(
    '/',
    { schema: createClientSchema },
    async (request, reply) => {
      const client = clientService.createClient(fastify.db, request.body);
      return reply.status(201).send({ client });
    },
  );

  /**
   * GET /api/clients/:id
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      const client = clientService.getClientById(fastify.db, request.params.id);
      return reply.status(200).send({ client });
    },
  );

  /**
   * PATCH /api/clients/:id
   * Partial update; only fields present in the body change.
   */
  fastify.patch<{ Params: { id: number }; Body: UpdateClientRequest }>(
    '/:id',
    { schema: updateClientSchema },
    async (request, reply) => {
      const client = clientService.updateClient(fastify.db, request.params.id, request.body);
      return reply.status(200).send({ client });
    },
  );

  /**
   * DELETE /api/clients/:id
   * Deletes the client with its shoots, invoices and their payments.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      clientService.deleteClient(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}
