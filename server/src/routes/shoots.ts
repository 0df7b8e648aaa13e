import type { FastifyInstance } from 'fastify';
import * as shootService from '../services/shootService.js';
import type { CreateShootRequest, ShootListQuery, UpdateShootRequest } from '@studio-ledger/shared';
import { ENTITY_ID, ISO_DATE, idParamsSchema, listQuerySchema } from './schemas.js';

const createShootSchema = {
  body: {
    type: 'object',
    required: ['clientId', 'shootDate'],
    properties: {
      clientId: ENTITY_ID,
      shootDate: ISO_DATE,
      location: { type: ['string', 'null'], maxLength: 255 },
    },
    additionalProperties: false,
  },
};

const updateShootSchema = {
  body: {
    type: 'object',
    properties: {
      shootDate: ISO_DATE,
      location: { type: ['string', 'null'], maxLength: 255 },
    },
    additionalProperties: false,
    minProperties: 1,
  },
  ...idParamsSchema,
};

export default async function shootRoutes(fastify: FastifyInstance) {
  fastify.get<{ Querystring: ShootListQuery }>(
    '/',
    { schema: listQuerySchema },
    async (request, reply) => {
      const result = shootService.listShoots(fastify.db, request.query);
      return reply.status(200).send(result);
    },
  );

  /**
   * POST /api/shoots
   * Returns 422 REFERENCE_NOT_FOUND if the client does not exist.
   */
  fastify.post<{ Body: CreateShootRequest }>(
    '/',
    { schema: createShootSchema },
    async (request, reply) => {
      const shoot = shootService.createShoot(fastify.db, request.body);
      return reply.status(201).send({ shoot });
    },
  );

  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      const shoot = shootService.getShootById(fastify.db, request.params.id);
      return reply.status(200).send({ shoot });
    },
  );

  fastify.patch<{ Params: { id: number }; Body: UpdateShootRequest }>(
    '/:id',
    { schema: updateShootSchema },
    async (request, reply) => {
      const shoot = shootService.updateShoot(fastify.db, request.params.id, request.body);
      return reply.status(200).send({ shoot });
    },
  );

  /**
   * DELETE /api/shoots/:id
   * Invoices that referenced the shoot have their shootId cleared.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      shootService.deleteShoot(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}
