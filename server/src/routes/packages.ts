import type { FastifyInstance } from 'fastify';
import * as packageService from '../services/packageService.js';
import type {
  CreatePackageRequest,
  PackageListQuery,
  UpdatePackageRequest,
} from '@studio-ledger/shared';
import { MONEY, idParamsSchema, listQuerySchema } from './schemas.js';

const createPackageSchema = {
  body: {
    type: 'object',
    required: ['name', 'price'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 100 },
      description: { type: ['string', 'null'], maxLength: 255 },
      price: MONEY,
      isActive: { type: 'boolean' },
    },
    additionalProperties: false,
  },
};

const updatePackageSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 100 },
      description: { type: ['string', 'null'], maxLength: 255 },
      price: MONEY,
      isActive: { type: 'boolean' },
    },
    additionalProperties: false,
    minProperties: 1,
  },
  ...idParamsSchema,
};

export default async function packageRoutes(fastify: FastifyInstance) {
  fastify.get<{ Querystring: PackageListQuery }>(
    '/',
    { schema: listQuerySchema },
    async (request, reply) => {
      const result = packageService.listPackages(fastify.db, request.query);
      return reply.status(200).send(result);
    },
  );

  /**
   * POST /api/packages
   * Returns 409 CONFLICT when the name is already used by another package.
   */
  fastify.post<{ Body: CreatePackageRequest }>(
    '/',
    { schema: createPackageSchema },
    async (request, reply) => {
      const pkg = packageService.createPackage(fastify.db, request.body);
      return reply.status(201).send({ package: pkg });
    },
  );

  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      const pkg = packageService.getPackageById(fastify.db, request.params.id);
      return reply.status(200).send({ package: pkg });
    },
  );

  fastify.patch<{ Params: { id: number }; Body: UpdatePackageRequest }>(
    '/:id',
    { schema: updatePackageSchema },
    async (request, reply) => {
      const pkg = packageService.updatePackage(fastify.db, request.params.id, request.body);
      return reply.status(200).send({ package: pkg });
    },
  );

  /**
   * DELETE /api/packages/:id
   * Invoices that referenced the package have their packageId cleared.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      packageService.deletePackage(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}
