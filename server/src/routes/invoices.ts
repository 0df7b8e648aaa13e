import type { FastifyInstance } from 'fastify';
import * as invoiceService from '../services/invoiceService.js';
import type {
  CreateInvoiceRequest,
  InvoiceListQuery,
  UpdateInvoiceRequest,
} from '@studio-ledger/shared';
import {
  ENTITY_ID,
  ISO_DATE,
  MONEY,
  idParamsSchema,
  issuedDateRangeProperties,
  paginationProperties,
} from './schemas.js';

const NULLABLE_ID = { type: ['integer', 'null'], minimum: 1 } as const;
const NULLABLE_DATE = { type: ['string', 'null'], pattern: ISO_DATE.pattern } as const;

// JSON schema for GET /api/invoices (list with issued-date window)
const listInvoicesSchema = {
  querystring: {
    type: 'object',
    properties: {
      ...paginationProperties,
      ...issuedDateRangeProperties,
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/invoices (create invoice)
const createInvoiceSchema = {
  body: {
    type: 'object',
    required: ['clientId', 'amount', 'issuedDate'],
    properties: {
      clientId: ENTITY_ID,
      shootId: NULLABLE_ID,
      packageId: NULLABLE_ID,
      amount: MONEY,
      status: { type: 'string', minLength: 1, maxLength: 20 },
      issuedDate: ISO_DATE,
      dueDate: NULLABLE_DATE,
    },
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/invoices/:id (update invoice)
const updateInvoiceSchema = {
  body: {
    type: 'object',
    properties: {
      shootId: NULLABLE_ID,
      packageId: NULLABLE_ID,
      amount: MONEY,
      status: { type: 'string', minLength: 1, maxLength: 20 },
      issuedDate: ISO_DATE,
      dueDate: NULLABLE_DATE,
    },
    additionalProperties: false,
    minProperties: 1,
  },
  ...idParamsSchema,
};

export default async function invoiceRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/invoices
   * Newest issued first. `date_from` and `date_to` are inclusive.
   */
  fastify.get<{ Querystring: InvoiceListQuery }>(
    '/',
    { schema: listInvoicesSchema },
    async (request, reply) => {
      const result = invoiceService.listInvoices(fastify.db, request.query);
      return reply.status(200).send(result);
    },
  );

  /**
   * POST /api/invoices
   * Returns 422 REFERENCE_NOT_FOUND when the client, shoot or package is missing.
   */
  fastify.post<{ Body: CreateInvoiceRequest }>(
    '/',
    { schema: createInvoiceSchema },
    async (request, reply) => {
      const invoice = invoiceService.createInvoice(fastify.db, request.body);
      return reply.status(201).send({ invoice });
    },
  );

  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      const invoice = invoiceService.getInvoiceById(fastify.db, request.params.id);
      return reply.status(200).send({ invoice });
    },
  );

  /**
   * GET /api/invoices/:id/summary
   * Amount, paid total, balance and derived payment status.
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id/summary',
    { schema: idParamsSchema },
    async (request, reply) => {
      const summary = invoiceService.getInvoiceSummary(fastify.db, request.params.id);
      return reply.status(200).send({ summary });
    },
  );

  /**
   * PATCH /api/invoices/:id
   * Lowering the amount below what has already been paid returns 409 OVERPAYMENT.
   */
  fastify.patch<{ Params: { id: number }; Body: UpdateInvoiceRequest }>(
    '/:id',
    { schema: updateInvoiceSchema },
    async (request, reply) => {
      const invoice = invoiceService.updateInvoice(fastify.db, request.params.id, request.body);
      return reply.status(200).send({ invoice });
    },
  );

  /**
   * DELETE /api/invoices/:id
   * Payments on the invoice are deleted with it.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      invoiceService.deleteInvoice(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}
