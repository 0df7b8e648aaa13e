import type { FastifyInstance } from 'fastify';
import * as paymentService from '../services/paymentService.js';
import type { CreatePaymentRequest, PaymentListQuery } from '@studio-ledger/shared';
import {
  ENTITY_ID,
  ISO_TIMESTAMP,
  SIGNED_MONEY,
  idParamsSchema,
  listQuerySchema,
} from './schemas.js';

const createPaymentSchema = {
  body: {
    type: 'object',
    required: ['invoiceId', 'amount'],
    properties: {
      invoiceId: ENTITY_ID,
      amount: SIGNED_MONEY,
      method: { type: ['string', 'null'], maxLength: 50 },
      paidAt: ISO_TIMESTAMP,
    },
    additionalProperties: false,
  },
};

export default async function paymentRoutes(fastify: FastifyInstance) {
  fastify.get<{ Querystring: PaymentListQuery }>(
    '/',
    { schema: listQuerySchema },
    async (request, reply) => {
      const result = paymentService.listPayments(fastify.db, request.query);
      return reply.status(200).send(result);
    },
  );

  /**
   * POST /api/payments
   * Returns 400 INVALID_AMOUNT for a zero or negative amount, 404 NOT_FOUND for
   * an unknown invoice and 409 OVERPAYMENT when the remaining balance is exceeded.
   */
  fastify.post<{ Body: CreatePaymentRequest }>(
    '/',
    { schema: createPaymentSchema },
    async (request, reply) => {
      const payment = paymentService.createPayment(fastify.db, request.body);
      return reply.status(201).send({ payment });
    },
  );

  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      const payment = paymentService.getPaymentById(fastify.db, request.params.id);
      return reply.status(200).send({ payment });
    },
  );

  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: idParamsSchema },
    async (request, reply) => {
      paymentService.deletePayment(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}
