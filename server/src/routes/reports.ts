import type { FastifyInstance } from 'fastify';
import { getInvoiceReport } from '../services/reportService.js';
import type { InvoiceReportQuery } from '@studio-ledger/shared';
import { issuedDateRangeProperties } from './schemas.js';

const invoiceReportSchema = {
  querystring: {
    type: 'object',
    properties: issuedDateRangeProperties,
    additionalProperties: false,
  },
};

export default async function reportRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/reports/invoices
   * One row per invoice in the issued-date window, with client, package and
   * shoot context and the derived payment status.
   */
  fastify.get<{ Querystring: InvoiceReportQuery }>(
    '/invoices',
    { schema: invoiceReportSchema },
    async (request, reply) => {
      const rows = getInvoiceReport(fastify.db, request.query);
      return reply.status(200).send({ rows });
    },
  );
}
