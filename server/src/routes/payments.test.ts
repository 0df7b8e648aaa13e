import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import type {
  ApiErrorResponse,
  CreatePaymentRequest,
  InvoiceSummaryResponse,
  PaymentListResponse,
  PaymentResponse,
} from '@studio-ledger/shared';
import { buildApp } from '../app.js';
import { createClient } from '../services/clientService.js';
import { createInvoice } from '../services/invoiceService.js';
import { openDatabase } from '../plugins/db.js';

describe('Payment Routes', () => {
  let app: FastifyInstance;
  let tempDir: string;
  let originalEnv: NodeJS.ProcessEnv;
  let invoiceId: number;

  beforeEach(async () => {
    originalEnv = { ...process.env };
    tempDir = mkdtempSync(join(tmpdir(), 'studio-ledger-payments-'));
    process.env.DATABASE_URL = join(tempDir, 'test.db');

    app = await buildApp();
    const client = createClient(app.db, { name: 'Ana Silva', email: 'ana@example.com' });
    invoiceId = createInvoice(app.db, {
      clientId: client.id,
      amount: '100.00',
      issuedDate: '2026-01-10',
    }).id;
  });

  afterEach(async () => {
    await app.close();
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  async function postPayment(body: CreatePaymentRequest) {
    return app.inject({ method: 'POST', url: '/api/payments', payload: body });
  }

  async function summaryStatus(): Promise<string> {
    const response = await app.inject({
      method: 'GET',
      url: `/api/invoices/${invoiceId}/summary`,
    });
    return response.json<InvoiceSummaryResponse>().summary.status;
  }

  it('settles an invoice across two payments and refuses a third', async () => {
    const first = await postPayment({ invoiceId, amount: '60', method: 'card' });
    expect(first.statusCode).toBe(201);
    expect(await summaryStatus()).toBe('partial');

    const second = await postPayment({ invoiceId, amount: '40' });
    expect(second.statusCode).toBe(201);
    expect(await summaryStatus()).toBe('paid');

    const third = await postPayment({ invoiceId, amount: '1' });
    expect(third.statusCode).toBe(409);
    expect(third.json<ApiErrorResponse>().error).toEqual({
      code: 'OVERPAYMENT',
      message: 'Payment of 1.00 exceeds the remaining balance of 0.00',
      details: { invoiceId, amount: '100.00', totalPaid: '100.00', attempted: '1.00' },
    });
  });

  it('accepts only one of two concurrent payments that each fit alone', async () => {
    const responses = await Promise.all([
      postPayment({ invoiceId, amount: '60' }),
      postPayment({ invoiceId, amount: '60' }),
    ]);

    expect(responses.map((r) => r.statusCode).sort()).toEqual([201, 409]);
    const list = await app.inject({ method: 'GET', url: '/api/payments' });
    expect(list.json<PaymentListResponse>().pagination.totalItems).toBe(1);
  });

  describe('with a second connection to the same database file', () => {
    let other: ReturnType<typeof openDatabase>;

    beforeEach(() => {
      other = openDatabase(join(tempDir, 'test.db'));
    });

    afterEach(() => {
      other.close();
    });

    function insertDirectly(amountCents: number) {
      other
        .prepare('INSERT INTO payments (invoice_id, amount_cents, paid_at) VALUES (?, ?, ?)')
        .run(invoiceId, amountCents, '2026-01-12T00:00:00.000Z');
    }

    it('counts payments written by the other connection', async () => {
      insertDirectly(6000);

      const response = await postPayment({ invoiceId, amount: '60' });

      expect(response.statusCode).toBe(409);
      expect(response.json<ApiErrorResponse>().error).toEqual({
        code: 'OVERPAYMENT',
        message: 'Payment of 60.00 exceeds the remaining balance of 40.00',
        details: { invoiceId, amount: '100.00', totalPaid: '60.00', attempted: '60.00' },
      });
    });

    it('refuses an overpaying insert that skips the service', async () => {
      const response = await postPayment({ invoiceId, amount: '60' });
      expect(response.statusCode).toBe(201);

      expect(() => insertDirectly(6000)).toThrow('payment exceeds invoice amount');
      insertDirectly(4000);
      expect(await summaryStatus()).toBe('paid');
    });

    it('keeps uncommitted payments from the other connection out of the summary', async () => {
      other.prepare('BEGIN IMMEDIATE').run();
      insertDirectly(6000);
      expect(await summaryStatus()).toBe('unpaid');

      other.prepare('COMMIT').run();
      expect(await summaryStatus()).toBe('partial');
    });
  });

  it('returns 400 for a paidAt naming a day that does not exist', async () => {
    const response = await postPayment({ invoiceId, amount: '10', paidAt: '2026-02-30' });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiErrorResponse>().error.code).toBe('VALIDATION_ERROR');
  });

  it('returns 400 for a paidAt that is not an ISO timestamp', async () => {
    const response = await postPayment({ invoiceId, amount: '10', paidAt: 'March 3' });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiErrorResponse>().error.code).toBe('VALIDATION_ERROR');
    const list = await app.inject({ method: 'GET', url: '/api/payments' });
    expect(list.json<PaymentListResponse>().pagination.totalItems).toBe(0);
  });

  it('returns 400 INVALID_AMOUNT for a negative amount', async () => {
    const response = await postPayment({ invoiceId, amount: '-5' });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiErrorResponse>()).toEqual({
      error: {
        code: 'INVALID_AMOUNT',
        message: 'Payment amount must be greater than zero',
        details: { amount: '-5.00' },
      },
    });
  });

  it('coerces a numeric amount to its decimal string', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/payments',
      payload: { invoiceId, amount: 60 },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json<PaymentResponse>().payment.amount).toBe('60.00');
  });

  it('returns 400 INVALID_AMOUNT for zero', async () => {
    const response = await postPayment({ invoiceId, amount: '0.00' });

    expect(response.statusCode).toBe(400);
    expect(response.json<ApiErrorResponse>().error.code).toBe('INVALID_AMOUNT');
  });

  it('returns 404 for an unknown invoice', async () => {
    const response = await postPayment({ invoiceId: 99, amount: '10' });

    expect(response.statusCode).toBe(404);
    expect(response.json<ApiErrorResponse>().error.message).toBe('Invoice 99 not found');
  });

  it('GET /api/payments/:id returns the payment', async () => {
    const created = await postPayment({
      invoiceId,
      amount: '25.5',
      method: 'bank',
      paidAt: '2026-01-15T09:30:00Z',
    });
    const { payment } = created.json<PaymentResponse>();

    const response = await app.inject({ method: 'GET', url: `/api/payments/${payment.id}` });

    expect(response.statusCode).toBe(200);
    expect(response.json<PaymentResponse>()).toEqual({
      payment: {
        id: payment.id,
        invoiceId,
        amount: '25.50',
        method: 'bank',
        paidAt: '2026-01-15T09:30:00.000Z',
      },
    });
  });

  it('DELETE /api/payments/:id reopens the balance', async () => {
    const created = await postPayment({ invoiceId, amount: '100' });
    const { payment } = created.json<PaymentResponse>();

    const response = await app.inject({ method: 'DELETE', url: `/api/payments/${payment.id}` });

    expect(response.statusCode).toBe(204);
    expect(await summaryStatus()).toBe('unpaid');
  });
});
