import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import type { DbType } from '../db/types.js';
import { openDatabase } from '../plugins/db.js';
import * as paymentService from './paymentService.js';
import { createClient } from './clientService.js';
import { createInvoice, getInvoiceSummary } from './invoiceService.js';
import { InvalidAmountError, NotFoundError, OverpaymentError } from '../errors/AppError.js';

describe('Payment Service', () => {
  let sqlite: Database.Database;
  let db: DbType;
  let invoiceId: number;

  beforeEach(() => {
    sqlite = openDatabase(':memory:');
    runMigrations(sqlite);
    db = drizzle(sqlite, { schema });
    const client = createClient(db, { name: 'Ana Silva', email: 'ana@example.com' });
    invoiceId = createInvoice(db, {
      clientId: client.id,
      amount: '100.00',
      issuedDate: '2026-01-10',
    }).id;
  });

  afterEach(() => {
    sqlite.close();
  });

  describe('createPayment()', () => {
    it('settles an invoice in two payments and then refuses more', () => {
      const first = paymentService.createPayment(db, { invoiceId, amount: '60' });
      expect(first.amount).toBe('60.00');
      expect(getInvoiceSummary(db, invoiceId)).toEqual({
        invoiceId,
        amount: '100.00',
        totalPaid: '60.00',
        balance: '40.00',
        status: 'partial',
      });

      paymentService.createPayment(db, { invoiceId, amount: '40' });
      expect(getInvoiceSummary(db, invoiceId).status).toBe('paid');
      expect(getInvoiceSummary(db, invoiceId).balance).toBe('0.00');

      expect(() => paymentService.createPayment(db, { invoiceId, amount: '0.01' })).toThrow(
        'Payment of 0.01 exceeds the remaining balance of 0.00',
      );
    });

    it('leaves the paid total unchanged after a rejected payment', () => {
      paymentService.createPayment(db, { invoiceId, amount: '60' });

      expect(() => paymentService.createPayment(db, { invoiceId, amount: '50' })).toThrow(
        OverpaymentError,
      );
      expect(paymentService.getPaidTotal(db, invoiceId).toFixed(2)).toBe('60.00');
      expect(db.select().from(schema.payments).all()).toHaveLength(1);
    });

    it('rejects zero and negative amounts', () => {
      expect(() => paymentService.createPayment(db, { invoiceId, amount: '0' })).toThrow(
        InvalidAmountError,
      );
      expect(() => paymentService.createPayment(db, { invoiceId, amount: '-5' })).toThrow(
        InvalidAmountError,
      );
    });

    it('rejects an unknown invoice', () => {
      expect(() => paymentService.createPayment(db, { invoiceId: 99, amount: '10' })).toThrow(
        NotFoundError,
      );
      expect(() => paymentService.createPayment(db, { invoiceId: 99, amount: '10' })).toThrow(
        'Invoice 99 not found',
      );
    });

    it('normalizes paidAt to UTC and defaults method to null', () => {
      const payment = paymentService.createPayment(db, {
        invoiceId,
        amount: '10',
        paidAt: '2026-04-01T14:00:00+02:00',
      });

      expect(payment).toEqual({
        id: payment.id,
        invoiceId,
        amount: '10.00',
        method: null,
        paidAt: '2026-04-01T12:00:00.000Z',
      });
    });

    it('keeps cent precision across many small payments', () => {
      for (let i = 0; i < 10; i++) {
        paymentService.createPayment(db, { invoiceId, amount: '0.10' });
      }

      expect(paymentService.getPaidTotal(db, invoiceId).toFixed(2)).toBe('1.00');
    });
  });

  describe('getPaidTotal()', () => {
    it('is zero when there are no payments', () => {
      expect(paymentService.getPaidTotal(db, invoiceId).isZero()).toBe(true);
    });
  });

  describe('listPayments()', () => {
    it('lists most recent first', () => {
      paymentService.createPayment(db, {
        invoiceId,
        amount: '10',
        method: 'cash',
        paidAt: '2026-02-01T10:00:00Z',
      });
      paymentService.createPayment(db, {
        invoiceId,
        amount: '20',
        method: 'card',
        paidAt: '2026-03-01T10:00:00Z',
      });

      const result = paymentService.listPayments(db, {});

      expect(result.payments.map((p) => p.method)).toEqual(['card', 'cash']);
      expect(result.pagination).toEqual({ skip: 0, limit: 50, totalItems: 2 });
    });
  });

  describe('deletePayment()', () => {
    it('restores the balance', () => {
      const payment = paymentService.createPayment(db, { invoiceId, amount: '100' });

      paymentService.deletePayment(db, payment.id);

      expect(getInvoiceSummary(db, invoiceId).status).toBe('unpaid');
      expect(() => paymentService.getPaymentById(db, payment.id)).toThrow(
        `Payment ${payment.id} not found`,
      );
    });

    it('throws NotFoundError for a missing id', () => {
      expect(() => paymentService.deletePayment(db, 5)).toThrow(NotFoundError);
    });
  });
});
