// src/payments/payments.repository.ts
import { Injectable } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { Decimal, formatAmount, toDecimal } from '../common/money';
import type { OpenInvoice } from './allocation-engine';
import {
  OPEN_INVOICE_STATUSES,
  PaymentState,
  SettlableInvoice,
  Settlement,
} from './invoice-settlement';

export interface PaymentRecord extends PaymentState {
  customerId: number;
  method: string;
  paymentDate: string;
  reference: string | null;
  notes: string | null;
  bankReference: string | null;
  reconciledAt: Date | null;
}

export interface AllocationRecord {
  id: number;
  invoiceId: number;
  invoiceNumber: string;
  amount: Decimal;
  createdAt: Date;
}

export interface InvoiceForPayment extends SettlableInvoice {
  number: string;
  customerId: number;
}

export interface OpenInvoiceRecord extends OpenInvoice {
  number: string;
}

export interface NewPayment {
  customerId: number;
  method: string;
  amount: Decimal;
  paymentDate: string;
  reference: string | null;
  notes: string | null;
}

type PaymentRow = {
  id: number;
  customer_id: number;
  method: string;
  status: string;
  amount: string;
  allocated_amount: string;
  payment_date: string;
  reference: string | null;
  notes: string | null;
  bank_reference: string | null;
  reconciled_at: Date | null;
};

type InvoiceRow = {
  id: number;
  number: string;
  customer_id: number;
  status: string;
  paid_amount: string;
  remaining_amount: string;
};

type OpenInvoiceRow = {
  id: number;
  number: string;
  due_date: string;
  remaining_amount: string;
};

/** 'YYYY-MM-DD' → medianoche UTC. */
export function parseDateOnly(value: string): Date {
  return new Date(`${value}T00:00:00Z`);
}

@Injectable()
export class PaymentsRepository {
  async insertPayment(tx: Queryable, p: NewPayment): Promise<number> {
    const { rows } = await tx.query<{ id: number }>(
      `INSERT INTO payments (customer_id, method, status, amount, payment_date, reference, notes)
       VALUES ($1, $2, 'pending', $3, $4, $5, $6)
       RETURNING id`,
      [
        p.customerId,
        p.method,
        formatAmount(p.amount),
        p.paymentDate,
        p.reference,
        p.notes,
      ],
    );
    return rows[0].id;
  }

  async findPayment(
    tx: Queryable,
    id: number,
    opts: { lock?: boolean } = {},
  ): Promise<PaymentRecord | null> {
    const { rows } = await tx.query<PaymentRow>(
      `SELECT p.id, p.customer_id, p.method, p.status, p.amount,
              (SELECT COALESCE(SUM(a.allocated_amount), 0)
                 FROM payment_allocations a WHERE a.payment_id = p.id) AS allocated_amount,
              to_char(p.payment_date, 'YYYY-MM-DD') AS payment_date,
              p.reference, p.notes, p.bank_reference, p.reconciled_at
         FROM payments p
        WHERE p.id = $1${opts.lock ? ' FOR UPDATE' : ''}`,
      [id],
    );
    const r = rows[0];
    if (!r) return null;
    return {
      id: r.id,
      customerId: r.customer_id,
      method: r.method,
      status: r.status,
      amount: toDecimal(r.amount),
      allocatedAmount: toDecimal(r.allocated_amount),
      paymentDate: r.payment_date,
      reference: r.reference,
      notes: r.notes,
      bankReference: r.bank_reference,
      reconciledAt: r.reconciled_at,
    };
  }

  async findAllocations(
    tx: Queryable,
    paymentId: number,
  ): Promise<AllocationRecord[]> {
    const { rows } = await tx.query<{
      id: number;
      invoice_id: number;
      number: string;
      allocated_amount: string;
      created_at: Date;
    }>(
      `SELECT a.id, a.invoice_id, i.number, a.allocated_amount, a.created_at
         FROM payment_allocations a
         JOIN invoices i ON i.id = a.invoice_id
        WHERE a.payment_id = $1
        ORDER BY a.id`,
      [paymentId],
    );
    return rows.map((r) => ({
      id: r.id,
      invoiceId: r.invoice_id,
      invoiceNumber: r.number,
      amount: toDecimal(r.allocated_amount),
      createdAt: r.created_at,
    }));
  }

  async lockInvoice(
    tx: Queryable,
    id: number,
  ): Promise<InvoiceForPayment | null> {
    const { rows } = await tx.query<InvoiceRow>(
      `SELECT id, number, customer_id, status, paid_amount, remaining_amount
         FROM invoices WHERE id = $1 FOR UPDATE`,
      [id],
    );
    const r = rows[0];
    if (!r) return null;
    return {
      id: r.id,
      number: r.number,
      customerId: r.customer_id,
      status: r.status,
      paidAmount: toDecimal(r.paid_amount),
      remainingAmount: toDecimal(r.remaining_amount),
    };
  }

  /** Facturas abiertas con saldo, vencimiento más antiguo primero. */
  async findOpenInvoices(
    tx: Queryable,
    customerId: number,
    opts: { lock?: boolean } = {},
  ): Promise<OpenInvoiceRecord[]> {
    const { rows } = await tx.query<OpenInvoiceRow>(
      `SELECT id, number, to_char(due_date, 'YYYY-MM-DD') AS due_date, remaining_amount
         FROM invoices
        WHERE customer_id = $1
          AND status = ANY($2::text[])
          AND remaining_amount > 0
        ORDER BY due_date, id${opts.lock ? ' FOR UPDATE' : ''}`,
      [customerId, [...OPEN_INVOICE_STATUSES]],
    );
    return rows.map((r) => ({
      id: r.id,
      number: r.number,
      dueDate: parseDateOnly(r.due_date),
      remainingAmount: toDecimal(r.remaining_amount),
    }));
  }

  async insertAllocation(
    tx: Queryable,
    paymentId: number,
    invoiceId: number,
    amount: Decimal,
  ): Promise<number> {
    const { rows } = await tx.query<{ id: number }>(
      `INSERT INTO payment_allocations (payment_id, invoice_id, allocated_amount)
       VALUES ($1, $2, $3) RETURNING id`,
      [paymentId, invoiceId, formatAmount(amount)],
    );
    return rows[0].id;
  }

  async applySettlement(tx: Queryable, s: Settlement): Promise<void> {
    await tx.query(
      `UPDATE invoices
          SET paid_amount = $2, remaining_amount = $3, status = $4
        WHERE id = $1`,
      [
        s.invoiceId,
        formatAmount(s.paidAmount),
        formatAmount(s.remainingAmount),
        s.status,
      ],
    );
  }

  async updateStatus(
    tx: Queryable,
    id: number,
    status: string,
  ): Promise<void> {
    await tx.query('UPDATE payments SET status = $2 WHERE id = $1', [
      id,
      status,
    ]);
  }

  async markReconciled(
    tx: Queryable,
    id: number,
    bankReference: string | null,
    reconciledAt: Date,
  ): Promise<void> {
    await tx.query(
      `UPDATE payments
          SET status = 'reconciled', bank_reference = COALESCE($2, bank_reference),
              reconciled_at = $3
        WHERE id = $1`,
      [id, bankReference, reconciledAt],
    );
  }
}
