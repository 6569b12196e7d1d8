// src/receivables/receivables.repository.ts
import { Injectable } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { Decimal, toDecimal } from '../common/money';
import { customerDisplayName } from '../customers/customers.repository';
import { OPEN_INVOICE_STATUSES } from '../payments/invoice-settlement';
import { parseDateOnly } from '../payments/payments.repository';
import type { AgingInvoice } from './aging-report';
import { COMMITTED_ORDER_STATUSES } from './credit-validator';

/** Estados que pasan a vencido al superar la fecha de vencimiento. */
const OVERDUE_CANDIDATE_STATUSES = ['validated', 'sent', 'partially_paid'];

type AgingRow = {
  id: number;
  number: string;
  customer_id: number;
  company_name: string | null;
  first_name: string | null;
  last_name: string | null;
  due_date: string;
  remaining_amount: string;
};

@Injectable()
export class ReceivablesRepository {
  async findOutstandingInvoices(
    tx: Queryable,
    filters: { customerId?: number; includePaid?: boolean },
  ): Promise<AgingInvoice[]> {
    const params: unknown[] = [];
    const where = ['i.remaining_amount > 0'];
    if (!filters.includePaid) {
      params.push([...OPEN_INVOICE_STATUSES]);
      where.push(`i.status = ANY($${params.length}::text[])`);
    }
    if (filters.customerId != null) {
      params.push(filters.customerId);
      where.push(`i.customer_id = $${params.length}`);
    }
    const { rows } = await tx.query<AgingRow>(
      `SELECT i.id, i.number, i.customer_id, c.company_name, c.first_name, c.last_name,
              to_char(i.due_date, 'YYYY-MM-DD') AS due_date, i.remaining_amount
         FROM invoices i
         JOIN customers c ON c.id = i.customer_id
        WHERE ${where.join(' AND ')}
        ORDER BY i.customer_id, i.due_date, i.id`,
      params,
    );
    return rows.map((r) => ({
      id: r.id,
      number: r.number,
      customerId: r.customer_id,
      customerName: customerDisplayName(r),
      dueDate: parseDateOnly(r.due_date),
      remainingAmount: toDecimal(r.remaining_amount),
    }));
  }

  /** Marca vencidas las facturas con saldo cuyo vencimiento es anterior a `asOf`. */
  async markOverdue(tx: Queryable, asOf: string): Promise<number[]> {
    const { rows } = await tx.query<{ id: number }>(
      `UPDATE invoices
          SET status = 'overdue'
        WHERE status = ANY($1::text[])
          AND due_date < $2::date
          AND remaining_amount > 0
        RETURNING id`,
      [OVERDUE_CANDIDATE_STATUSES, asOf],
    );
    return rows.map((r) => r.id).sort((a, b) => a - b);
  }

  async committedOrdersTotal(
    tx: Queryable,
    customerId: number,
  ): Promise<Decimal> {
    const { rows } = await tx.query<{ total: string }>(
      `SELECT COALESCE(SUM(total), 0) AS total
         FROM orders
        WHERE customer_id = $1 AND status = ANY($2::text[])`,
      [customerId, [...COMMITTED_ORDER_STATUSES]],
    );
    return toDecimal(rows[0]?.total ?? 0);
  }

  /** Total del pedido solo si está comprometido (y es del cliente). */
  async committedOrderTotal(
    tx: Queryable,
    orderId: number,
    customerId: number,
  ): Promise<Decimal | null> {
    const { rows } = await tx.query<{ total: string }>(
      `SELECT total FROM orders
        WHERE id = $1 AND customer_id = $2 AND status = ANY($3::text[])`,
      [orderId, customerId, [...COMMITTED_ORDER_STATUSES]],
    );
    return rows[0] ? toDecimal(rows[0].total) : null;
  }
}
