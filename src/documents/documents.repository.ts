// src/documents/documents.repository.ts
import { Injectable } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import type { DocumentKind } from '../common/events/domain-events';
import {
  Decimal,
  ZERO,
  formatAmount,
  toDecimal,
} from '../common/money';
import type { LineAmounts, LineInput } from './line-calculator';
import type { DocumentTotals } from './document-totals';

type TableSpec = {
  header: string;
  lines: string;
  fk: string;
  party: 'customer_id' | 'supplier_id';
};

const TABLES: Record<DocumentKind, TableSpec> = {
  quote: { header: 'quotes', lines: 'quote_lines', fk: 'quote_id', party: 'customer_id' },
  order: { header: 'orders', lines: 'order_lines', fk: 'order_id', party: 'customer_id' },
  invoice: { header: 'invoices', lines: 'invoice_lines', fk: 'invoice_id', party: 'customer_id' },
  purchase_order: {
    header: 'purchase_orders',
    lines: 'purchase_order_lines',
    fk: 'purchase_order_id',
    party: 'supplier_id',
  },
};

export interface DocumentHeader {
  kind: DocumentKind;
  id: number;
  number: string;
  status: string;
  /** Cliente en ventas, proveedor en compras. */
  partyId: number;
  discountPercent: Decimal;
  subtotal: Decimal;
  discountAmount: Decimal;
  taxAmount: Decimal;
  total: Decimal;
  /** Solo facturas. */
  paidAmount: Decimal | null;
  remainingAmount: Decimal | null;
}

export interface DocumentLine extends LineInput, LineAmounts {
  id: number;
  productId: number;
  description: string | null;
  sequence: number;
}

export type NewDocumentLine = LineInput &
  LineAmounts & { productId: number; description: string | null };

type HeaderRow = {
  id: number;
  number: string;
  status: string;
  party_id: number;
  discount_percent: string;
  subtotal: string;
  discount_amount: string;
  tax_amount: string;
  total: string;
  paid_amount: string | null;
  remaining_amount: string | null;
};

type LineRow = {
  id: number;
  product_id: number;
  description: string | null;
  quantity: string;
  unit_price: string;
  discount_percent: string;
  tax_rate: string;
  discount_amount: string;
  line_total_ht: string;
  line_total_ttc: string;
  sequence: number;
};

function toLine(r: LineRow): DocumentLine {
  return {
    id: r.id,
    productId: r.product_id,
    description: r.description,
    quantity: toDecimal(r.quantity),
    unitPrice: toDecimal(r.unit_price),
    discountPercent: toDecimal(r.discount_percent),
    taxRate: toDecimal(r.tax_rate),
    discountAmount: toDecimal(r.discount_amount),
    lineTotalHt: toDecimal(r.line_total_ht),
    lineTotalTtc: toDecimal(r.line_total_ttc),
    sequence: r.sequence,
  };
}

@Injectable()
export class DocumentsRepository {
  async findHeader(
    tx: Queryable,
    kind: DocumentKind,
    id: number,
    opts: { lock?: boolean } = {},
  ): Promise<DocumentHeader | null> {
    const t = TABLES[kind];
    const settlement =
      kind === 'invoice'
        ? 'paid_amount, remaining_amount'
        : 'NULL::numeric AS paid_amount, NULL::numeric AS remaining_amount';
    const { rows } = await tx.query<HeaderRow>(
      `SELECT id, number, status, ${t.party} AS party_id, discount_percent,
              subtotal, discount_amount, tax_amount, total, ${settlement}
         FROM ${t.header}
        WHERE id = $1${opts.lock ? ' FOR UPDATE' : ''}`,
      [id],
    );
    const r = rows[0];
    if (!r) return null;
    return {
      kind,
      id: r.id,
      number: r.number,
      status: r.status,
      partyId: r.party_id,
      discountPercent: toDecimal(r.discount_percent),
      subtotal: toDecimal(r.subtotal),
      discountAmount: toDecimal(r.discount_amount),
      taxAmount: toDecimal(r.tax_amount),
      total: toDecimal(r.total),
      paidAmount: r.paid_amount === null ? null : toDecimal(r.paid_amount),
      remainingAmount:
        r.remaining_amount === null ? null : toDecimal(r.remaining_amount),
    };
  }

  async findLines(
    tx: Queryable,
    kind: DocumentKind,
    documentId: number,
  ): Promise<DocumentLine[]> {
    const t = TABLES[kind];
    const { rows } = await tx.query<LineRow>(
      `SELECT id, product_id, description, quantity, unit_price,
              discount_percent, tax_rate, discount_amount,
              line_total_ht, line_total_ttc, sequence
         FROM ${t.lines}
        WHERE ${t.fk} = $1
        ORDER BY sequence, id`,
      [documentId],
    );
    return rows.map(toLine);
  }

  async insertLine(
    tx: Queryable,
    kind: DocumentKind,
    documentId: number,
    line: NewDocumentLine,
  ): Promise<number> {
    const t = TABLES[kind];
    const { rows } = await tx.query<{ id: number }>(
      `INSERT INTO ${t.lines}
         (${t.fk}, product_id, description, quantity, unit_price,
          discount_percent, tax_rate, discount_amount,
          line_total_ht, line_total_ttc, sequence)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10,
               (SELECT COALESCE(MAX(sequence), 0) + 1 FROM ${t.lines} WHERE ${t.fk} = $1))
       RETURNING id`,
      [
        documentId,
        line.productId,
        line.description,
        line.quantity.toString(),
        formatAmount(line.unitPrice),
        line.discountPercent.toFixed(2),
        line.taxRate.toFixed(2),
        formatAmount(line.discountAmount),
        formatAmount(line.lineTotalHt),
        formatAmount(line.lineTotalTtc),
      ],
    );
    return rows[0].id;
  }

  /** Reescribe entrada y montos derivados de una línea. */
  async saveLine(
    tx: Queryable,
    kind: DocumentKind,
    line: DocumentLine,
  ): Promise<void> {
    const t = TABLES[kind];
    await tx.query(
      `UPDATE ${t.lines}
          SET description = $2, quantity = $3, unit_price = $4,
              discount_percent = $5, tax_rate = $6, discount_amount = $7,
              line_total_ht = $8, line_total_ttc = $9
        WHERE id = $1`,
      [
        line.id,
        line.description,
        line.quantity.toString(),
        formatAmount(line.unitPrice),
        line.discountPercent.toFixed(2),
        line.taxRate.toFixed(2),
        formatAmount(line.discountAmount),
        formatAmount(line.lineTotalHt),
        formatAmount(line.lineTotalTtc),
      ],
    );
  }

  async deleteLine(
    tx: Queryable,
    kind: DocumentKind,
    documentId: number,
    lineId: number,
  ): Promise<boolean> {
    const t = TABLES[kind];
    const res = await tx.query(
      `DELETE FROM ${t.lines} WHERE id = $1 AND ${t.fk} = $2`,
      [lineId, documentId],
    );
    return (res.rowCount ?? 0) > 0;
  }

  async setDiscountPercent(
    tx: Queryable,
    kind: DocumentKind,
    documentId: number,
    percent: Decimal,
  ): Promise<void> {
    await tx.query(
      `UPDATE ${TABLES[kind].header} SET discount_percent = $2 WHERE id = $1`,
      [documentId, percent.toFixed(2)],
    );
  }

  async saveTotals(
    tx: Queryable,
    kind: DocumentKind,
    documentId: number,
    totals: DocumentTotals,
    remainingAmount: Decimal | null,
  ): Promise<void> {
    const t = TABLES[kind];
    const params: Array<number | string> = [
      documentId,
      formatAmount(totals.subtotal),
      formatAmount(totals.discountAmount),
      formatAmount(totals.taxAmount),
      formatAmount(totals.total),
    ];
    let remainingSet = '';
    if (kind === 'invoice') {
      params.push(formatAmount(remainingAmount ?? ZERO));
      remainingSet = ', remaining_amount = $6';
    }
    await tx.query(
      `UPDATE ${t.header}
          SET subtotal = $2, discount_amount = $3, tax_amount = $4, total = $5${remainingSet}
        WHERE id = $1`,
      params,
    );
  }
}
