// src/documents/document-totals.ts
import { ConflictException } from '@nestjs/common';
import { Decimal, percentOf, sumOf } from '../common/money';
import type { LineAmounts } from './line-calculator';

export interface DocumentTotals {
  subtotal: Decimal;
  discountAmount: Decimal;
  subtotalAfterDiscount: Decimal;
  taxAmount: Decimal;
  total: Decimal;
}

/**
 * Totales desde el conjunto actual de líneas.
 * El impuesto se toma de las líneas antes del descuento de documento.
 */
export function recomputeTotals(
  lines: Pick<LineAmounts, 'lineTotalHt' | 'lineTotalTtc'>[],
  documentDiscountPercent: Decimal,
): DocumentTotals {
  const subtotal = sumOf(lines.map((l) => l.lineTotalHt));
  const discountAmount = percentOf(subtotal, documentDiscountPercent);
  const subtotalAfterDiscount = subtotal.minus(discountAmount);
  const taxAmount = sumOf(lines.map((l) => l.lineTotalTtc.minus(l.lineTotalHt)));
  return {
    subtotal,
    discountAmount,
    subtotalAfterDiscount,
    taxAmount,
    total: subtotalAfterDiscount.plus(taxAmount),
  };
}

/** Saldo de factura; no puede quedar por debajo de lo ya pagado. */
export function invoiceRemaining(total: Decimal, paidAmount: Decimal): Decimal {
  const remaining = total.minus(paidAmount);
  if (remaining.lt(0)) {
    throw new ConflictException(
      `El total de la factura (${total.toFixed(2)}) quedaría por debajo de lo pagado (${paidAmount.toFixed(2)})`,
    );
  }
  return remaining;
}
