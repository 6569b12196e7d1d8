// src/payments/allocation-engine.ts
import { BadRequestException } from '@nestjs/common';
import { Decimal, assertCents, minOf, sumOf } from '../common/money';
import { round2 } from '../common/rounding';

export type AllocationStrategy = 'fifo' | 'proportional';

export const ALLOCATION_STRATEGIES: readonly AllocationStrategy[] = [
  'fifo',
  'proportional',
];

export function isAllocationStrategy(value: string): value is AllocationStrategy {
  return ALLOCATION_STRATEGIES.some((s) => s === value);
}

export interface OpenInvoice {
  id: number;
  dueDate: Date;
  remainingAmount: Decimal;
}

export interface Allocation {
  invoiceId: number;
  amount: Decimal;
}

/** Vencimiento más antiguo primero; a igual fecha, menor id. */
export function byDueDate(a: OpenInvoice, b: OpenInvoice): number {
  return a.dueDate.getTime() - b.dueDate.getTime() || a.id - b.id;
}

function fifo(invoices: OpenInvoice[], amount: Decimal): Allocation[] {
  const out: Allocation[] = [];
  let left = amount;
  for (const inv of invoices) {
    if (left.lte(0)) break;
    const share = minOf(inv.remainingAmount, left);
    out.push({ invoiceId: inv.id, amount: share });
    left = left.minus(share);
  }
  return out;
}

/**
 * Reparto proporcional al saldo. La última factura recibe lo que queda
 * (hasta su saldo) para que la suma cierre exacta pese al redondeo.
 */
function proportional(invoices: OpenInvoice[], amount: Decimal): Allocation[] {
  const totalRemaining = sumOf(invoices.map((i) => i.remainingAmount));
  const out: Allocation[] = [];
  let left = amount;
  invoices.forEach((inv, idx) => {
    if (left.lte(0)) return;
    const cap = minOf(inv.remainingAmount, left);
    const share =
      idx === invoices.length - 1
        ? cap
        : minOf(
            round2(amount.times(inv.remainingAmount).dividedBy(totalRemaining)),
            cap,
          );
    if (share.lte(0)) return;
    out.push({ invoiceId: inv.id, amount: share });
    left = left.minus(share);
  });
  return out;
}

export function allocate(
  invoices: OpenInvoice[],
  paymentAmount: Decimal,
  strategy: string,
): Allocation[] {
  if (!isAllocationStrategy(strategy)) {
    throw new BadRequestException(
      `Estrategia de asignación desconocida: ${strategy}`,
    );
  }
  if (paymentAmount.lte(0)) {
    throw new BadRequestException('El monto del pago debe ser mayor que 0');
  }
  assertCents(paymentAmount, 'El monto del pago');
  const open = invoices.filter((i) => i.remainingAmount.gt(0)).sort(byDueDate);
  if (open.length === 0) return [];
  return strategy === 'fifo'
    ? fifo(open, paymentAmount)
    : proportional(open, paymentAmount);
}
