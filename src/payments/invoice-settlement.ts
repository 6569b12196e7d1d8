// src/payments/invoice-settlement.ts
import { BadRequestException, ConflictException } from '@nestjs/common';
import { Decimal, ZERO, assertCents, formatAmount } from '../common/money';

export type InvoiceStatus =
  | 'draft'
  | 'validated'
  | 'sent'
  | 'partially_paid'
  | 'paid'
  | 'overdue'
  | 'canceled';

/** Estados que aceptan pagos. */
export const OPEN_INVOICE_STATUSES: readonly InvoiceStatus[] = [
  'sent',
  'partially_paid',
  'overdue',
  'validated',
];

export interface SettlableInvoice {
  id: number;
  status: string;
  paidAmount: Decimal;
  remainingAmount: Decimal;
}

export interface Settlement {
  invoiceId: number;
  amount: Decimal;
  paidAmount: Decimal;
  remainingAmount: Decimal;
  status: string;
  /** La factura pasó a pagada con esta asignación. */
  becamePaid: boolean;
}

export function settleInvoice(
  invoice: SettlableInvoice,
  amount: Decimal,
): Settlement {
  if (invoice.status === 'draft' || invoice.status === 'canceled') {
    throw new ConflictException(
      `No se puede aplicar un pago a una factura en estado ${invoice.status}`,
    );
  }
  if (amount.lte(0)) {
    throw new BadRequestException('El monto a aplicar debe ser mayor que 0');
  }
  assertCents(amount, 'El monto a aplicar');
  if (amount.gt(invoice.remainingAmount)) {
    throw new BadRequestException(
      `El monto ${formatAmount(amount)} excede el saldo de la factura ${invoice.id} (${formatAmount(invoice.remainingAmount)})`,
    );
  }

  const remainingAmount = invoice.remainingAmount.minus(amount);
  let status = invoice.status;
  if (remainingAmount.lte(ZERO)) status = 'paid';
  else if (invoice.status === 'sent') status = 'partially_paid';

  return {
    invoiceId: invoice.id,
    amount,
    paidAmount: invoice.paidAmount.plus(amount),
    remainingAmount,
    status,
    becamePaid: status === 'paid' && invoice.status !== 'paid',
  };
}

export type PaymentStatus = 'pending' | 'confirmed' | 'reconciled' | 'cancelled';

export type PaymentMethod =
  | 'cash'
  | 'check'
  | 'bank_transfer'
  | 'credit_card'
  | 'debit_card'
  | 'paypal'
  | 'other';

export const PAYMENT_METHODS: readonly PaymentMethod[] = [
  'cash',
  'check',
  'bank_transfer',
  'credit_card',
  'debit_card',
  'paypal',
  'other',
];

export interface PaymentState {
  id: number;
  status: string;
  amount: Decimal;
  allocatedAmount: Decimal;
}

export function unallocatedAmount(payment: PaymentState): Decimal {
  return payment.amount.minus(payment.allocatedAmount);
}

export function assertAllocatable(payment: PaymentState, amount: Decimal): void {
  if (payment.status === 'cancelled') {
    throw new ConflictException('No se puede asignar un pago anulado');
  }
  if (amount.lte(0)) {
    throw new BadRequestException('El monto a aplicar debe ser mayor que 0');
  }
  assertCents(amount, 'El monto a aplicar');
  const available = unallocatedAmount(payment);
  if (amount.gt(available)) {
    throw new BadRequestException(
      `El monto ${formatAmount(amount)} excede lo disponible del pago (${formatAmount(available)})`,
    );
  }
}

export function assertConfirmable(payment: PaymentState): void {
  if (payment.status !== 'pending') {
    throw new ConflictException(
      `Solo se confirman pagos pendientes (estado actual: ${payment.status})`,
    );
  }
}

export function assertCancellable(
  payment: PaymentState,
  allocationCount: number,
): void {
  if (payment.status === 'cancelled') {
    throw new ConflictException('El pago ya está anulado');
  }
  if (payment.status === 'reconciled') {
    throw new ConflictException('No se puede anular un pago conciliado');
  }
  if (allocationCount > 0) {
    throw new ConflictException(
      'No se puede anular un pago con asignaciones a facturas',
    );
  }
}

export function assertReconcilable(payment: PaymentState): void {
  if (payment.status === 'reconciled') {
    throw new ConflictException('El pago ya está conciliado');
  }
}
