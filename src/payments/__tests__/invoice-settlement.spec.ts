import { BadRequestException, ConflictException } from '@nestjs/common';
import { Decimal } from '../../common/money';
import {
  PaymentState,
  SettlableInvoice,
  assertAllocatable,
  assertCancellable,
  assertConfirmable,
  assertReconcilable,
  settleInvoice,
  unallocatedAmount,
} from '../invoice-settlement';

const d = (v: number) => new Decimal(v);

function invoice(status: string, paid: number, remaining: number): SettlableInvoice {
  return { id: 1, status, paidAmount: d(paid), remainingAmount: d(remaining) };
}

function payment(status: string, amount: number, allocated: number): PaymentState {
  return { id: 20, status, amount: d(amount), allocatedAmount: d(allocated) };
}

describe('settleInvoice', () => {
  it('moves a sent invoice to partially paid', () => {
    const s = settleInvoice(invoice('sent', 0, 100), d(40));
    expect(s.status).toBe('partially_paid');
    expect(s.paidAmount.toNumber()).toBe(40);
    expect(s.remainingAmount.toNumber()).toBe(60);
    expect(s.becamePaid).toBe(false);
  });

  it('marks the invoice paid when the balance reaches zero', () => {
    const s = settleInvoice(invoice('partially_paid', 60, 40), d(40));
    expect(s.status).toBe('paid');
    expect(s.paidAmount.toNumber()).toBe(100);
    expect(s.remainingAmount.isZero()).toBe(true);
    expect(s.becamePaid).toBe(true);
  });

  it('keeps an overdue invoice overdue on a partial payment', () => {
    expect(settleInvoice(invoice('overdue', 0, 100), d(10)).status).toBe(
      'overdue',
    );
  });

  it('refuses draft and canceled invoices', () => {
    expect(() => settleInvoice(invoice('draft', 0, 100), d(10))).toThrow(
      ConflictException,
    );
    expect(() => settleInvoice(invoice('canceled', 0, 100), d(10))).toThrow(
      'No se puede aplicar un pago a una factura en estado canceled',
    );
  });

  it('refuses amounts over the remaining balance', () => {
    expect(() => settleInvoice(invoice('sent', 0, 100), d(150))).toThrow(
      'El monto 150.00 excede el saldo de la factura 1 (100.00)',
    );
    expect(() => settleInvoice(invoice('sent', 0, 100), d(0))).toThrow(
      BadRequestException,
    );
  });

  it('refuses fractions of a cent so paid plus remaining keeps the total', () => {
    expect(() =>
      settleInvoice(invoice('sent', 0, 200), new Decimal('100.005')),
    ).toThrow('El monto a aplicar admite como máximo 2 decimales (recibido 100.005)');

    const s = settleInvoice(invoice('sent', 0, 200), new Decimal('100.01'));
    expect(s.paidAmount.plus(s.remainingAmount).toFixed(2)).toBe('200.00');
  });
});

describe('payment rules', () => {
  it('computes the unallocated amount', () => {
    expect(unallocatedAmount(payment('pending', 250, 100)).toNumber()).toBe(150);
  });

  it('rejects allocations over the available amount', () => {
    expect(() => assertAllocatable(payment('confirmed', 250, 200), d(60))).toThrow(
      'El monto 60.00 excede lo disponible del pago (50.00)',
    );
    expect(() => assertAllocatable(payment('confirmed', 250, 200), d(50))).not.toThrow();
  });

  it('rejects allocations with fractions of a cent', () => {
    expect(() =>
      assertAllocatable(payment('confirmed', 250, 0), new Decimal('0.005')),
    ).toThrow(BadRequestException);
  });

  it('rejects allocations on a cancelled payment', () => {
    expect(() => assertAllocatable(payment('cancelled', 250, 0), d(10))).toThrow(
      ConflictException,
    );
  });

  it('confirms pending payments only', () => {
    expect(() => assertConfirmable(payment('pending', 10, 0))).not.toThrow();
    expect(() => assertConfirmable(payment('confirmed', 10, 0))).toThrow(
      'Solo se confirman pagos pendientes (estado actual: confirmed)',
    );
  });

  it('cancels only unreconciled payments without allocations', () => {
    expect(() => assertCancellable(payment('confirmed', 10, 0), 0)).not.toThrow();
    expect(() => assertCancellable(payment('confirmed', 10, 10), 1)).toThrow(
      'No se puede anular un pago con asignaciones a facturas',
    );
    expect(() => assertCancellable(payment('reconciled', 10, 0), 0)).toThrow(
      'No se puede anular un pago conciliado',
    );
  });

  it('reconciles once', () => {
    expect(() => assertReconcilable(payment('confirmed', 10, 0))).not.toThrow();
    expect(() => assertReconcilable(payment('reconciled', 10, 0))).toThrow(
      'El pago ya está conciliado',
    );
  });
});
