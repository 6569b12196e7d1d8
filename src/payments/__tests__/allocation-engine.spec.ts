import { BadRequestException } from '@nestjs/common';
import { Decimal, sumOf } from '../../common/money';
import { OpenInvoice, allocate } from '../allocation-engine';

function inv(id: number, due: string, remaining: number): OpenInvoice {
  return {
    id,
    dueDate: new Date(`${due}T00:00:00Z`),
    remainingAmount: new Decimal(remaining),
  };
}

const amounts = (xs: { amount: Decimal }[]) => xs.map((x) => x.amount.toFixed(2));

describe('allocate (fifo)', () => {
  it('pays the oldest invoice fully before the next one', () => {
    const out = allocate(
      [inv(2, '2024-02-01', 300), inv(1, '2024-01-01', 500)],
      new Decimal(600),
      'fifo',
    );
    expect(out.map((a) => a.invoiceId)).toEqual([1, 2]);
    expect(amounts(out)).toEqual(['500.00', '100.00']);
  });

  it('breaks due date ties by invoice id', () => {
    const out = allocate(
      [inv(9, '2024-01-01', 100), inv(4, '2024-01-01', 100)],
      new Decimal(150),
      'fifo',
    );
    expect(out.map((a) => [a.invoiceId, a.amount.toNumber()])).toEqual([
      [4, 100],
      [9, 50],
    ]);
  });

  it('never allocates beyond the open total', () => {
    const out = allocate([inv(1, '2024-01-01', 80)], new Decimal(200), 'fifo');
    expect(amounts(out)).toEqual(['80.00']);
  });

  it('ignores invoices without a remaining balance', () => {
    const out = allocate(
      [inv(1, '2024-01-01', 0), inv(2, '2024-02-01', 50)],
      new Decimal(20),
      'fifo',
    );
    expect(out).toEqual([{ invoiceId: 2, amount: new Decimal(20) }]);
  });
});

describe('allocate (proportional)', () => {
  it('splits in proportion to each remaining balance', () => {
    const out = allocate(
      [inv(1, '2024-01-01', 500), inv(2, '2024-02-01', 300), inv(3, '2024-03-01', 200)],
      new Decimal(500),
      'proportional',
    );
    expect(amounts(out)).toEqual(['250.00', '150.00', '100.00']);
    expect(sumOf(out.map((a) => a.amount)).toFixed(2)).toBe('500.00');
  });

  it('lets the last invoice absorb the rounding remainder', () => {
    const out = allocate(
      [inv(1, '2024-01-01', 100), inv(2, '2024-01-02', 100), inv(3, '2024-01-03', 100)],
      new Decimal(100),
      'proportional',
    );
    expect(amounts(out)).toEqual(['33.33', '33.33', '33.34']);
  });

  it('caps every share at the invoice balance when paying more than owed', () => {
    const out = allocate(
      [inv(1, '2024-01-01', 500), inv(2, '2024-02-01', 300)],
      new Decimal(1200),
      'proportional',
    );
    expect(amounts(out)).toEqual(['500.00', '300.00']);
  });

  it('keeps the sum equal to the payment for assorted amounts', () => {
    const open = [
      inv(1, '2024-01-01', 123.45),
      inv(2, '2024-01-15', 67.89),
      inv(3, '2024-02-01', 410.1),
    ];
    for (const amount of [0.01, 1, 99.99, 333.33, 601.44]) {
      const out = allocate(open, new Decimal(amount), 'proportional');
      expect(sumOf(out.map((a) => a.amount)).toFixed(2)).toBe(amount.toFixed(2));
      for (const a of out) {
        const target = open.find((i) => i.id === a.invoiceId);
        expect(a.amount.gt(0)).toBe(true);
        expect(target && a.amount.lte(target.remainingAmount)).toBe(true);
      }
    }
  });
});

describe('allocate (input checks)', () => {
  it('returns an empty plan when nothing is open', () => {
    expect(allocate([], new Decimal(100), 'fifo')).toEqual([]);
  });

  it('rejects an unknown strategy', () => {
    expect(() => allocate([], new Decimal(100), 'lifo')).toThrow(
      'Estrategia de asignación desconocida: lifo',
    );
  });

  it('rejects a non-positive amount', () => {
    expect(() =>
      allocate([inv(1, '2024-01-01', 10)], new Decimal(0), 'fifo'),
    ).toThrow(BadRequestException);
  });

  it('rejects an amount with fractions of a cent', () => {
    expect(() =>
      allocate([inv(1, '2024-01-01', 200)], new Decimal('100.005'), 'fifo'),
    ).toThrow('El monto del pago admite como máximo 2 decimales (recibido 100.005)');
  });
});
