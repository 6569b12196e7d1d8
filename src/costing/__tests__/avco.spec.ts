import { BadRequestException } from '@nestjs/common';
import { Decimal } from '../../common/money';
import { applyReceipt } from '../avco';

const d = (v: Decimal.Value) => new Decimal(v);

describe('applyReceipt', () => {
  it('moves the weighted average across sequential receipts', () => {
    const first = applyReceipt({
      productId: 1,
      purchasePrice: d(7),
      quantityReceived: d(10),
      currentCost: d(5),
      currentStock: d(10),
    });
    expect(first.newCost.toFixed(2)).toBe('6.00');
    expect(first.newStock.toNumber()).toBe(20);
    expect(first.recordHistory).toBe(true);

    const second = applyReceipt({
      productId: 1,
      purchasePrice: d(9),
      quantityReceived: d(20),
      currentCost: first.newCost,
      currentStock: first.newStock,
    });
    expect(second.newCost.toFixed(2)).toBe('7.50');
    expect(second.newStock.toNumber()).toBe(40);
  });

  it('matches one combined receipt of the same quantities', () => {
    const combined = applyReceipt({
      productId: 1,
      purchasePrice: d(250).dividedBy(30),
      quantityReceived: d(30),
      currentCost: d(5),
      currentStock: d(10),
    });
    expect(combined.newCost.toFixed(2)).toBe('7.50');
  });

  it('records history for the first cost even when stock was empty', () => {
    const out = applyReceipt({
      productId: 2,
      purchasePrice: d(3),
      quantityReceived: d(4),
      currentCost: null,
      currentStock: d(0),
    });
    expect(out.newCost.toNumber()).toBe(3);
    expect(out.oldCost).toBeNull();
    expect(out.recordHistory).toBe(true);
  });

  it('skips history when the cost does not change', () => {
    const out = applyReceipt({
      productId: 1,
      purchasePrice: d(5),
      quantityReceived: d(5),
      currentCost: d(5),
      currentStock: d(10),
    });
    expect(out.newCost.toNumber()).toBe(5);
    expect(out.recordHistory).toBe(false);
  });

  it('takes the purchase price when the resulting stock is zero', () => {
    const out = applyReceipt({
      productId: 1,
      purchasePrice: d(8),
      quantityReceived: d(5),
      currentCost: d(4),
      currentStock: d(-5),
    });
    expect(out.newStock.isZero()).toBe(true);
    expect(out.newCost.toNumber()).toBe(8);
  });

  it('rounds the new cost to 2 decimals', () => {
    const out = applyReceipt({
      productId: 1,
      purchasePrice: d(10),
      quantityReceived: d(1),
      currentCost: d(0),
      currentStock: d(2),
    });
    expect(out.newCost.toFixed(2)).toBe('3.33');
  });

  it('rejects non-positive quantities and negative prices', () => {
    const base = {
      productId: 1,
      purchasePrice: d(1),
      quantityReceived: d(1),
      currentCost: null,
      currentStock: d(0),
    };
    expect(() => applyReceipt({ ...base, quantityReceived: d(0) })).toThrow(
      BadRequestException,
    );
    expect(() => applyReceipt({ ...base, purchasePrice: d(-1) })).toThrow(
      'El precio de compra no puede ser negativo',
    );
  });
});
