// src/costing/avco.ts
import { BadRequestException } from '@nestjs/common';
import { Decimal, ZERO } from '../common/money';
import { round2 } from '../common/rounding';

export interface StockReceipt {
  productId: number;
  purchasePrice: Decimal;
  /** Incremental para este evento, nunca acumulado. */
  quantityReceived: Decimal;
  currentCost: Decimal | null;
  currentStock: Decimal;
}

export interface CostUpdate {
  productId: number;
  oldCost: Decimal | null;
  newCost: Decimal;
  oldStock: Decimal;
  newStock: Decimal;
  purchasePrice: Decimal;
  quantityReceived: Decimal;
  /** Hay fila de historial solo si el costo cambió o no existía. */
  recordHistory: boolean;
}

export function applyReceipt(receipt: StockReceipt): CostUpdate {
  const { productId, purchasePrice, quantityReceived, currentCost, currentStock } =
    receipt;
  if (quantityReceived.lte(0)) {
    throw new BadRequestException('La cantidad recibida debe ser mayor que 0');
  }
  if (purchasePrice.lt(0)) {
    throw new BadRequestException('El precio de compra no puede ser negativo');
  }

  const newStock = currentStock.plus(quantityReceived);
  const newCost = newStock.gt(0)
    ? round2(
        (currentCost ?? ZERO)
          .times(currentStock)
          .plus(purchasePrice.times(quantityReceived))
          .dividedBy(newStock),
      )
    : purchasePrice;

  return {
    productId,
    oldCost: currentCost,
    newCost,
    oldStock: currentStock,
    newStock,
    purchasePrice,
    quantityReceived,
    recordHistory: currentCost === null || !currentCost.eq(newCost),
  };
}
