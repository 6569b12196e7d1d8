// src/documents/line-calculator.ts
import { BadRequestException } from '@nestjs/common';
import { Decimal, HUNDRED, percentOf } from '../common/money';

export interface LineInput {
  quantity: Decimal;
  unitPrice: Decimal;
  discountPercent: Decimal;
  taxRate: Decimal;
}

export interface LineAmounts {
  discountAmount: Decimal;
  lineTotalHt: Decimal;
  lineTotalTtc: Decimal;
}

/**
 * HT = q × p − descuento; TTC = HT × (1 + iva/100).
 * Sin redondeo intermedio: se redondea al persistir.
 */
export function computeLine(input: LineInput): LineAmounts {
  const subtotal = input.quantity.times(input.unitPrice);
  const discountAmount = percentOf(subtotal, input.discountPercent);
  const lineTotalHt = subtotal.minus(discountAmount);
  const lineTotalTtc = lineTotalHt.times(
    HUNDRED.plus(input.taxRate).dividedBy(HUNDRED),
  );
  return { discountAmount, lineTotalHt, lineTotalTtc };
}

export function validateLineInput(input: LineInput): void {
  if (input.quantity.lte(0)) {
    throw new BadRequestException('La cantidad debe ser mayor que 0');
  }
  if (input.unitPrice.lt(0)) {
    throw new BadRequestException('El precio unitario no puede ser negativo');
  }
  if (input.discountPercent.lt(0) || input.discountPercent.gt(100)) {
    throw new BadRequestException('El descuento debe estar entre 0 y 100');
  }
  if (input.taxRate.lt(0)) {
    throw new BadRequestException('La tasa de impuesto no puede ser negativa');
  }
}
