// src/documents/line-pricing.ts
import { Decimal, ZERO } from '../common/money';
import type { PriceResolution } from '../pricing/price-resolver';

export interface LinePricing {
  unitPrice: Decimal;
  discountPercent: Decimal;
}

export interface LinePricingOverrides {
  unitPrice?: Decimal;
  discountPercent?: Decimal;
}

/**
 * Descuento de cliente → precio base + % en la línea; cualquier otra fuente
 * sustituye el precio y deja el % en 0. Lo que indique el usuario manda.
 */
export function linePricingFor(
  resolution: PriceResolution,
  overrides: LinePricingOverrides = {},
): LinePricing {
  const resolved: LinePricing =
    resolution.source === 'customer_discount'
      ? {
          unitPrice: resolution.basePrice,
          discountPercent: resolution.discountPercent,
        }
      : { unitPrice: resolution.finalPrice, discountPercent: ZERO };
  return {
    unitPrice: overrides.unitPrice ?? resolved.unitPrice,
    discountPercent: overrides.discountPercent ?? resolved.discountPercent,
  };
}
