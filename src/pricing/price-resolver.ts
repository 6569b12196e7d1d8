// src/pricing/price-resolver.ts
import { Decimal, ZERO, percentOf } from '../common/money';

export interface ProductPricing {
  id: number;
  price: Decimal;
}

export interface PromotionalPrice {
  id: number;
  productId: number;
  price: Decimal;
  startDate: Date;
  endDate: Date;
  isActive: boolean;
}

export interface VolumeTier {
  id: number;
  productId: number;
  minQuantity: Decimal;
  /** null = sin tope */
  maxQuantity: Decimal | null;
  price: Decimal;
}

export interface PriceListEntry {
  priceListId: number;
  productId: number;
  price: Decimal;
}

export interface CustomerPricingTerms {
  customerId: number;
  defaultDiscountPercent: Decimal;
  priceListId: number | null;
}

/** Todo lo que el resolvedor necesita, ya cargado por el repositorio. */
export interface PricingInputs {
  product: ProductPricing;
  customerId: number;
  conditions: CustomerPricingTerms | null;
  promotions: PromotionalPrice[];
  volumeTiers: VolumeTier[];
  priceListEntry: PriceListEntry | null;
}

export type PriceSource =
  | 'promotional_price'
  | 'volume_pricing'
  | 'price_list'
  | 'customer_discount'
  | 'base';

/**
 * Resultado cerrado. Solo `customer_discount` lleva campos de descuento: los
 * precios promocionales, por volumen y de lista son sustituciones de precio.
 */
export type PriceResolution =
  | {
      source: 'promotional_price';
      basePrice: Decimal;
      finalPrice: Decimal;
      promotionId: number;
    }
  | {
      source: 'volume_pricing';
      basePrice: Decimal;
      finalPrice: Decimal;
      tierId: number;
    }
  | {
      source: 'price_list';
      basePrice: Decimal;
      finalPrice: Decimal;
      priceListId: number;
    }
  | {
      source: 'customer_discount';
      basePrice: Decimal;
      finalPrice: Decimal;
      discountPercent: Decimal;
      discountAmount: Decimal;
    }
  | { source: 'base'; basePrice: Decimal; finalPrice: Decimal };

/** Forma plana expuesta a los llamadores. */
export interface PriceResult {
  basePrice: Decimal;
  finalPrice: Decimal;
  appliedDiscountPercent: Decimal;
  discountAmount: Decimal;
  source: PriceSource;
}

/** Promoción vigente en `now`; ante varias gana la de inicio más reciente. */
export function activePromotion(
  promotions: PromotionalPrice[],
  now: Date,
): PromotionalPrice | null {
  const t = now.getTime();
  let best: PromotionalPrice | null = null;
  for (const p of promotions) {
    if (!p.isActive) continue;
    if (p.startDate.getTime() > t || p.endDate.getTime() < t) continue;
    if (!best || p.startDate.getTime() > best.startDate.getTime()) best = p;
  }
  return best;
}

/** Tramo con el mayor min_quantity <= cantidad que además cubre el máximo. */
export function matchingTier(
  tiers: VolumeTier[],
  quantity: Decimal,
): VolumeTier | null {
  if (quantity.lte(0)) return null;
  let best: VolumeTier | null = null;
  for (const tier of tiers) {
    if (tier.minQuantity.gt(quantity)) continue;
    if (tier.maxQuantity !== null && tier.maxQuantity.lt(quantity)) continue;
    if (!best || tier.minQuantity.gt(best.minQuantity)) best = tier;
  }
  return best;
}

export function resolvePrice(
  inputs: PricingInputs,
  quantity: Decimal,
  now: Date,
): PriceResolution {
  const basePrice = inputs.product.price;
  const productId = inputs.product.id;

  const promo = activePromotion(
    inputs.promotions.filter((p) => p.productId === productId),
    now,
  );
  if (promo) {
    return {
      source: 'promotional_price',
      basePrice,
      finalPrice: promo.price,
      promotionId: promo.id,
    };
  }

  const tier = matchingTier(
    inputs.volumeTiers.filter((t) => t.productId === productId),
    quantity,
  );
  if (tier) {
    return {
      source: 'volume_pricing',
      basePrice,
      finalPrice: tier.price,
      tierId: tier.id,
    };
  }

  const conditions = inputs.conditions;
  const entry = inputs.priceListEntry;
  if (
    conditions?.priceListId != null &&
    entry &&
    entry.priceListId === conditions.priceListId &&
    entry.productId === productId
  ) {
    return {
      source: 'price_list',
      basePrice,
      finalPrice: entry.price,
      priceListId: entry.priceListId,
    };
  }

  if (conditions && conditions.defaultDiscountPercent.gt(0)) {
    const discountAmount = percentOf(
      basePrice,
      conditions.defaultDiscountPercent,
    );
    return {
      source: 'customer_discount',
      basePrice,
      finalPrice: basePrice.minus(discountAmount),
      discountPercent: conditions.defaultDiscountPercent,
      discountAmount,
    };
  }

  return { source: 'base', basePrice, finalPrice: basePrice };
}

export function toPriceResult(resolution: PriceResolution): PriceResult {
  const { basePrice, finalPrice, source } = resolution;
  if (resolution.source === 'customer_discount') {
    return {
      basePrice,
      finalPrice,
      appliedDiscountPercent: resolution.discountPercent,
      discountAmount: basePrice.minus(finalPrice),
      source,
    };
  }
  return {
    basePrice,
    finalPrice,
    appliedDiscountPercent: ZERO,
    discountAmount: ZERO,
    source,
  };
}
