// src/pricing/pricing-advice.ts
import {
  Decimal,
  ZERO,
  HUNDRED,
  formatAmount,
  sumOf,
} from '../common/money';
import type { CustomerPricingTerms } from './price-resolver';

export interface AdvisedLine {
  id?: number;
  productId: number;
  quantity: Decimal;
  unitPrice: Decimal;
  discountPercent: Decimal;
  lineTotalHt: Decimal;
}

export interface AdvisedDocument {
  discountPercent: Decimal;
  lines: AdvisedLine[];
}

export type DiscountSuggestionType = 'customer_default' | 'volume_threshold';

export interface DiscountSuggestion {
  type: DiscountSuggestionType;
  description: string;
  discountPercent: Decimal;
  condition: string;
  currentValue: Decimal;
  thresholdValue: Decimal;
}

/** Umbrales de subtotal HT → % de descuento sugerido. */
export const SUBTOTAL_THRESHOLDS: ReadonlyArray<[number, number]> = [
  [1000, 2],
  [5000, 5],
  [10000, 10],
];

/** Umbrales de cantidad total → % de descuento por volumen. */
export const QUANTITY_THRESHOLDS: ReadonlyArray<[number, number]> = [
  [100, 3],
  [500, 5],
  [1000, 10],
];

/** Descuento por defecto del cliente si la línea aún no tiene uno. */
export function suggestLineDiscount(
  conditions: CustomerPricingTerms | null,
  lineDiscountPercent: Decimal,
): Decimal {
  if (!conditions || !conditions.defaultDiscountPercent.gt(0)) return ZERO;
  return lineDiscountPercent.isZero() ? conditions.defaultDiscountPercent : ZERO;
}

export function suggestDocumentDiscount(
  conditions: CustomerPricingTerms | null,
  currentDiscountPercent: Decimal,
): Decimal {
  return suggestLineDiscount(conditions, currentDiscountPercent);
}

export function suggestDiscounts(
  doc: AdvisedDocument,
  conditions: CustomerPricingTerms | null,
): DiscountSuggestion[] {
  const suggestions: DiscountSuggestion[] = [];
  if (doc.lines.length === 0) return suggestions;

  const subtotal = sumOf(doc.lines.map((l) => l.lineTotalHt));

  const documentDefault = suggestDocumentDiscount(
    conditions,
    doc.discountPercent,
  );
  if (documentDefault.gt(0)) {
    suggestions.push({
      type: 'customer_default',
      description: `Descuento por defecto del cliente (${documentDefault.toString()}%)`,
      discountPercent: documentDefault,
      condition: 'Aplicar el descuento por defecto del cliente',
      currentValue: ZERO,
      thresholdValue: ZERO,
    });
  }

  // Solo el siguiente umbral que falta por alcanzar
  for (const [threshold, pct] of SUBTOTAL_THRESHOLDS) {
    const t = new Decimal(threshold);
    if (subtotal.lt(t)) {
      suggestions.push({
        type: 'volume_threshold',
        description: `Descuento por volumen de ${pct}%`,
        discountPercent: new Decimal(pct),
        condition: `Agregar ${formatAmount(t.minus(subtotal))} para alcanzar el umbral`,
        currentValue: subtotal,
        thresholdValue: t,
      });
      break;
    }
  }

  return suggestions;
}

export interface VolumeDiscountStep {
  threshold: Decimal;
  discountPercent: Decimal;
  applicable: boolean;
  remainingQuantity: Decimal | null;
}

export interface VolumeDiscountOutlook {
  totalQuantity: Decimal;
  totalAmount: Decimal;
  volumeDiscounts: VolumeDiscountStep[];
}

export function volumeDiscountOutlook(
  lines: AdvisedLine[],
): VolumeDiscountOutlook {
  const totalQuantity = sumOf(lines.map((l) => l.quantity));
  const totalAmount = sumOf(lines.map((l) => l.lineTotalHt));
  return {
    totalQuantity,
    totalAmount,
    volumeDiscounts: QUANTITY_THRESHOLDS.map(([min, pct]) => {
      const threshold = new Decimal(min);
      const applicable = totalQuantity.gte(threshold);
      return {
        threshold,
        discountPercent: new Decimal(pct),
        applicable,
        remainingQuantity: applicable ? null : threshold.minus(totalQuantity),
      };
    }),
  };
}

/**
 * Reglas de precio no bloqueantes: devuelve mensajes, nunca lanza, para que
 * una cotización o pedido se pueda guardar con advertencias.
 */
export function validatePriceRules(doc: AdvisedDocument): string[] {
  const errors: string[] = [];
  doc.lines.forEach((line, idx) => {
    const ref = line.id ?? idx + 1;
    if (line.unitPrice.lt(0)) {
      errors.push(
        `Precio inválido para el producto ${line.productId}: ${line.unitPrice.toString()} (debe ser >= 0)`,
      );
    }
    if (line.discountPercent.lt(0) || line.discountPercent.gt(100)) {
      errors.push(
        `Descuento inválido en la línea ${ref}: ${line.discountPercent.toString()}% (debe estar entre 0 y 100)`,
      );
    }
  });
  if (doc.discountPercent.lt(0) || doc.discountPercent.gt(100)) {
    errors.push(
      `Descuento de documento inválido: ${doc.discountPercent.toString()}% (debe estar entre 0 y 100)`,
    );
  }
  return errors;
}

export interface MarginCalculation {
  totalCost: Decimal;
  totalRevenue: Decimal;
  grossMargin: Decimal;
  grossMarginPercent: Decimal;
  netMargin: Decimal;
  netMarginPercent: Decimal;
}

/** Costos por producto; un producto sin costo aporta 0. */
export function calculateMargin(
  lines: AdvisedLine[],
  costs: ReadonlyMap<number, Decimal | null>,
): MarginCalculation {
  const totalRevenue = sumOf(lines.map((l) => l.lineTotalHt));
  const totalCost = sumOf(
    lines.map((l) => {
      const cost = costs.get(l.productId);
      return cost ? cost.times(l.quantity) : ZERO;
    }),
  );
  const grossMargin = totalRevenue.minus(totalCost);
  const grossMarginPercent = totalRevenue.gt(0)
    ? grossMargin.dividedBy(totalRevenue).times(HUNDRED)
    : ZERO;
  // Sin costos adicionales todavía: neto = bruto
  return {
    totalCost,
    totalRevenue,
    grossMargin,
    grossMarginPercent,
    netMargin: grossMargin,
    netMarginPercent: grossMarginPercent,
  };
}

export type ProfitabilityLevel = 'high' | 'medium' | 'low' | 'negative';

export function profitabilityLevel(marginPercent: Decimal): ProfitabilityLevel {
  if (marginPercent.gt(30)) return 'high';
  if (marginPercent.gt(15)) return 'medium';
  if (marginPercent.gt(0)) return 'low';
  return 'negative';
}
