// src/common/rounding.ts
import Decimal from 'decimal.js';

export type RoundingMode = 'HALF_UP' | 'TRUNC' | 'CEIL' | 'FLOOR';

const MODES: Record<RoundingMode, Decimal.Rounding> = {
  HALF_UP: Decimal.ROUND_HALF_UP,
  TRUNC: Decimal.ROUND_DOWN,
  CEIL: Decimal.ROUND_CEIL,
  FLOOR: Decimal.ROUND_FLOOR,
};

/**
 * Redondea un valor a una cantidad de decimales con el modo indicado.
 * @param value valor de entrada (number, string o Decimal)
 * @param decimals número de decimales (default: 2)
 * @param mode estrategia: 'HALF_UP' (default), 'TRUNC', 'CEIL', 'FLOOR'
 */
export function round(
  value: Decimal.Value,
  decimals = 2,
  mode: RoundingMode = 'HALF_UP',
): Decimal {
  const d = new Decimal(value);
  if (!d.isFinite()) return new Decimal(0);
  return d.toDecimalPlaces(decimals, MODES[mode]);
}

/**
 * Redondeo estándar a 2 decimales (modo HALF_UP).
 */
export function round2(value: Decimal.Value): Decimal {
  return round(value, 2, 'HALF_UP');
}
