// src/common/money.ts
import { BadRequestException } from '@nestjs/common';
import Decimal from 'decimal.js';
import { round2 } from './rounding';

export { Decimal };

/** Montos y cantidades circulan siempre como Decimal dentro del core. */
export type Money = Decimal;

export const ZERO = new Decimal(0);
export const HUNDRED = new Decimal(100);

/**
 * Normaliza la entrada (number, string de `numeric` de Postgres o Decimal).
 * Valores no finitos o ilegibles son entrada inválida.
 */
export function toDecimal(value: Decimal.Value, field = 'valor'): Decimal {
  let d: Decimal;
  try {
    d = new Decimal(value);
  } catch {
    throw new BadRequestException(`${field} no es un número válido`);
  }
  if (!d.isFinite()) {
    throw new BadRequestException(`${field} no es un número válido`);
  }
  return d;
}

/** Igual que `toDecimal` pero acepta null/undefined (columnas opcionales). */
export function toDecimalOrNull(
  value: Decimal.Value | null | undefined,
  field?: string,
): Decimal | null {
  return value === null || value === undefined ? null : toDecimal(value, field);
}

/** amount × percent / 100, sin redondeo intermedio. */
export function percentOf(amount: Decimal, percent: Decimal.Value): Decimal {
  return amount.times(percent).dividedBy(HUNDRED);
}

export function sumOf(values: Iterable<Decimal>): Decimal {
  let acc = ZERO;
  for (const v of values) acc = acc.plus(v);
  return acc;
}

export function minOf(first: Decimal, ...rest: Decimal[]): Decimal {
  return Decimal.min(first, ...rest);
}

export function maxOf(first: Decimal, ...rest: Decimal[]): Decimal {
  return Decimal.max(first, ...rest);
}

/** Frontera de salida/almacenamiento: number con 2 decimales. */
export function toAmount(value: Decimal): number {
  return round2(value).toNumber();
}

/** Texto con 2 decimales para mensajes y columnas numeric. */
export function formatAmount(value: Decimal): string {
  return round2(value).toFixed(2);
}

/** Montos de dinero persistidos: como máximo 2 decimales, nunca se recortan. */
export function assertCents(value: Decimal, field = 'monto'): Decimal {
  if (value.decimalPlaces() > 2) {
    throw new BadRequestException(
      `${field} admite como máximo 2 decimales (recibido ${value.toString()})`,
    );
  }
  return value;
}
