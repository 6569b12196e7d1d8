// src/pricing/fallback-policy.ts
import { HttpException, Logger } from '@nestjs/common';
import type { Decimal } from '../common/money';
import type { PriceResolution } from './price-resolver';

export type FallbackPolicyName = 'strict' | 'base_price';

export interface FallbackOutcome {
  resolution: PriceResolution;
  /** Aviso no bloqueante cuando se usó el respaldo. */
  warning: string | null;
}

/**
 * Qué hacer cuando el resolvedor falla. Lo elige quien agrega la línea; el
 * resolvedor nunca cae a precio base por su cuenta.
 */
export interface FallbackPolicy {
  readonly name: FallbackPolicyName;
  recover(error: unknown, basePrice: Decimal): FallbackOutcome;
}

const logger = new Logger('PriceFallback');

export const STRICT_PRICING: FallbackPolicy = {
  name: 'strict',
  recover(error) {
    throw error;
  },
};

/**
 * Solo recupera errores de dominio. Un fallo de SQL deja abortada la
 * transacción de `pg`, así que se propaga y hace rollback.
 */
export const BASE_PRICE_FALLBACK: FallbackPolicy = {
  name: 'base_price',
  recover(error, basePrice) {
    if (!(error instanceof HttpException)) throw error;
    const reason = error.message;
    logger.warn(`Precio base aplicado por fallo de resolución: ${reason}`);
    return {
      resolution: { source: 'base', basePrice, finalPrice: basePrice },
      warning: `No se pudo calcular el precio del cliente (${reason}); se usó el precio base`,
    };
  },
};

export function fallbackPolicyFor(
  name: FallbackPolicyName | undefined,
): FallbackPolicy {
  return name === 'base_price' ? BASE_PRICE_FALLBACK : STRICT_PRICING;
}

/** Resuelve con la política dada; el éxito nunca produce aviso. */
export async function resolveWithFallback(
  resolve: () => Promise<PriceResolution>,
  policy: FallbackPolicy,
  basePrice: Decimal,
): Promise<FallbackOutcome> {
  try {
    return { resolution: await resolve(), warning: null };
  } catch (err) {
    return policy.recover(err, basePrice);
  }
}
