import { Logger, NotFoundException } from '@nestjs/common';
import { Decimal } from '../../common/money';
import {
  BASE_PRICE_FALLBACK,
  STRICT_PRICING,
  fallbackPolicyFor,
  resolveWithFallback,
} from '../fallback-policy';
import type { PriceResolution } from '../price-resolver';

describe('fallback policies', () => {
  const base = new Decimal(42);

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('strict rethrows the resolver error', async () => {
    const failing = () =>
      Promise.reject(new NotFoundException('Cliente no encontrado'));
    await expect(
      resolveWithFallback(failing, STRICT_PRICING, base),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('base_price recovers with the base price and a warning', async () => {
    const failing = () =>
      Promise.reject(new NotFoundException('Cliente no encontrado'));
    const out = await resolveWithFallback(failing, BASE_PRICE_FALLBACK, base);
    expect(out.resolution).toEqual({
      source: 'base',
      basePrice: base,
      finalPrice: base,
    });
    expect(out.warning).toBe(
      'No se pudo calcular el precio del cliente (Cliente no encontrado); se usó el precio base',
    );
  });

  it('base_price lets database errors through', async () => {
    const dbError = new Error('current transaction is aborted');
    const failing = () => Promise.reject(dbError);
    await expect(
      resolveWithFallback(failing, BASE_PRICE_FALLBACK, base),
    ).rejects.toBe(dbError);
    expect(Logger.prototype.warn).not.toHaveBeenCalled();
  });

  it('a successful resolution never carries a warning', async () => {
    const ok: PriceResolution = {
      source: 'price_list',
      basePrice: base,
      finalPrice: new Decimal(40),
      priceListId: 1,
    };
    const out = await resolveWithFallback(
      () => Promise.resolve(ok),
      BASE_PRICE_FALLBACK,
      base,
    );
    expect(out).toEqual({ resolution: ok, warning: null });
  });

  it('defaults to strict', () => {
    expect(fallbackPolicyFor(undefined).name).toBe('strict');
    expect(fallbackPolicyFor('base_price').name).toBe('base_price');
  });
});
