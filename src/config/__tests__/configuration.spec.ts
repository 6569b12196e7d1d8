// src/config/__tests__/configuration.spec.ts
import configuration, { parseAllocationStrategy } from '../configuration';

describe('configuration', () => {
  it('falls back to defaults without environment variables', () => {
    const cfg = configuration({});
    expect(cfg.port).toBe(3000);
    expect(cfg.corsOrigins).toEqual(['http://localhost:3001']);
    expect(cfg.database).toEqual({
      url: 'postgres://localhost:5432/erp',
      poolMax: 10,
    });
    expect(cfg.pricing.defaultTaxRate).toBe(20);
    expect(cfg.payments.defaultAllocationStrategy).toBe('fifo');
  });

  it('reads and normalizes the environment', () => {
    const cfg = configuration({
      PORT: '8080',
      CORS_ORIGIN: 'http://a.test, http://b.test,',
      DATABASE_POOL_MAX: 'x',
      DEFAULT_TAX_RATE: '19',
      DEFAULT_ALLOCATION_STRATEGY: ' Proportional ',
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(cfg.database.poolMax).toBe(10);
    expect(cfg.pricing.defaultTaxRate).toBe(19);
    expect(cfg.payments.defaultAllocationStrategy).toBe('proportional');
  });

  it('rejects an unknown allocation strategy', () => {
    expect(() => parseAllocationStrategy('lifo')).toThrow(
      'DEFAULT_ALLOCATION_STRATEGY inválido: lifo (usa fifo o proportional)',
    );
  });
});
