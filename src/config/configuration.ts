// src/config/configuration.ts
import type { AllocationStrategy } from '../payments/allocation-engine';

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  database: {
    url: string;
    poolMax: number;
  };
  pricing: {
    defaultTaxRate: number;
  };
  payments: {
    defaultAllocationStrategy: AllocationStrategy;
  };
}

function intFrom(raw: string | undefined, fallback: number): number {
  const n = raw ? parseInt(raw, 10) : NaN;
  return Number.isFinite(n) ? n : fallback;
}

function numberFrom(raw: string | undefined, fallback: number): number {
  const n = raw ? Number(raw) : NaN;
  return Number.isFinite(n) ? n : fallback;
}

export function parseAllocationStrategy(
  raw: string | undefined,
): AllocationStrategy {
  if (!raw) return 'fifo';
  const v = raw.trim().toLowerCase();
  if (v === 'fifo' || v === 'proportional') return v;
  throw new Error(
    `DEFAULT_ALLOCATION_STRATEGY inválido: ${raw} (usa fifo o proportional)`,
  );
}

export default function configuration(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return {
    port: intFrom(env.PORT, 3000),
    corsOrigins: (env.CORS_ORIGIN ?? 'http://localhost:3001')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    database: {
      url: env.DATABASE_URL ?? 'postgres://localhost:5432/erp',
      poolMax: intFrom(env.DATABASE_POOL_MAX, 10),
    },
    pricing: {
      defaultTaxRate: numberFrom(env.DEFAULT_TAX_RATE, 20),
    },
    payments: {
      defaultAllocationStrategy: parseAllocationStrategy(
        env.DEFAULT_ALLOCATION_STRATEGY,
      ),
    },
  };
}
