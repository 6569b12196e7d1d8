// src/receivables/aging-report.ts
import { Decimal, ZERO } from '../common/money';

export type AgingBucket = '0-30' | '31-60' | '61-90' | '90+';

export const AGING_BUCKETS: readonly AgingBucket[] = ['0-30', '31-60', '61-90', '90+'];

const DAY_MS = 1000 * 60 * 60 * 24;

export interface AgingInvoice {
  id: number;
  number: string;
  customerId: number;
  customerName: string | null;
  dueDate: Date;
  remainingAmount: Decimal;
}

export interface AgedInvoice {
  id: number;
  number: string;
  dueDate: Date;
  daysOverdue: number;
  bucket: AgingBucket;
  remainingAmount: Decimal;
}

export type BucketTotals = Record<AgingBucket, Decimal>;

export interface CustomerAgingSummary {
  customerId: number;
  customerName: string | null;
  buckets: BucketTotals;
  totalOutstanding: Decimal;
  /** Solo tramos con al menos una factura. */
  invoiceCounts: Partial<Record<AgingBucket, number>>;
  invoices: AgedInvoice[];
}

function utcDay(d: Date): number {
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

/** Días calendario entre vencimiento y corte; negativo si aún no vence. */
export function daysOverdue(dueDate: Date, asOf: Date): number {
  return Math.floor((utcDay(asOf) - utcDay(dueDate)) / DAY_MS);
}

export function bucketFor(days: number): AgingBucket {
  if (days <= 30) return '0-30';
  if (days <= 60) return '31-60';
  if (days <= 90) return '61-90';
  return '90+';
}

export function emptyBuckets(): BucketTotals {
  return { '0-30': ZERO, '31-60': ZERO, '61-90': ZERO, '90+': ZERO };
}

/** Resumen por cliente, mayor saldo primero (empates por id de cliente). */
export function buildAgingReport(
  invoices: AgingInvoice[],
  asOf: Date,
): CustomerAgingSummary[] {
  const map = new Map<number, CustomerAgingSummary>();

  for (const inv of invoices) {
    if (!inv.remainingAmount.gt(0)) continue;
    const cur = map.get(inv.customerId) ?? {
      customerId: inv.customerId,
      customerName: inv.customerName,
      buckets: emptyBuckets(),
      totalOutstanding: ZERO,
      invoiceCounts: {},
      invoices: [],
    };

    const days = daysOverdue(inv.dueDate, asOf);
    const bucket = bucketFor(days);
    cur.buckets[bucket] = cur.buckets[bucket].plus(inv.remainingAmount);
    cur.totalOutstanding = cur.totalOutstanding.plus(inv.remainingAmount);
    cur.invoiceCounts[bucket] = (cur.invoiceCounts[bucket] ?? 0) + 1;
    cur.invoices.push({
      id: inv.id,
      number: inv.number,
      dueDate: inv.dueDate,
      daysOverdue: days,
      bucket,
      remainingAmount: inv.remainingAmount,
    });

    map.set(inv.customerId, cur);
  }

  return [...map.values()].sort(
    (a, b) =>
      b.totalOutstanding.comparedTo(a.totalOutstanding) ||
      a.customerId - b.customerId,
  );
}

export function agingTotals(rows: CustomerAgingSummary[]): {
  buckets: BucketTotals;
  totalOutstanding: Decimal;
} {
  return rows.reduce(
    (acc, r) => ({
      buckets: {
        '0-30': acc.buckets['0-30'].plus(r.buckets['0-30']),
        '31-60': acc.buckets['31-60'].plus(r.buckets['31-60']),
        '61-90': acc.buckets['61-90'].plus(r.buckets['61-90']),
        '90+': acc.buckets['90+'].plus(r.buckets['90+']),
      },
      totalOutstanding: acc.totalOutstanding.plus(r.totalOutstanding),
    }),
    { buckets: emptyBuckets(), totalOutstanding: ZERO },
  );
}
