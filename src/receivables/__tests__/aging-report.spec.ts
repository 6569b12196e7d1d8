import { Decimal } from '../../common/money';
import {
  AgingInvoice,
  agingTotals,
  bucketFor,
  buildAgingReport,
  daysOverdue,
} from '../aging-report';

const AS_OF = new Date('2024-06-30T15:00:00Z');

function inv(
  id: number,
  customerId: number,
  due: string,
  remaining: number,
): AgingInvoice {
  return {
    id,
    number: `F-${id}`,
    customerId,
    customerName: `Cliente ${customerId}`,
    dueDate: new Date(`${due}T00:00:00Z`),
    remainingAmount: new Decimal(remaining),
  };
}

describe('aging buckets', () => {
  it('counts whole calendar days, negative before the due date', () => {
    expect(daysOverdue(new Date('2024-05-31T00:00:00Z'), AS_OF)).toBe(30);
    expect(daysOverdue(new Date('2024-05-30T00:00:00Z'), AS_OF)).toBe(31);
    expect(daysOverdue(new Date('2024-07-10T00:00:00Z'), AS_OF)).toBe(-10);
  });

  it('places the boundaries', () => {
    expect(bucketFor(-10)).toBe('0-30');
    expect(bucketFor(0)).toBe('0-30');
    expect(bucketFor(30)).toBe('0-30');
    expect(bucketFor(31)).toBe('31-60');
    expect(bucketFor(60)).toBe('31-60');
    expect(bucketFor(61)).toBe('61-90');
    expect(bucketFor(90)).toBe('61-90');
    expect(bucketFor(91)).toBe('90+');
  });
});

describe('buildAgingReport', () => {
  const rows = buildAgingReport(
    [
      inv(1, 1, '2024-05-31', 100),
      inv(2, 1, '2024-05-30', 50),
      inv(3, 2, '2024-07-10', 400),
      inv(4, 2, '2024-03-01', 10),
      inv(5, 3, '2024-04-30', 150),
      inv(6, 3, '2024-01-01', 0),
    ],
    AS_OF,
  );

  it('sorts customers by outstanding balance, ties by id', () => {
    expect(rows.map((r) => [r.customerId, r.totalOutstanding.toNumber()])).toEqual([
      [2, 410],
      [1, 150],
      [3, 150],
    ]);
  });

  it('sums balances per bucket and counts non-empty buckets only', () => {
    const c1 = rows[1];
    expect(c1.buckets['0-30'].toNumber()).toBe(100);
    expect(c1.buckets['31-60'].toNumber()).toBe(50);
    expect(c1.invoiceCounts).toEqual({ '0-30': 1, '31-60': 1 });

    const c2 = rows[0];
    expect(c2.buckets['0-30'].toNumber()).toBe(400);
    expect(c2.buckets['90+'].toNumber()).toBe(10);
    expect(c2.invoices.map((i) => i.daysOverdue)).toEqual([-10, 121]);

    const c3 = rows[2];
    expect(c3.buckets['61-90'].toNumber()).toBe(150);
    expect(c3.invoices).toHaveLength(1);
  });

  it('adds up overall totals', () => {
    const totals = agingTotals(rows);
    expect(totals.totalOutstanding.toNumber()).toBe(710);
    expect(totals.buckets['0-30'].toNumber()).toBe(500);
    expect(totals.buckets['31-60'].toNumber()).toBe(50);
    expect(totals.buckets['61-90'].toNumber()).toBe(150);
    expect(totals.buckets['90+'].toNumber()).toBe(10);
  });

  it('returns nothing without outstanding invoices', () => {
    expect(buildAgingReport([], AS_OF)).toEqual([]);
  });
});
