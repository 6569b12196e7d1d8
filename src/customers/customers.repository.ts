// src/customers/customers.repository.ts
import { Injectable } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { Decimal, toDecimal } from '../common/money';

export interface CommercialConditions {
  customerId: number;
  defaultDiscountPercent: Decimal;
  creditLimit: Decimal;
  blockOnCreditExceeded: boolean;
  priceListId: number | null;
  paymentTermsDays: number | null;
}

export interface CustomerRecord {
  id: number;
  code: string | null;
  name: string | null;
  conditions: CommercialConditions | null;
}

type CustomerRow = {
  id: number;
  code: string | null;
  company_name: string | null;
  first_name: string | null;
  last_name: string | null;
  has_conditions: boolean;
  default_discount_percent: string | null;
  credit_limit: string | null;
  block_on_credit_exceeded: boolean | null;
  price_list_id: number | null;
  payment_terms_days: number | null;
};

export function customerDisplayName(row: {
  company_name: string | null;
  first_name: string | null;
  last_name: string | null;
}): string | null {
  if (row.company_name) return row.company_name;
  const full = [row.first_name, row.last_name].filter(Boolean).join(' ');
  return full || null;
}

@Injectable()
export class CustomersRepository {
  async findById(tx: Queryable, id: number): Promise<CustomerRecord | null> {
    const { rows } = await tx.query<CustomerRow>(
      `SELECT c.id, c.code, c.company_name, c.first_name, c.last_name,
              (cc.customer_id IS NOT NULL) AS has_conditions,
              cc.default_discount_percent, cc.credit_limit,
              cc.block_on_credit_exceeded, cc.price_list_id, cc.payment_terms_days
         FROM customers c
         LEFT JOIN commercial_conditions cc ON cc.customer_id = c.id
        WHERE c.id = $1`,
      [id],
    );
    const row = rows[0];
    if (!row) return null;
    return {
      id: row.id,
      code: row.code,
      name: customerDisplayName(row),
      conditions: row.has_conditions
        ? {
            customerId: row.id,
            defaultDiscountPercent: toDecimal(row.default_discount_percent ?? 0),
            creditLimit: toDecimal(row.credit_limit ?? 0),
            blockOnCreditExceeded: row.block_on_credit_exceeded === true,
            priceListId: row.price_list_id,
            paymentTermsDays: row.payment_terms_days,
          }
        : null,
    };
  }
}
