// src/pricing/pricing.repository.ts
import { Injectable } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { Decimal, toDecimal, toDecimalOrNull } from '../common/money';
import type {
  PriceListEntry,
  PromotionalPrice,
  VolumeTier,
} from './price-resolver';

export interface ProductRecord {
  id: number;
  code: string;
  name: string;
  price: Decimal;
  cost: Decimal | null;
}

type ProductRow = {
  id: number;
  code: string;
  name: string;
  price: string;
  cost: string | null;
};

type PromotionRow = {
  id: number;
  product_id: number;
  price: string;
  start_date: Date;
  end_date: Date;
  is_active: boolean;
};

type TierRow = {
  id: number;
  product_id: number;
  min_quantity: string;
  max_quantity: string | null;
  price: string;
};

type PriceListRow = {
  price_list_id: number;
  product_id: number;
  price: string;
};

function toProduct(row: ProductRow): ProductRecord {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    price: toDecimal(row.price),
    cost: toDecimalOrNull(row.cost),
  };
}

@Injectable()
export class PricingRepository {
  async findProduct(tx: Queryable, id: number): Promise<ProductRecord | null> {
    const { rows } = await tx.query<ProductRow>(
      'SELECT id, code, name, price, cost FROM products WHERE id = $1',
      [id],
    );
    return rows[0] ? toProduct(rows[0]) : null;
  }

  /** Promociones activas cuya ventana contiene `at`. */
  async findActivePromotions(
    tx: Queryable,
    productId: number,
    at: Date,
  ): Promise<PromotionalPrice[]> {
    const { rows } = await tx.query<PromotionRow>(
      `SELECT id, product_id, price, start_date, end_date, is_active
         FROM product_promotional_prices
        WHERE product_id = $1 AND is_active
          AND start_date <= $2 AND end_date >= $2`,
      [productId, at],
    );
    return rows.map((r) => ({
      id: r.id,
      productId: r.product_id,
      price: toDecimal(r.price),
      startDate: r.start_date,
      endDate: r.end_date,
      isActive: r.is_active,
    }));
  }

  async findVolumeTiers(
    tx: Queryable,
    productId: number,
  ): Promise<VolumeTier[]> {
    const { rows } = await tx.query<TierRow>(
      `SELECT id, product_id, min_quantity, max_quantity, price
         FROM product_volume_pricing
        WHERE product_id = $1
        ORDER BY min_quantity DESC`,
      [productId],
    );
    return rows.map((r) => ({
      id: r.id,
      productId: r.product_id,
      minQuantity: toDecimal(r.min_quantity),
      maxQuantity: toDecimalOrNull(r.max_quantity),
      price: toDecimal(r.price),
    }));
  }

  async findPriceListEntry(
    tx: Queryable,
    priceListId: number,
    productId: number,
  ): Promise<PriceListEntry | null> {
    const { rows } = await tx.query<PriceListRow>(
      `SELECT price_list_id, product_id, price
         FROM product_price_lists
        WHERE price_list_id = $1 AND product_id = $2`,
      [priceListId, productId],
    );
    const row = rows[0];
    return row
      ? {
          priceListId: row.price_list_id,
          productId: row.product_id,
          price: toDecimal(row.price),
        }
      : null;
  }

  /** Costo AVCO actual por producto (null si nunca se recibió stock). */
  async findCosts(
    tx: Queryable,
    productIds: number[],
  ): Promise<Map<number, Decimal | null>> {
    const costs = new Map<number, Decimal | null>();
    if (productIds.length === 0) return costs;
    const { rows } = await tx.query<{ id: number; cost: string | null }>(
      'SELECT id, cost FROM products WHERE id = ANY($1::int[])',
      [productIds],
    );
    for (const r of rows) costs.set(r.id, toDecimalOrNull(r.cost));
    return costs;
  }
}
