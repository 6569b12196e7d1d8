// src/costing/costing.repository.ts
import { Injectable } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { Decimal, formatAmount, toDecimal, toDecimalOrNull } from '../common/money';
import type { CostUpdate } from './avco';

export interface CostedProduct {
  id: number;
  code: string;
  cost: Decimal | null;
  stockQuantity: Decimal;
}

export interface CostHistoryEntry {
  id: number;
  productId: number;
  oldCost: Decimal | null;
  newCost: Decimal;
  oldStock: Decimal;
  newStock: Decimal;
  purchasePrice: Decimal;
  quantityReceived: Decimal;
  reason: string | null;
  purchaseOrderId: number | null;
  purchaseOrderLineId: number | null;
  changedAt: Date;
}

export interface HistoryOrigin {
  reason: string;
  purchaseOrderId: number | null;
  purchaseOrderLineId: number | null;
}

type ProductRow = {
  id: number;
  code: string;
  cost: string | null;
  stock_quantity: string;
};

type HistoryRow = {
  id: number;
  product_id: number;
  old_cost: string | null;
  new_cost: string;
  old_stock: string;
  new_stock: string;
  purchase_price: string;
  quantity_received: string;
  reason: string | null;
  purchase_order_id: number | null;
  purchase_order_line_id: number | null;
  changed_at: Date;
};

@Injectable()
export class CostingRepository {
  /** Bloquea la fila del producto hasta el fin de la transacción. */
  async lockProduct(tx: Queryable, id: number): Promise<CostedProduct | null> {
    const { rows } = await tx.query<ProductRow>(
      'SELECT id, code, cost, stock_quantity FROM products WHERE id = $1 FOR UPDATE',
      [id],
    );
    const r = rows[0];
    if (!r) return null;
    return {
      id: r.id,
      code: r.code,
      cost: toDecimalOrNull(r.cost),
      stockQuantity: toDecimal(r.stock_quantity),
    };
  }

  async productExists(tx: Queryable, id: number): Promise<boolean> {
    const { rows } = await tx.query<{ id: number }>(
      'SELECT id FROM products WHERE id = $1',
      [id],
    );
    return rows.length > 0;
  }

  async updateCost(tx: Queryable, id: number, cost: Decimal): Promise<void> {
    await tx.query('UPDATE products SET cost = $2 WHERE id = $1', [
      id,
      formatAmount(cost),
    ]);
  }

  async insertHistory(
    tx: Queryable,
    update: CostUpdate,
    origin: HistoryOrigin,
  ): Promise<number> {
    const { rows } = await tx.query<{ id: number }>(
      `INSERT INTO product_cost_history
         (product_id, old_cost, new_cost, old_stock, new_stock, purchase_price,
          quantity_received, reason, purchase_order_id, purchase_order_line_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING id`,
      [
        update.productId,
        update.oldCost === null ? null : formatAmount(update.oldCost),
        formatAmount(update.newCost),
        update.oldStock.toString(),
        update.newStock.toString(),
        formatAmount(update.purchasePrice),
        update.quantityReceived.toString(),
        origin.reason,
        origin.purchaseOrderId,
        origin.purchaseOrderLineId,
      ],
    );
    return rows[0].id;
  }

  async findHistory(
    tx: Queryable,
    productId: number,
  ): Promise<CostHistoryEntry[]> {
    const { rows } = await tx.query<HistoryRow>(
      `SELECT id, product_id, old_cost, new_cost, old_stock, new_stock,
              purchase_price, quantity_received, reason, purchase_order_id,
              purchase_order_line_id, changed_at
         FROM product_cost_history
        WHERE product_id = $1
        ORDER BY changed_at DESC, id DESC`,
      [productId],
    );
    return rows.map((r) => ({
      id: r.id,
      productId: r.product_id,
      oldCost: toDecimalOrNull(r.old_cost),
      newCost: toDecimal(r.new_cost),
      oldStock: toDecimal(r.old_stock),
      newStock: toDecimal(r.new_stock),
      purchasePrice: toDecimal(r.purchase_price),
      quantityReceived: toDecimal(r.quantity_received),
      reason: r.reason,
      purchaseOrderId: r.purchase_order_id,
      purchaseOrderLineId: r.purchase_order_line_id,
      changedAt: r.changed_at,
    }));
  }
}
