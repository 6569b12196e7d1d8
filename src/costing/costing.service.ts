// src/costing/costing.service.ts
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { UnitOfWork } from '../db/unit-of-work.service';
import { formatAmount, toAmount, toDecimal } from '../common/money';
import { applyReceipt } from './avco';
import { CostHistoryEntry, CostingRepository } from './costing.repository';
import { StockReceiptDto } from './dto/stock-receipt.dto';

export interface CostReceiptResult {
  productId: number;
  oldCost: number | null;
  newCost: number;
  oldStock: number;
  newStock: number;
  costChanged: boolean;
  historyId: number | null;
}

function historyReason(dto: StockReceiptDto): string {
  if (dto.purchaseOrderId != null) {
    return `Recepción de orden de compra #${dto.purchaseOrderId}`;
  }
  if (dto.reference) return `Recepción ${dto.reference}`;
  return 'Recepción de mercancía';
}

function toHistoryView(h: CostHistoryEntry) {
  return {
    id: h.id,
    productId: h.productId,
    oldCost: h.oldCost === null ? null : toAmount(h.oldCost),
    newCost: toAmount(h.newCost),
    oldStock: h.oldStock.toNumber(),
    newStock: h.newStock.toNumber(),
    purchasePrice: toAmount(h.purchasePrice),
    quantityReceived: h.quantityReceived.toNumber(),
    reason: h.reason,
    purchaseOrderId: h.purchaseOrderId,
    purchaseOrderLineId: h.purchaseOrderLineId,
    changedAt: h.changedAt,
  };
}

@Injectable()
export class CostingService {
  private readonly logger = new Logger(CostingService.name);

  constructor(
    private readonly uow: UnitOfWork,
    private readonly repo: CostingRepository,
  ) {}

  /**
   * Recalcula el costo promedio ponderado con una recepción de stock.
   * Cada recepción parte del costo vigente; las parciales se aplican en orden.
   */
  applyStockReceipt(dto: StockReceiptDto): Promise<CostReceiptResult> {
    return this.uow.run(async ({ tx, events }) => {
      const product = await this.repo.lockProduct(tx, dto.productId);
      if (!product) throw new NotFoundException('Producto no encontrado');

      const before = toDecimal(dto.stockOnHandBefore, 'stockOnHandBefore');
      const after = toDecimal(dto.stockOnHandAfter, 'stockOnHandAfter');
      const quantity = toDecimal(dto.quantityReceived, 'quantityReceived');
      if (!after.eq(before.plus(quantity))) {
        throw new BadRequestException(
          `Stock inconsistente: ${before.toString()} + ${quantity.toString()} ≠ ${after.toString()}`,
        );
      }

      const update = applyReceipt({
        productId: product.id,
        purchasePrice: toDecimal(dto.purchasePrice, 'purchasePrice'),
        quantityReceived: quantity,
        currentCost: product.cost,
        currentStock: before,
      });

      let historyId: number | null = null;
      if (update.recordHistory) {
        await this.repo.updateCost(tx, product.id, update.newCost);
        historyId = await this.repo.insertHistory(tx, update, {
          reason: historyReason(dto),
          purchaseOrderId: dto.purchaseOrderId ?? null,
          purchaseOrderLineId: dto.purchaseOrderLineId ?? null,
        });
        await events.dispatch({
          type: 'product.cost_changed',
          productId: product.id,
          oldCost: update.oldCost === null ? null : formatAmount(update.oldCost),
          newCost: formatAmount(update.newCost),
          purchaseOrderId: dto.purchaseOrderId ?? null,
        });
        this.logger.log(
          `Costo de ${product.code}: ${update.oldCost === null ? '—' : formatAmount(update.oldCost)} → ${formatAmount(update.newCost)}`,
        );
      }

      return {
        productId: product.id,
        oldCost: update.oldCost === null ? null : toAmount(update.oldCost),
        newCost: toAmount(update.newCost),
        oldStock: update.oldStock.toNumber(),
        newStock: update.newStock.toNumber(),
        costChanged: update.recordHistory,
        historyId,
      };
    });
  }

  costHistory(productId: number) {
    return this.uow.run(async ({ tx }) => {
      if (!(await this.repo.productExists(tx, productId))) {
        throw new NotFoundException('Producto no encontrado');
      }
      const rows = await this.repo.findHistory(tx, productId);
      return rows.map(toHistoryView);
    });
  }
}
