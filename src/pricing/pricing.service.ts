// src/pricing/pricing.service.ts
import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { UnitOfWork } from '../db/unit-of-work.service';
import { CustomersRepository } from '../customers/customers.repository';
import { Decimal, toAmount, toDecimal } from '../common/money';
import { CLOCK, Clock } from '../common/clock';
import { PricingRepository, ProductRecord } from './pricing.repository';
import {
  PriceResolution,
  PriceSource,
  resolvePrice,
  toPriceResult,
} from './price-resolver';

export interface PriceView {
  productId: number;
  customerId: number;
  quantity: number;
  basePrice: number;
  finalPrice: number;
  appliedDiscountPercent: number;
  discountAmount: number;
  source: PriceSource;
}

@Injectable()
export class PricingService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly repo: PricingRepository,
    private readonly customers: CustomersRepository,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async resolve(
    productId: number,
    customerId: number,
    quantity: number,
  ): Promise<PriceView> {
    const qty = toDecimal(quantity, 'quantity');
    const resolution = await this.uow.run(({ tx }) =>
      this.resolveIn(tx, productId, customerId, qty),
    );
    const r = toPriceResult(resolution);
    return {
      productId,
      customerId,
      quantity,
      basePrice: toAmount(r.basePrice),
      finalPrice: toAmount(r.finalPrice),
      appliedDiscountPercent: toAmount(r.appliedDiscountPercent),
      discountAmount: toAmount(r.discountAmount),
      source: r.source,
    };
  }

  async requireProduct(tx: Queryable, productId: number): Promise<ProductRecord> {
    const product = await this.repo.findProduct(tx, productId);
    if (!product) throw new NotFoundException('Producto no encontrado');
    return product;
  }

  /** Resolución dentro de una transacción ya abierta (líneas de documento). */
  async resolveIn(
    tx: Queryable,
    productId: number,
    customerId: number,
    quantity: Decimal,
    product?: ProductRecord,
  ): Promise<PriceResolution> {
    const prod = product ?? (await this.requireProduct(tx, productId));
    const customer = await this.customers.findById(tx, customerId);
    if (!customer) throw new NotFoundException('Cliente no encontrado');

    const now = this.clock.now();
    const conditions = customer.conditions;
    const [promotions, volumeTiers, priceListEntry] = await Promise.all([
      this.repo.findActivePromotions(tx, prod.id, now),
      this.repo.findVolumeTiers(tx, prod.id),
      conditions?.priceListId != null
        ? this.repo.findPriceListEntry(tx, conditions.priceListId, prod.id)
        : Promise.resolve(null),
    ]);

    return resolvePrice(
      {
        product: { id: prod.id, price: prod.price },
        customerId,
        conditions,
        promotions,
        volumeTiers,
        priceListEntry,
      },
      quantity,
      now,
    );
  }
}
