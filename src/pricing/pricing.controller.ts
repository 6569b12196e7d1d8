// src/pricing/pricing.controller.ts
import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { PricingService } from './pricing.service';
import { ResolvePriceQueryDto } from './dto/resolve-price.dto';

@Controller('pricing')
export class PricingController {
  constructor(private readonly svc: PricingService) {}

  @Get('products/:productId/price')
  resolve(
    @Param('productId', ParseIntPipe) productId: number,
    @Query() q: ResolvePriceQueryDto,
  ) {
    return this.svc.resolve(productId, q.customerId, q.quantity ?? 1);
  }
}
