// src/costing/costing.controller.ts
import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { CostingService } from './costing.service';
import { StockReceiptDto } from './dto/stock-receipt.dto';

@Controller('costing')
export class CostingController {
  constructor(private readonly svc: CostingService) {}

  @Post('receipts')
  applyReceipt(@Body() dto: StockReceiptDto) {
    return this.svc.applyStockReceipt(dto);
  }

  @Get('products/:productId/history')
  history(@Param('productId', ParseIntPipe) productId: number) {
    return this.svc.costHistory(productId);
  }
}
