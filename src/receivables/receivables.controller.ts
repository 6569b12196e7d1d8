// src/receivables/receivables.controller.ts
import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ReceivablesService } from './receivables.service';
import { AgingQueryDto, MarkOverdueDto } from './dto/aging-query.dto';
import { CreditCheckDto } from './dto/credit-check.dto';

@Controller('receivables')
export class ReceivablesController {
  constructor(private readonly svc: ReceivablesService) {}

  @Get('aging')
  aging(@Query() q: AgingQueryDto) {
    return this.svc.agingReport(q);
  }

  @Post('mark-overdue')
  markOverdue(@Body() dto: MarkOverdueDto) {
    return this.svc.markOverdueInvoices(dto.asOf);
  }

  @Get('customers/:customerId/credit')
  credit(@Param('customerId', ParseIntPipe) customerId: number) {
    return this.svc.creditSummary(customerId);
  }

  @Post('customers/:customerId/credit-check')
  creditCheck(
    @Param('customerId', ParseIntPipe) customerId: number,
    @Body() dto: CreditCheckDto,
  ) {
    return this.svc.validateCreditForOrder(
      customerId,
      dto.orderTotal,
      dto.excludingOrderId,
    );
  }
}
