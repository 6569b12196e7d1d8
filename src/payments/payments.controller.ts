// src/payments/payments.controller.ts
import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { PaymentsService } from './payments.service';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { AllocatePaymentDto, AutoAllocateDto } from './dto/allocate-payment.dto';
import { ReconcilePaymentDto } from './dto/reconcile-payment.dto';
import { PreviewAllocationQueryDto } from './dto/preview-allocation.dto';

@Controller('payments')
export class PaymentsController {
  constructor(private readonly svc: PaymentsService) {}

  @Post()
  create(@Body() dto: CreatePaymentDto) {
    return this.svc.createPayment(dto);
  }

  // Debe ir antes de ':id'
  @Get('preview')
  preview(@Query() q: PreviewAllocationQueryDto) {
    return this.svc.previewAllocation(q.customerId, q.amount, q.strategy);
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.svc.getPayment(id);
  }

  // =========================
  // Asignación a facturas
  // =========================
  @Post(':id/allocations')
  allocate(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AllocatePaymentDto,
  ) {
    return this.svc.allocatePayment(id, dto.allocations);
  }

  @Post(':id/auto-allocate')
  autoAllocate(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AutoAllocateDto,
  ) {
    return this.svc.autoAllocate(id, dto.strategy);
  }

  // =========================
  // Ciclo de vida
  // =========================
  @Post(':id/confirm')
  confirm(@Param('id', ParseIntPipe) id: number) {
    return this.svc.confirmPayment(id);
  }

  @Post(':id/cancel')
  cancel(@Param('id', ParseIntPipe) id: number) {
    return this.svc.cancelPayment(id);
  }

  @Post(':id/reconcile')
  reconcile(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ReconcilePaymentDto,
  ) {
    return this.svc.reconcilePayment(id, dto);
  }
}
