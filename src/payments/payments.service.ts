// src/payments/payments.service.ts
import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import type { Queryable } from '../db/database.service';
import { TransactionContext, UnitOfWork } from '../db/unit-of-work.service';
import { CLOCK, Clock, toDateOnly } from '../common/clock';
import {
  Decimal,
  assertCents,
  formatAmount,
  sumOf,
  toAmount,
  toDecimal,
} from '../common/money';
import { CustomersRepository } from '../customers/customers.repository';
import { AllocationStrategy, allocate } from './allocation-engine';
import {
  PaymentState,
  assertAllocatable,
  assertCancellable,
  assertConfirmable,
  assertReconcilable,
  settleInvoice,
  unallocatedAmount,
} from './invoice-settlement';
import { PaymentRecord, PaymentsRepository } from './payments.repository';
import { CreatePaymentDto, PaymentAllocationDto } from './dto/create-payment.dto';
import { ReconcilePaymentDto } from './dto/reconcile-payment.dto';

export interface PaymentView {
  id: number;
  customerId: number;
  method: string;
  status: string;
  amount: number;
  allocatedAmount: number;
  unallocatedAmount: number;
  paymentDate: string;
  reference: string | null;
  notes: string | null;
  bankReference: string | null;
  reconciledAt: Date | null;
  allocations: Array<{
    id: number;
    invoiceId: number;
    invoiceNumber: string;
    amount: number;
  }>;
}

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);
  private readonly defaultStrategy: AllocationStrategy;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly repo: PaymentsRepository,
    private readonly customers: CustomersRepository,
    config: ConfigService<AppConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.defaultStrategy = config.get('payments', {
      infer: true,
    }).defaultAllocationStrategy;
  }

  /** Crea el pago, aplica asignaciones (manuales y automática) y lo confirma. */
  createPayment(dto: CreatePaymentDto): Promise<PaymentView> {
    return this.uow.run(async (ctx) => {
      const { tx } = ctx;
      const customer = await this.customers.findById(tx, dto.customerId);
      if (!customer) throw new NotFoundException('Cliente no encontrado');

      const amount = toDecimal(dto.amount, 'amount');
      if (amount.lte(0)) {
        throw new BadRequestException('El monto del pago debe ser mayor que 0');
      }
      assertCents(amount, 'El monto del pago');
      const id = await this.repo.insertPayment(tx, {
        customerId: customer.id,
        method: dto.method,
        amount,
        paymentDate: dto.paymentDate ?? toDateOnly(this.clock.now()),
        reference: dto.reference ?? null,
        notes: dto.notes ?? null,
      });

      let state: PaymentState = {
        id,
        status: 'pending',
        amount,
        allocatedAmount: new Decimal(0),
      };
      state = await this.applyManual(ctx, state, customer.id, dto.allocations ?? []);
      if (dto.autoAllocationStrategy && unallocatedAmount(state).gt(0)) {
        state = await this.applyAuto(ctx, state, customer.id, dto.autoAllocationStrategy);
      }

      assertConfirmable(state);
      await this.repo.updateStatus(tx, id, 'confirmed');
      this.logger.log(
        `Pago #${id} de ${formatAmount(amount)} registrado (cliente ${customer.id}, aplicado ${formatAmount(state.allocatedAmount)})`,
      );
      return this.loadView(tx, id);
    });
  }

  allocatePayment(
    paymentId: number,
    allocations: PaymentAllocationDto[],
  ): Promise<PaymentView> {
    return this.uow.run(async (ctx) => {
      const payment = await this.requirePayment(ctx.tx, paymentId, true);
      await this.applyManual(ctx, payment, payment.customerId, allocations);
      return this.loadView(ctx.tx, paymentId);
    });
  }

  /** Aplica automáticamente lo que resta del pago. */
  autoAllocate(
    paymentId: number,
    strategy?: AllocationStrategy,
  ): Promise<PaymentView> {
    return this.uow.run(async (ctx) => {
      const payment = await this.requirePayment(ctx.tx, paymentId, true);
      if (!unallocatedAmount(payment).gt(0)) {
        throw new BadRequestException('El pago no tiene saldo por aplicar');
      }
      await this.applyAuto(
        ctx,
        payment,
        payment.customerId,
        strategy ?? this.defaultStrategy,
      );
      return this.loadView(ctx.tx, paymentId);
    });
  }

  /** Simulación sin escrituras. */
  async previewAllocation(
    customerId: number,
    amount: number,
    strategy?: AllocationStrategy,
  ) {
    const chosen = strategy ?? this.defaultStrategy;
    const paymentAmount = toDecimal(amount, 'amount');
    return this.uow.run(async ({ tx }) => {
      const invoices = await this.repo.findOpenInvoices(tx, customerId);
      const plan = allocate(invoices, paymentAmount, chosen);
      const byId = new Map(invoices.map((i) => [i.id, i]));
      const totalAllocated = sumOf(plan.map((a) => a.amount));
      return {
        customerId,
        amount: toAmount(paymentAmount),
        strategy: chosen,
        allocations: plan.map((a) => {
          const inv = byId.get(a.invoiceId);
          return {
            invoiceId: a.invoiceId,
            invoiceNumber: inv ? inv.number : null,
            remainingAmount: inv ? toAmount(inv.remainingAmount) : null,
            amount: toAmount(a.amount),
          };
        }),
        totalAllocated: toAmount(totalAllocated),
        unallocated: toAmount(paymentAmount.minus(totalAllocated)),
      };
    });
  }

  getPayment(id: number): Promise<PaymentView> {
    return this.uow.run(async ({ tx }) => {
      await this.requirePayment(tx, id, false);
      return this.loadView(tx, id);
    });
  }

  confirmPayment(id: number): Promise<PaymentView> {
    return this.uow.run(async ({ tx }) => {
      const payment = await this.requirePayment(tx, id, true);
      assertConfirmable(payment);
      await this.repo.updateStatus(tx, id, 'confirmed');
      return this.loadView(tx, id);
    });
  }

  cancelPayment(id: number): Promise<PaymentView> {
    return this.uow.run(async ({ tx }) => {
      const payment = await this.requirePayment(tx, id, true);
      const allocations = await this.repo.findAllocations(tx, id);
      assertCancellable(payment, allocations.length);
      await this.repo.updateStatus(tx, id, 'cancelled');
      this.logger.log(`Pago #${id} anulado`);
      return this.loadView(tx, id);
    });
  }

  reconcilePayment(id: number, dto: ReconcilePaymentDto): Promise<PaymentView> {
    return this.uow.run(async ({ tx }) => {
      const payment = await this.requirePayment(tx, id, true);
      assertReconcilable(payment);
      await this.repo.markReconciled(
        tx,
        id,
        dto.bankReference ?? null,
        dto.reconciledAt ? new Date(dto.reconciledAt) : this.clock.now(),
      );
      return this.loadView(tx, id);
    });
  }

  // ===== helpers =====

  private async requirePayment(
    tx: Queryable,
    id: number,
    lock: boolean,
  ): Promise<PaymentRecord> {
    const payment = await this.repo.findPayment(tx, id, { lock });
    if (!payment) throw new NotFoundException('Pago no encontrado');
    return payment;
  }

  private async applyManual(
    ctx: TransactionContext,
    payment: PaymentState,
    customerId: number,
    allocations: PaymentAllocationDto[],
  ): Promise<PaymentState> {
    let state = payment;
    for (const a of allocations) {
      state = await this.allocateOne(
        ctx,
        state,
        customerId,
        a.invoiceId,
        toDecimal(a.amount, 'amount'),
      );
    }
    return state;
  }

  private async applyAuto(
    ctx: TransactionContext,
    payment: PaymentState,
    customerId: number,
    strategy: AllocationStrategy,
  ): Promise<PaymentState> {
    const invoices = await this.repo.findOpenInvoices(ctx.tx, customerId, {
      lock: true,
    });
    const plan = allocate(invoices, unallocatedAmount(payment), strategy);
    let state = payment;
    for (const a of plan) {
      state = await this.allocateOne(ctx, state, customerId, a.invoiceId, a.amount);
    }
    return state;
  }

  /** Única vía que escribe paid_amount / remaining_amount de una factura. */
  private async allocateOne(
    ctx: TransactionContext,
    payment: PaymentState,
    customerId: number,
    invoiceId: number,
    amount: Decimal,
  ): Promise<PaymentState> {
    const { tx, events } = ctx;
    assertAllocatable(payment, amount);

    const invoice = await this.repo.lockInvoice(tx, invoiceId);
    if (!invoice) throw new NotFoundException(`Factura ${invoiceId} no encontrada`);
    if (invoice.customerId !== customerId) {
      throw new BadRequestException(
        `La factura ${invoice.number} no pertenece al cliente del pago`,
      );
    }

    const settlement = settleInvoice(invoice, amount);
    await this.repo.insertAllocation(tx, payment.id, invoice.id, amount);
    await this.repo.applySettlement(tx, settlement);

    await events.dispatch({
      type: 'payment.allocated',
      paymentId: payment.id,
      invoiceId: invoice.id,
      amount: formatAmount(amount),
    });
    if (settlement.becamePaid) {
      await events.dispatch({
        type: 'invoice.paid',
        invoiceId: invoice.id,
        customerId,
        paidAmount: formatAmount(settlement.paidAmount),
      });
    }

    return { ...payment, allocatedAmount: payment.allocatedAmount.plus(amount) };
  }

  private async loadView(tx: Queryable, id: number): Promise<PaymentView> {
    const payment = await this.requirePayment(tx, id, false);
    const allocations = await this.repo.findAllocations(tx, id);
    return {
      id: payment.id,
      customerId: payment.customerId,
      method: payment.method,
      status: payment.status,
      amount: toAmount(payment.amount),
      allocatedAmount: toAmount(payment.allocatedAmount),
      unallocatedAmount: toAmount(unallocatedAmount(payment)),
      paymentDate: payment.paymentDate,
      reference: payment.reference,
      notes: payment.notes,
      bankReference: payment.bankReference,
      reconciledAt: payment.reconciledAt,
      allocations: allocations.map((a) => ({
        id: a.id,
        invoiceId: a.invoiceId,
        invoiceNumber: a.invoiceNumber,
        amount: toAmount(a.amount),
      })),
    };
  }
}
