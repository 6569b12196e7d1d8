// src/receivables/receivables.service.ts
import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { UnitOfWork } from '../db/unit-of-work.service';
import { CLOCK, Clock, toDateOnly } from '../common/clock';
import { Decimal, HUNDRED, ZERO, toAmount, toDecimal } from '../common/money';
import {
  CustomerRecord,
  CustomersRepository,
} from '../customers/customers.repository';
import { parseDateOnly } from '../payments/payments.repository';
import {
  BucketTotals,
  agingTotals,
  buildAgingReport,
} from './aging-report';
import {
  CreditValidationResult,
  debtExcludingOrder,
  validateCredit,
} from './credit-validator';
import { ReceivablesRepository } from './receivables.repository';

function bucketsView(b: BucketTotals) {
  return {
    '0-30': toAmount(b['0-30']),
    '31-60': toAmount(b['31-60']),
    '61-90': toAmount(b['61-90']),
    '90+': toAmount(b['90+']),
  };
}

function creditView(r: CreditValidationResult) {
  return {
    valid: r.valid,
    currentDebt: toAmount(r.currentDebt),
    creditLimit: toAmount(r.creditLimit),
    availableCredit: toAmount(r.availableCredit),
    newDebtAfterOrder: toAmount(r.newDebtAfterOrder),
    message: r.message,
  };
}

@Injectable()
export class ReceivablesService {
  private readonly logger = new Logger(ReceivablesService.name);

  constructor(
    private readonly uow: UnitOfWork,
    private readonly repo: ReceivablesRepository,
    private readonly customers: CustomersRepository,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  // =========================
  // Cartera por edades
  // =========================
  async agingReport(
    opts: { asOf?: string; customerId?: number; includePaid?: boolean } = {},
  ) {
    const asOf = this.asOfDate(opts.asOf);
    return this.uow.run(async ({ tx }) => {
      const invoices = await this.repo.findOutstandingInvoices(tx, {
        customerId: opts.customerId,
        includePaid: opts.includePaid,
      });
      const rows = buildAgingReport(invoices, asOf);
      const totals = agingTotals(rows);
      return {
        asOf: toDateOnly(asOf),
        totals: {
          buckets: bucketsView(totals.buckets),
          totalOutstanding: toAmount(totals.totalOutstanding),
        },
        rows: rows.map((r) => ({
          customerId: r.customerId,
          customerName: r.customerName,
          buckets: bucketsView(r.buckets),
          totalOutstanding: toAmount(r.totalOutstanding),
          invoiceCounts: r.invoiceCounts,
          invoices: r.invoices.map((i) => ({
            id: i.id,
            number: i.number,
            dueDate: toDateOnly(i.dueDate),
            daysOverdue: i.daysOverdue,
            bucket: i.bucket,
            remainingAmount: toAmount(i.remainingAmount),
          })),
        })),
      };
    });
  }

  async markOverdueInvoices(asOf?: string) {
    const day = toDateOnly(this.asOfDate(asOf));
    return this.uow.run(async ({ tx }) => {
      const invoiceIds = await this.repo.markOverdue(tx, day);
      if (invoiceIds.length) {
        this.logger.log(`${invoiceIds.length} facturas marcadas como vencidas al ${day}`);
      }
      return { asOf: day, updated: invoiceIds.length, invoiceIds };
    });
  }

  // =========================
  // Crédito
  // =========================
  async validateCreditForOrder(
    customerId: number,
    orderTotal: number,
    excludingOrderId?: number,
  ) {
    const total = toDecimal(orderTotal, 'orderTotal');
    if (total.lt(0)) {
      throw new BadRequestException('El total del pedido no puede ser negativo');
    }
    return this.uow.run(async ({ tx }) => {
      const customer = await this.requireCustomer(tx, customerId);
      const debt = await this.currentDebt(tx, customer.id, excludingOrderId);
      return creditView(validateCredit(customer.conditions, debt, total));
    });
  }

  creditSummary(customerId: number) {
    return this.uow.run(async ({ tx }) => {
      const customer = await this.requireCustomer(tx, customerId);
      const debt = await this.currentDebt(tx, customer.id);
      const c = customer.conditions;
      const limit = c ? c.creditLimit : ZERO;
      return {
        customerId: customer.id,
        customerName: customer.name,
        creditLimit: toAmount(limit),
        currentDebt: toAmount(debt),
        availableCredit: toAmount(limit.minus(debt)),
        utilizationPercent: limit.gt(0)
          ? toAmount(debt.dividedBy(limit).times(HUNDRED))
          : 0,
        blockOnCreditExceeded: c ? c.blockOnCreditExceeded : false,
        paymentTermsDays: c ? c.paymentTermsDays : null,
      };
    });
  }

  /** false si el cliente no existe o el monto supera el crédito. */
  async checkCreditAvailable(
    customerId: number,
    amount: number,
  ): Promise<boolean> {
    const total = toDecimal(amount, 'amount');
    return this.uow.run(async ({ tx }) => {
      const customer = await this.customers.findById(tx, customerId);
      if (!customer) return false;
      const debt = await this.currentDebt(tx, customer.id);
      return validateCredit(customer.conditions, debt, total).valid;
    });
  }

  availableCredit(customerId: number): Promise<number> {
    return this.uow.run(async ({ tx }) => {
      const customer = await this.requireCustomer(tx, customerId);
      if (!customer.conditions) return 0;
      const debt = await this.currentDebt(tx, customer.id);
      return toAmount(customer.conditions.creditLimit.minus(debt));
    });
  }

  // ===== helpers =====

  private asOfDate(raw?: string): Date {
    if (!raw) return this.clock.now();
    const d = /^\d{4}-\d{2}-\d{2}$/.test(raw) ? parseDateOnly(raw) : new Date(raw);
    if (isNaN(d.getTime())) throw new BadRequestException('asOf inválido');
    return d;
  }

  private async requireCustomer(
    tx: Queryable,
    id: number,
  ): Promise<CustomerRecord> {
    const customer = await this.customers.findById(tx, id);
    if (!customer) throw new NotFoundException('Cliente no encontrado');
    return customer;
  }

  private async currentDebt(
    tx: Queryable,
    customerId: number,
    excludingOrderId?: number,
  ): Promise<Decimal> {
    const committed = await this.repo.committedOrdersTotal(tx, customerId);
    const excluded =
      excludingOrderId != null
        ? await this.repo.committedOrderTotal(tx, excludingOrderId, customerId)
        : null;
    return debtExcludingOrder(committed, excluded);
  }
}
