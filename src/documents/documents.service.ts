// src/documents/documents.service.ts
import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import type { Queryable } from '../db/database.service';
import { TransactionContext, UnitOfWork } from '../db/unit-of-work.service';
import type { DocumentKind } from '../common/events/domain-events';
import {
  Decimal,
  ZERO,
  formatAmount,
  toAmount,
  toDecimal,
} from '../common/money';
import { CustomersRepository } from '../customers/customers.repository';
import { PricingService } from '../pricing/pricing.service';
import { PricingRepository } from '../pricing/pricing.repository';
import {
  fallbackPolicyFor,
  resolveWithFallback,
} from '../pricing/fallback-policy';
import {
  AdvisedDocument,
  calculateMargin,
  profitabilityLevel,
  suggestDiscounts,
  validatePriceRules,
  volumeDiscountOutlook,
} from '../pricing/pricing-advice';
import { LineInput, computeLine, validateLineInput } from './line-calculator';
import { invoiceRemaining, recomputeTotals } from './document-totals';
import { LinePricing, linePricingFor } from './line-pricing';
import {
  DocumentHeader,
  DocumentLine,
  DocumentsRepository,
} from './documents.repository';
import { AddLineDto } from './dto/add-line.dto';
import { UpdateLineDto } from './dto/update-line.dto';

export interface DocumentLineView {
  id: number;
  productId: number;
  description: string | null;
  quantity: number;
  unitPrice: number;
  discountPercent: number;
  taxRate: number;
  discountAmount: number;
  lineTotalHt: number;
  lineTotalTtc: number;
  sequence: number;
}

export interface DocumentView {
  kind: DocumentKind;
  id: number;
  number: string;
  status: string;
  partyId: number;
  discountPercent: number;
  subtotal: number;
  discountAmount: number;
  taxAmount: number;
  total: number;
  paidAmount: number | null;
  remainingAmount: number | null;
  lines: DocumentLineView[];
}

export interface LineMutationResult {
  document: DocumentView;
  /** Avisos no bloqueantes (p. ej. precio base por respaldo). */
  warnings: string[];
}

function optionalDecimal(
  value: number | undefined,
  field: string,
): Decimal | undefined {
  return value === undefined ? undefined : toDecimal(value, field);
}

function toLineView(l: DocumentLine): DocumentLineView {
  return {
    id: l.id,
    productId: l.productId,
    description: l.description,
    quantity: l.quantity.toNumber(),
    unitPrice: toAmount(l.unitPrice),
    discountPercent: toAmount(l.discountPercent),
    taxRate: toAmount(l.taxRate),
    discountAmount: toAmount(l.discountAmount),
    lineTotalHt: toAmount(l.lineTotalHt),
    lineTotalTtc: toAmount(l.lineTotalTtc),
    sequence: l.sequence,
  };
}

export function toDocumentView(
  h: DocumentHeader,
  lines: DocumentLine[],
): DocumentView {
  return {
    kind: h.kind,
    id: h.id,
    number: h.number,
    status: h.status,
    partyId: h.partyId,
    discountPercent: toAmount(h.discountPercent),
    subtotal: toAmount(h.subtotal),
    discountAmount: toAmount(h.discountAmount),
    taxAmount: toAmount(h.taxAmount),
    total: toAmount(h.total),
    paidAmount: h.paidAmount === null ? null : toAmount(h.paidAmount),
    remainingAmount:
      h.remainingAmount === null ? null : toAmount(h.remainingAmount),
    lines: lines.map(toLineView),
  };
}

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly defaultTaxRate: Decimal;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly repo: DocumentsRepository,
    private readonly pricing: PricingService,
    private readonly pricingRepo: PricingRepository,
    private readonly customers: CustomersRepository,
    config: ConfigService<AppConfig, true>,
  ) {
    this.defaultTaxRate = toDecimal(
      config.get('pricing', { infer: true }).defaultTaxRate,
      'DEFAULT_TAX_RATE',
    );
  }

  getDocument(kind: DocumentKind, id: number): Promise<DocumentView> {
    return this.uow.run(async ({ tx }) => {
      const header = await this.requireHeader(tx, kind, id, false);
      const lines = await this.repo.findLines(tx, kind, id);
      return toDocumentView(header, lines);
    });
  }

  addLine(
    kind: DocumentKind,
    id: number,
    dto: AddLineDto,
  ): Promise<LineMutationResult> {
    return this.uow.run(async (ctx) => {
      const { tx } = ctx;
      const header = await this.requireDraft(tx, kind, id);
      const product = await this.pricing.requireProduct(tx, dto.productId);
      const quantity = toDecimal(dto.quantity, 'quantity');
      const overrides = {
        unitPrice: optionalDecimal(dto.unitPrice, 'unitPrice'),
        discountPercent: optionalDecimal(dto.discountPercent, 'discountPercent'),
      };

      const warnings: string[] = [];
      let pricing: LinePricing;
      if (kind === 'purchase_order') {
        // Compras: precio explícito, o costo vigente, o precio base
        pricing = {
          unitPrice: overrides.unitPrice ?? product.cost ?? product.price,
          discountPercent: overrides.discountPercent ?? ZERO,
        };
      } else {
        const outcome = await resolveWithFallback(
          () =>
            this.pricing.resolveIn(tx, product.id, header.partyId, quantity, product),
          fallbackPolicyFor(dto.pricingFallback),
          product.price,
        );
        if (outcome.warning) warnings.push(outcome.warning);
        pricing = linePricingFor(outcome.resolution, overrides);
      }

      const input: LineInput = {
        quantity,
        ...pricing,
        taxRate: optionalDecimal(dto.taxRate, 'taxRate') ?? this.defaultTaxRate,
      };
      validateLineInput(input);

      await this.repo.insertLine(tx, kind, id, {
        ...input,
        ...computeLine(input),
        productId: product.id,
        description: dto.description ?? product.name,
      });
      const document = await this.recompute(ctx, header);
      return { document, warnings };
    });
  }

  updateLine(
    kind: DocumentKind,
    id: number,
    lineId: number,
    dto: UpdateLineDto,
  ): Promise<LineMutationResult> {
    return this.uow.run(async (ctx) => {
      const header = await this.requireDraft(ctx.tx, kind, id);
      const lines = await this.repo.findLines(ctx.tx, kind, id);
      const current = lines.find((l) => l.id === lineId);
      if (!current) throw new NotFoundException('Línea no encontrada');

      const input: LineInput = {
        quantity: optionalDecimal(dto.quantity, 'quantity') ?? current.quantity,
        unitPrice: optionalDecimal(dto.unitPrice, 'unitPrice') ?? current.unitPrice,
        discountPercent:
          optionalDecimal(dto.discountPercent, 'discountPercent') ??
          current.discountPercent,
        taxRate: optionalDecimal(dto.taxRate, 'taxRate') ?? current.taxRate,
      };
      validateLineInput(input);

      const updated: DocumentLine = {
        ...current,
        ...input,
        description: dto.description ?? current.description,
      };
      const document = await this.recompute(
        ctx,
        header,
        lines.map((l) => (l.id === lineId ? updated : l)),
      );
      return { document, warnings: [] };
    });
  }

  removeLine(
    kind: DocumentKind,
    id: number,
    lineId: number,
  ): Promise<LineMutationResult> {
    return this.uow.run(async (ctx) => {
      const header = await this.requireDraft(ctx.tx, kind, id);
      const removed = await this.repo.deleteLine(ctx.tx, kind, id, lineId);
      if (!removed) throw new NotFoundException('Línea no encontrada');
      const document = await this.recompute(ctx, header);
      return { document, warnings: [] };
    });
  }

  async setDocumentDiscount(
    kind: DocumentKind,
    id: number,
    discountPercent: number,
  ): Promise<DocumentView> {
    const pct = toDecimal(discountPercent, 'discountPercent');
    if (pct.lt(0) || pct.gt(100)) {
      throw new BadRequestException('El descuento debe estar entre 0 y 100');
    }
    return this.uow.run(async (ctx) => {
      const header = await this.requireDraft(ctx.tx, kind, id);
      await this.repo.setDiscountPercent(ctx.tx, kind, id, pct);
      return this.recompute(ctx, { ...header, discountPercent: pct });
    });
  }

  /** Totales + reglas blandas de precio, sugerencias y rentabilidad. */
  async analyze(kind: DocumentKind, id: number) {
    if (kind === 'purchase_order') {
      throw new BadRequestException(
        'El análisis de precios aplica solo a documentos de venta',
      );
    }
    return this.uow.run(async ({ tx }) => {
      const header = await this.requireHeader(tx, kind, id, false);
      const lines = await this.repo.findLines(tx, kind, id);
      const customer = await this.customers.findById(tx, header.partyId);
      const costs = await this.pricingRepo.findCosts(
        tx,
        [...new Set(lines.map((l) => l.productId))],
      );

      const doc: AdvisedDocument = {
        discountPercent: header.discountPercent,
        lines: lines.map((l) => ({
          id: l.id,
          productId: l.productId,
          quantity: l.quantity,
          unitPrice: l.unitPrice,
          discountPercent: l.discountPercent,
          lineTotalHt: l.lineTotalHt,
        })),
      };
      const totals = recomputeTotals(lines, header.discountPercent);
      const outlook = volumeDiscountOutlook(doc.lines);
      const margin = calculateMargin(doc.lines, costs);

      return {
        kind,
        id,
        totals: {
          subtotal: toAmount(totals.subtotal),
          discountAmount: toAmount(totals.discountAmount),
          subtotalAfterDiscount: toAmount(totals.subtotalAfterDiscount),
          taxAmount: toAmount(totals.taxAmount),
          total: toAmount(totals.total),
        },
        warnings: validatePriceRules(doc),
        suggestions: suggestDiscounts(doc, customer?.conditions ?? null).map(
          (s) => ({
            type: s.type,
            description: s.description,
            discountPercent: toAmount(s.discountPercent),
            condition: s.condition,
            currentValue: toAmount(s.currentValue),
            thresholdValue: toAmount(s.thresholdValue),
          }),
        ),
        volumeOutlook: {
          totalQuantity: outlook.totalQuantity.toNumber(),
          totalAmount: toAmount(outlook.totalAmount),
          volumeDiscounts: outlook.volumeDiscounts.map((v) => ({
            threshold: v.threshold.toNumber(),
            discountPercent: toAmount(v.discountPercent),
            applicable: v.applicable,
            remainingQuantity: v.remainingQuantity
              ? v.remainingQuantity.toNumber()
              : null,
          })),
        },
        margin: {
          totalCost: toAmount(margin.totalCost),
          totalRevenue: toAmount(margin.totalRevenue),
          grossMargin: toAmount(margin.grossMargin),
          grossMarginPercent: toAmount(margin.grossMarginPercent),
          netMargin: toAmount(margin.netMargin),
          netMarginPercent: toAmount(margin.netMarginPercent),
          profitability: profitabilityLevel(margin.grossMarginPercent),
        },
      };
    });
  }

  // ===== helpers =====

  private async requireHeader(
    tx: Queryable,
    kind: DocumentKind,
    id: number,
    lock: boolean,
  ): Promise<DocumentHeader> {
    const header = await this.repo.findHeader(tx, kind, id, { lock });
    if (!header) throw new NotFoundException('Documento no encontrado');
    return header;
  }

  private async requireDraft(
    tx: Queryable,
    kind: DocumentKind,
    id: number,
  ): Promise<DocumentHeader> {
    const header = await this.requireHeader(tx, kind, id, true);
    if (header.status !== 'draft') {
      throw new ConflictException(
        `Solo se pueden modificar documentos en borrador (estado actual: ${header.status})`,
      );
    }
    return header;
  }

  /** Recalcula todas las líneas y los totales, y persiste con 2 decimales. */
  private async recompute(
    ctx: TransactionContext,
    header: DocumentHeader,
    lines?: DocumentLine[],
  ): Promise<DocumentView> {
    const { tx, events } = ctx;
    const current = lines ?? (await this.repo.findLines(tx, header.kind, header.id));
    const recomputed = current.map((l) => ({ ...l, ...computeLine(l) }));
    for (const line of recomputed) {
      await this.repo.saveLine(tx, header.kind, line);
    }

    const totals = recomputeTotals(recomputed, header.discountPercent);
    const remaining =
      header.kind === 'invoice'
        ? invoiceRemaining(totals.total, header.paidAmount ?? ZERO)
        : null;
    await this.repo.saveTotals(tx, header.kind, header.id, totals, remaining);

    await events.dispatch({
      type: 'document.totals_recomputed',
      kind: header.kind,
      documentId: header.id,
      total: formatAmount(totals.total),
    });
    this.logger.debug(
      `Totales recalculados ${header.kind} #${header.id}: ${formatAmount(totals.total)}`,
    );

    return toDocumentView(
      {
        ...header,
        subtotal: totals.subtotal,
        discountAmount: totals.discountAmount,
        taxAmount: totals.taxAmount,
        total: totals.total,
        remainingAmount: remaining,
      },
      recomputed,
    );
  }
}
