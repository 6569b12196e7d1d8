// src/audit/audit.service.ts
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import type { Queryable } from '../db/database.service';
import { UnitOfWork } from '../db/unit-of-work.service';
import type { DomainEvent } from '../common/events/domain-events';

type AuditPayload = {
  entity: string;
  entityId: number;
  action: string;
  changes: unknown;
};

export function auditPayloadFor(event: DomainEvent): AuditPayload {
  switch (event.type) {
    case 'product.cost_changed':
      return {
        entity: 'Product',
        entityId: event.productId,
        action: 'COST_CHANGED',
        changes: { before: event.oldCost, after: event.newCost },
      };
    case 'payment.allocated':
      return {
        entity: 'Payment',
        entityId: event.paymentId,
        action: 'ALLOCATED',
        changes: { invoiceId: event.invoiceId, amount: event.amount },
      };
    case 'invoice.paid':
      return {
        entity: 'Invoice',
        entityId: event.invoiceId,
        action: 'PAID',
        changes: { paidAmount: event.paidAmount },
      };
    case 'document.totals_recomputed':
      return {
        entity: event.kind,
        entityId: event.documentId,
        action: 'TOTALS_RECOMPUTED',
        changes: { total: event.total },
      };
  }
}

@Injectable()
export class AuditService implements OnModuleInit {
  private readonly logger = new Logger(AuditService.name);

  constructor(private readonly uow: UnitOfWork) {}

  onModuleInit() {
    // Cada evento de dominio deja rastro en la misma transacción
    this.uow.subscribe('*', (event, tx) => this.log(tx, event));
  }

  async log(tx: Queryable, event: DomainEvent) {
    const p = auditPayloadFor(event);
    this.logger.debug(`${p.entity}#${p.entityId} ${p.action}`);
    await tx.query(
      `INSERT INTO audit_log (entity, entity_id, action, changes)
       VALUES ($1, $2, $3, $4)`,
      [p.entity, p.entityId, p.action, JSON.stringify(p.changes)],
    );
  }
}
