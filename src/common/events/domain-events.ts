// src/common/events/domain-events.ts
import type { Queryable } from '../../db/database.service';

export type DocumentKind = 'quote' | 'order' | 'invoice' | 'purchase_order';

/** Eventos que el core emite; los montos viajan como texto con 2 decimales. */
export type DomainEvent =
  | {
      type: 'product.cost_changed';
      productId: number;
      oldCost: string | null;
      newCost: string;
      purchaseOrderId: number | null;
    }
  | {
      type: 'payment.allocated';
      paymentId: number;
      invoiceId: number;
      amount: string;
    }
  | {
      type: 'invoice.paid';
      invoiceId: number;
      customerId: number;
      paidAmount: string;
    }
  | {
      type: 'document.totals_recomputed';
      kind: DocumentKind;
      documentId: number;
      total: string;
    };

export type DomainEventType = DomainEvent['type'];

export type DomainEventHandler = (
  event: DomainEvent,
  tx: Queryable,
) => Promise<void> | void;

type HandlerEntry = {
  type: DomainEventType | '*';
  handler: DomainEventHandler;
};

/**
 * Registro de handlers. Se llena al arrancar los módulos y no cambia después;
 * cada transacción obtiene su propio despachador con `forTransaction`.
 */
export class DomainEventRegistry {
  private readonly entries: HandlerEntry[] = [];

  on(type: DomainEventType, handler: DomainEventHandler): void {
    this.entries.push({ type, handler });
  }

  onAny(handler: DomainEventHandler): void {
    this.entries.push({ type: '*', handler });
  }

  forTransaction(tx: Queryable): DomainEventDispatcher {
    return new DomainEventDispatcher(tx, [...this.entries]);
  }
}

/**
 * Despacho síncrono dentro de la transacción: los handlers se esperan en orden
 * y un fallo se propaga para que la transacción haga rollback.
 */
export class DomainEventDispatcher {
  constructor(
    private readonly tx: Queryable,
    private readonly entries: readonly HandlerEntry[],
  ) {}

  async dispatch(event: DomainEvent): Promise<void> {
    for (const entry of this.entries) {
      if (entry.type !== '*' && entry.type !== event.type) continue;
      await entry.handler(event, this.tx);
    }
  }
}
