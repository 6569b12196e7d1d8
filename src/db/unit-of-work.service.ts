// src/db/unit-of-work.service.ts
import { Injectable } from '@nestjs/common';
import { DatabaseService, Queryable } from './database.service';
import {
  DomainEventDispatcher,
  DomainEventHandler,
  DomainEventRegistry,
  DomainEventType,
} from '../common/events/domain-events';

/** Contexto explícito de una transacción: conexión + despachador propio. */
export interface TransactionContext {
  readonly tx: Queryable;
  readonly events: DomainEventDispatcher;
}

@Injectable()
export class UnitOfWork {
  private readonly registry = new DomainEventRegistry();

  constructor(private readonly db: DatabaseService) {}

  subscribe(type: DomainEventType | '*', handler: DomainEventHandler): void {
    if (type === '*') this.registry.onAny(handler);
    else this.registry.on(type, handler);
  }

  run<T>(work: (ctx: TransactionContext) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) =>
      work({ tx, events: this.registry.forTransaction(tx) }),
    );
  }
}
