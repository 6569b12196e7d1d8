// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import configuration from './config/configuration';
import { DatabaseModule } from './db/database.module';
import { ClockModule } from './common/clock.module';
import { AuditModule } from './audit/audit.module';
import { CustomersModule } from './customers/customers.module';
import { PricingModule } from './pricing/pricing.module';
import { DocumentsModule } from './documents/documents.module';
import { CostingModule } from './costing/costing.module';
import { PaymentsModule } from './payments/payments.module';
import { ReceivablesModule } from './receivables/receivables.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [() => configuration()] }),
    DatabaseModule,
    ClockModule,
    AuditModule,
    CustomersModule,
    PricingModule,
    DocumentsModule,
    CostingModule,
    PaymentsModule,
    ReceivablesModule,
  ],
})
export class AppModule {}
