// src/receivables/receivables.module.ts
import { Module } from '@nestjs/common';
import { CustomersModule } from '../customers/customers.module';
import { ReceivablesController } from './receivables.controller';
import { ReceivablesRepository } from './receivables.repository';
import { ReceivablesService } from './receivables.service';

@Module({
  imports: [CustomersModule],
  controllers: [ReceivablesController],
  providers: [ReceivablesService, ReceivablesRepository],
  exports: [ReceivablesService],
})
export class ReceivablesModule {}
