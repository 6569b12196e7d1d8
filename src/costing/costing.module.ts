// src/costing/costing.module.ts
import { Module } from '@nestjs/common';
import { CostingController } from './costing.controller';
import { CostingRepository } from './costing.repository';
import { CostingService } from './costing.service';

@Module({
  controllers: [CostingController],
  providers: [CostingService, CostingRepository],
  exports: [CostingService],
})
export class CostingModule {}
