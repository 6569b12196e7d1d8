// src/pricing/pricing.module.ts
import { Module } from '@nestjs/common';
import { CustomersModule } from '../customers/customers.module';
import { PricingController } from './pricing.controller';
import { PricingRepository } from './pricing.repository';
import { PricingService } from './pricing.service';

@Module({
  imports: [CustomersModule],
  controllers: [PricingController],
  providers: [PricingService, PricingRepository],
  exports: [PricingService, PricingRepository],
})
export class PricingModule {}
