// src/payments/dto/allocate-payment.dto.ts
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsOptional,
  ValidateNested,
} from 'class-validator';
import {
  ALLOCATION_STRATEGIES,
  AllocationStrategy,
} from '../allocation-engine';
import { PaymentAllocationDto } from './create-payment.dto';

export class AllocatePaymentDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => PaymentAllocationDto)
  allocations!: PaymentAllocationDto[];
}

export class AutoAllocateDto {
  @IsOptional()
  @IsIn([...ALLOCATION_STRATEGIES])
  strategy?: AllocationStrategy;
}
