// src/payments/dto/preview-allocation.dto.ts
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNumber, IsOptional, Min } from 'class-validator';
import {
  ALLOCATION_STRATEGIES,
  AllocationStrategy,
} from '../allocation-engine';

export class PreviewAllocationQueryDto {
  @Type(() => Number)
  @IsInt()
  customerId!: number;

  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount!: number;

  @IsOptional()
  @IsIn([...ALLOCATION_STRATEGIES])
  strategy?: AllocationStrategy;
}
