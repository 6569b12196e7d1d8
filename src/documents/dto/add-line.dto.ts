// src/documents/dto/add-line.dto.ts
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import type { FallbackPolicyName } from '../../pricing/fallback-policy';

export class AddLineDto {
  @IsInt()
  productId!: number;

  @IsNumber()
  @Min(0.001)
  quantity!: number;

  // Si viene, reemplaza el precio resuelto
  @IsOptional()
  @IsNumber()
  @Min(0)
  unitPrice?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(100)
  discountPercent?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  taxRate?: number;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;

  @IsOptional()
  @IsIn(['strict', 'base_price'])
  pricingFallback?: FallbackPolicyName;
}
