// src/payments/dto/create-payment.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsDateString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  ALLOCATION_STRATEGIES,
  AllocationStrategy,
} from '../allocation-engine';
import { PAYMENT_METHODS, PaymentMethod } from '../invoice-settlement';

export class PaymentAllocationDto {
  @IsInt()
  invoiceId!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount!: number;
}

export class CreatePaymentDto {
  @IsInt()
  customerId!: number;

  @IsIn([...PAYMENT_METHODS])
  method!: PaymentMethod;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount!: number;

  @IsOptional()
  @IsDateString()
  paymentDate?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  reference?: string;

  @IsOptional()
  @IsString()
  notes?: string;

  // Asignaciones manuales; se aplican antes de la automática
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PaymentAllocationDto)
  allocations?: PaymentAllocationDto[];

  @IsOptional()
  @IsIn([...ALLOCATION_STRATEGIES])
  autoAllocationStrategy?: AllocationStrategy;
}
