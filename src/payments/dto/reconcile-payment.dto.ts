// src/payments/dto/reconcile-payment.dto.ts
import { IsDateString, IsOptional, IsString, MaxLength } from 'class-validator';

export class ReconcilePaymentDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  bankReference?: string;

  @IsOptional()
  @IsDateString()
  reconciledAt?: string;
}
