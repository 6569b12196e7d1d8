// src/receivables/dto/credit-check.dto.ts
import { IsInt, IsNumber, IsOptional, Min } from 'class-validator';

export class CreditCheckDto {
  @IsNumber()
  @Min(0)
  orderTotal!: number;

  // Pedido que se revalida: su total no cuenta dos veces
  @IsOptional()
  @IsInt()
  excludingOrderId?: number;
}
