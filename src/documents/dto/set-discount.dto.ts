// src/documents/dto/set-discount.dto.ts
import { IsNumber, Max, Min } from 'class-validator';

export class SetDiscountDto {
  @IsNumber()
  @Min(0)
  @Max(100)
  discountPercent!: number;
}
