// src/costing/dto/stock-receipt.dto.ts
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class StockReceiptDto {
  @IsInt()
  productId!: number;

  @IsNumber()
  @Min(0)
  purchasePrice!: number;

  // Cantidad de ESTA recepción (parciales se envían por separado)
  @IsNumber()
  @Min(0.001)
  quantityReceived!: number;

  @IsNumber()
  stockOnHandBefore!: number;

  @IsNumber()
  stockOnHandAfter!: number;

  @IsOptional()
  @IsInt()
  purchaseOrderId?: number;

  @IsOptional()
  @IsInt()
  purchaseOrderLineId?: number;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  reference?: string;
}
