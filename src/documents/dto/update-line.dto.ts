// src/documents/dto/update-line.dto.ts
import { OmitType, PartialType } from '@nestjs/mapped-types';
import { AddLineDto } from './add-line.dto';

export class UpdateLineDto extends PartialType(
  OmitType(AddLineDto, ['productId', 'pricingFallback'] as const),
) {}
