// src/receivables/dto/aging-query.dto.ts
import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsDateString, IsInt, IsOptional } from 'class-validator';

export class AgingQueryDto {
  @IsOptional()
  @IsDateString()
  asOf?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  customerId?: number;

  // ?includePaid=true
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true')
  @IsBoolean()
  includePaid?: boolean;
}

export class MarkOverdueDto {
  @IsOptional()
  @IsDateString()
  asOf?: string;
}
