import { IsBoolean, IsInt, IsISO8601, IsNotEmpty, IsNumber, IsOptional, IsString, Matches, Max, Min } from 'class-validator';
import { CreateTransactionInput } from '@peppol-books/shared/types/bookkeeping.types';

export class CreateTransactionDto implements CreateTransactionInput {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  @Min(1)
  fromUserId!: number;

  @IsInt()
  @Min(1)
  toUserId!: number;

  @IsNumber()
  value!: number;

  @IsNumber()
  @IsOptional()
  vat?: number;

  // Share of the VAT that can be recovered, 1 = fully deductible
  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  vatRecovery?: number;

  @Matches(/^[A-Z]{3}$/)
  @IsOptional()
  currency?: string;

  @IsISO8601()
  start!: string;

  @IsISO8601()
  @IsOptional()
  end?: string;

  @IsBoolean()
  @IsOptional()
  intervat?: boolean;

  @IsString()
  @IsOptional()
  annotation?: string;

  @IsString()
  @IsOptional()
  proof?: string;
}
