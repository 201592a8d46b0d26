import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  LineItemInput,
  VAT_CATEGORY_CODES,
  VatCategoryCode,
  VatExemptionReasons,
} from '@peppol-books/shared/types/peppol.types';

/**
 * DTO for one invoice line; amounts are checked again by the calculator
 */
export class InvoiceItemDto implements LineItemInput {
  @IsString()
  name!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsNumber()
  quantity!: number;

  @IsNumber()
  unitPrice!: number;

  // Rate as a fraction, 0.21 for 21 %
  @IsNumber()
  vatPct!: number;

  @IsIn(VAT_CATEGORY_CODES)
  @IsOptional()
  vatCategory?: VatCategoryCode;

  @IsString()
  @IsOptional()
  unitCode?: string;
}

/**
 * DTO for an outgoing invoice between two bookkeeping users.
 * Without supplierId the configured sender is the supplier.
 */
export class SendInvoiceDto {
  @IsString()
  @IsNotEmpty()
  invoiceId!: string;

  @IsInt()
  @Min(1)
  buyerId!: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  supplierId?: number;

  @IsISO8601({ strict: true })
  @IsOptional()
  issueDate?: string;

  @IsISO8601({ strict: true })
  @IsOptional()
  dueDate?: string;

  @Matches(/^[A-Z]{3}$/)
  @IsOptional()
  currency?: string;

  @IsString()
  @IsOptional()
  buyerReference?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => InvoiceItemDto)
  items!: InvoiceItemDto[];

  @IsObject()
  @IsOptional()
  vatExemptionReasons?: VatExemptionReasons;

  @IsString()
  @IsOptional()
  iban?: string;

  @IsString()
  @IsOptional()
  paymentReference?: string;
}
