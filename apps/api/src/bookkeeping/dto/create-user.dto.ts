import { IsOptional, IsString, IsNotEmpty, Matches } from 'class-validator';
import { CreateUserInput } from '@peppol-books/shared/types/bookkeeping.types';

/**
 * DTO for a bookkeeping user (a company we invoice or get invoiced by)
 */
export class CreateUserDto implements CreateUserInput {
  @IsString()
  @IsNotEmpty()
  company!: string;

  @IsString()
  @IsOptional()
  name?: string;

  @IsString()
  @IsOptional()
  vatNumber?: string;

  @Matches(/^[A-Z]{2}$/, { message: 'countryCode must be a 2-letter ISO code' })
  @IsOptional()
  countryCode?: string;

  @IsString()
  @IsOptional()
  street?: string;

  @IsString()
  @IsOptional()
  city?: string;

  @IsString()
  @IsOptional()
  postalCode?: string;

  @Matches(/^[^:]+:[^:]+$/, { message: 'peppolId must look like scheme:value' })
  @IsOptional()
  peppolId?: string;
}
