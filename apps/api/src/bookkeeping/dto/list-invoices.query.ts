import { IsIn, IsOptional } from 'class-validator';
import { InvoiceDirection } from '@peppol-books/shared/types/bookkeeping.types';

export class ListInvoicesQuery {
  @IsIn(['outgoing', 'incoming'])
  @IsOptional()
  direction?: InvoiceDirection;
}
