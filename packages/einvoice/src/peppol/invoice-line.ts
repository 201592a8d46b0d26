import { PeppolInvoiceLine, VatCategoryCode } from '@peppol-books/shared/types/peppol.types';
import { multiply, roundHalfUp } from './money';
import { DEFAULT_UNIT_CODE } from './ubl-constants';

export interface InvoiceLineInit {
  id: string;
  name: string;
  description?: string;
  quantity: number;
  unitCode?: string;
  unitPrice: number;
  vatRate: number;
  vatCategory: VatCategoryCode;
}

/**
 * One billable item. Net and VAT amounts are derived from quantity, unit price
 * and rate on every read, so they follow any change to those fields.
 */
export class InvoiceLine implements PeppolInvoiceLine {
  readonly id: string;
  name: string;
  description?: string;
  quantity: number;
  unitCode: string;
  unitPrice: number;
  vatRate: number;
  vatCategory: VatCategoryCode;

  constructor(init: InvoiceLineInit) {
    this.id = init.id;
    this.name = init.name;
    if (init.description !== undefined) {
      this.description = init.description;
    }
    this.quantity = init.quantity;
    this.unitCode = init.unitCode ?? DEFAULT_UNIT_CODE;
    this.unitPrice = init.unitPrice;
    this.vatRate = init.vatRate;
    this.vatCategory = init.vatCategory;
  }

  /**
   * quantity × unit price before rounding
   */
  get netAmount(): number {
    return multiply(this.quantity, this.unitPrice).toNumber();
  }

  get lineExtensionAmount(): number {
    return roundHalfUp(multiply(this.quantity, this.unitPrice));
  }

  /**
   * Unrounded; rounding happens once per VAT breakdown entry
   */
  get vatAmount(): number {
    return multiply(this.quantity, this.unitPrice, this.vatRate).toNumber();
  }
}
