import {
  LineItemInput,
  PaymentMeans,
  PaymentTerms,
  PeppolInvoice,
  PeppolParty,
  VatCategoryCode,
  VatExemptionReasons,
} from '@peppol-books/shared/types/peppol.types';
import { ValidationError } from './errors';
import { InvoiceLine } from './invoice-line';
import {
  DEFAULT_CURRENCY,
  DEFAULT_INVOICE_TYPE_CODE,
  DEFAULT_PAYMENT_DAYS,
} from './ubl-constants';
import { VatCalculator } from './vat-calculator';

export interface BuildInvoiceInput {
  id: string;
  issueDate: Date | string;
  dueDate?: Date | string;
  invoiceTypeCode?: string;
  currency?: string;
  buyerReference?: string;
  supplier: PeppolParty;
  buyer: PeppolParty;
  items: LineItemInput[];
  paymentMeans?: PaymentMeans;
  paymentTerms?: PaymentTerms;
  vatExemptionReasons?: VatExemptionReasons;
  prepaidAmount?: number;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Build a complete Peppol invoice from business data: parties are copied by
 * value, line amounts, VAT breakdown and totals are derived.
 */
export function buildInvoice(input: BuildInvoiceInput, calculator = new VatCalculator()): PeppolInvoice {
  const supplier = copyParty(input.supplier, 'supplier');
  const buyer = copyParty(input.buyer, 'buyer');

  const currency = input.currency ?? DEFAULT_CURRENCY;
  if (!/^[A-Z]{3}$/.test(currency)) {
    throw new ValidationError(`currency must be an ISO 4217 code, got ${currency}`, 'currency');
  }

  const issueDate = toIsoDate(input.issueDate, 'issueDate');
  const dueDate = input.dueDate !== undefined
    ? toIsoDate(input.dueDate, 'dueDate')
    : addDays(issueDate, DEFAULT_PAYMENT_DAYS);

  const lines = input.items.map((item, index) => toInvoiceLine(item, index));
  const { vatBreakdown, totals } = calculator.calculate(lines, {
    exemptionReasons: input.vatExemptionReasons,
    prepaidAmount: input.prepaidAmount,
  });

  const invoice: PeppolInvoice = {
    id: input.id,
    issueDate,
    dueDate,
    invoiceTypeCode: input.invoiceTypeCode ?? DEFAULT_INVOICE_TYPE_CODE,
    currency,
    buyerReference: input.buyerReference ?? buyer.name,
    supplier,
    buyer,
    paymentTerms: input.paymentTerms ?? { note: `Payment due by ${dueDate}` },
    lines,
    vatBreakdown,
    totals,
  };

  if (input.paymentMeans) {
    invoice.paymentMeans = input.paymentMeans;
  }

  return invoice;
}

function toInvoiceLine(item: LineItemInput, index: number): InvoiceLine {
  const vatCategory = resolveCategory(item, index);

  return new InvoiceLine({
    id: String(index + 1),
    name: item.name || item.description || `Item ${index + 1}`,
    description: item.description || undefined,
    quantity: item.quantity,
    unitCode: item.unitCode,
    unitPrice: item.unitPrice,
    vatRate: item.vatPct,
    vatCategory,
  });
}

// A zero-rated line must say whether it is zero rated, exempt, reverse charge...
function resolveCategory(item: LineItemInput, index: number): VatCategoryCode {
  if (item.vatCategory) return item.vatCategory;
  if (item.vatPct > 0) return 'S';

  throw new ValidationError('VAT category is required for a line without VAT', 'vatCategory', index);
}

/**
 * Validate the party invariants and detach it from the caller's object
 */
export function copyParty(party: PeppolParty, role: 'supplier' | 'buyer'): PeppolParty {
  splitPeppolId(party.peppolId, `${role}.peppolId`);

  const countryCode = party.address.countryCode;
  if (!/^[A-Z]{2}$/.test(countryCode)) {
    throw new ValidationError(
      `country code must be a 2-letter ISO code, got "${countryCode}"`,
      `${role}.address.countryCode`,
    );
  }

  const copy: PeppolParty = {
    peppolId: party.peppolId,
    name: party.name,
    address: { countryCode },
  };
  if (party.vatNumber) copy.vatNumber = party.vatNumber;
  if (party.address.street) copy.address.street = party.address.street;
  if (party.address.city) copy.address.city = party.address.city;
  if (party.address.postalCode) copy.address.postalCode = party.address.postalCode;

  return copy;
}

/**
 * Split "0208:BE0123456789" into its ISO 6523 scheme and the identifier
 */
export function splitPeppolId(peppolId: string, field: string): [scheme: string, value: string] {
  const parts = peppolId.split(':');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(`Peppol identifier must look like scheme:value, got "${peppolId}"`, field);
  }
  return [parts[0], parts[1]];
}

/**
 * Format as YYYY-MM-DD
 */
export function toIsoDate(value: Date | string, field: string): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError('invalid date', field);
    }
    // Calendar date where the invoice is issued, not the UTC one
    const month = String(value.getMonth() + 1).padStart(2, '0');
    const day = String(value.getDate()).padStart(2, '0');
    return `${value.getFullYear()}-${month}-${day}`;
  }

  if (!ISO_DATE.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00Z`))) {
    throw new ValidationError(`date must be YYYY-MM-DD, got "${value}"`, field);
  }
  return value;
}

function addDays(isoDate: string, days: number): string {
  const date = new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS);
  return date.toISOString().split('T')[0];
}
