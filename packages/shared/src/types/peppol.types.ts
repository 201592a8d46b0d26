/**
 * UNCL5305 duty/tax category codes accepted by Peppol BIS Billing 3.0.
 */
export const VAT_CATEGORY_CODES = ['S', 'Z', 'E', 'AE', 'K', 'G', 'O', 'L', 'M'] as const;

export type VatCategoryCode = (typeof VAT_CATEGORY_CODES)[number];

export interface PostalAddress {
  street?: string;
  city?: string;
  postalCode?: string;
  countryCode: string; // ISO 3166-1 alpha-2
}

export interface PeppolParty {
  peppolId: string; // e.g. "0208:BE0123456789"
  name: string;
  vatNumber?: string;
  address: PostalAddress;
}

/**
 * Line descriptor as supplied by the caller, before any amount is derived.
 */
export interface LineItemInput {
  name: string;
  description?: string;
  quantity: number;
  unitPrice: number;
  vatPct: number; // fraction, e.g. 0.21
  vatCategory?: VatCategoryCode;
  unitCode?: string; // UN/ECE Rec 20
}

export interface PeppolInvoiceLine {
  readonly id: string;
  name: string;
  description?: string;
  quantity: number;
  unitCode: string;
  unitPrice: number;
  vatRate: number;
  vatCategory: VatCategoryCode;
  readonly lineExtensionAmount: number;
  readonly vatAmount: number;
}

export interface VatBreakdownEntry {
  category: VatCategoryCode;
  rate: number;
  exemptionReason?: string;
  taxableAmount: number;
  taxAmount: number;
}

export interface InvoiceTotals {
  lineExtensionAmount: number;
  taxExclusiveAmount: number;
  taxAmount: number;
  taxInclusiveAmount: number;
  prepaidAmount?: number;
  payableAmount: number;
}

export type VatExemptionReasons = Partial<Record<VatCategoryCode, string>>;

export interface PaymentMeans {
  code: string; // UNCL4461, "30" = credit transfer, "58" = SEPA credit transfer
  paymentId?: string;
  payeeAccount?: {
    iban: string;
    name?: string;
    bic?: string;
  };
}

export interface PaymentTerms {
  note: string;
}

export interface PeppolInvoice {
  id: string;
  issueDate: string; // YYYY-MM-DD
  dueDate?: string;
  invoiceTypeCode: string; // "380" = commercial invoice
  currency: string;
  buyerReference?: string;

  supplier: PeppolParty;
  buyer: PeppolParty;

  paymentMeans?: PaymentMeans;
  paymentTerms?: PaymentTerms;

  lines: PeppolInvoiceLine[];
  vatBreakdown: VatBreakdownEntry[];
  totals: InvoiceTotals;
}

export interface TotalsMismatch {
  field: string; // e.g. "taxInclusiveAmount", "vatBreakdown[S/0.21].taxAmount", "lines[0].lineExtensionAmount"
  declared: number | null;
  recomputed: number | null;
}

export interface TotalsCheckResult {
  passed: boolean;
  declared: InvoiceTotals;
  recomputed: InvoiceTotals;
  mismatches: TotalsMismatch[];
}

export interface ParsedInvoice {
  invoice: PeppolInvoice;
  totalsCheck: TotalsCheckResult;
}
