import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import {
  InvoiceTotals,
  PaymentMeans,
  PeppolInvoice,
  PeppolInvoiceLine,
  PeppolParty,
  VatBreakdownEntry,
  VatCategoryCode,
  VatExemptionReasons,
} from '@peppol-books/shared/types/peppol.types';
import { splitPeppolId } from './invoice-builder';
import { formatAmount, formatPercent, formatPrice, formatQuantity } from './money';
import {
  BIS_BILLING_CUSTOMIZATION_ID,
  BIS_BILLING_PROFILE_ID,
  UBL_NAMESPACES,
  VAT_TAX_SCHEME,
} from './ubl-constants';
import { UblValidator } from './ubl-validator';
import { VatCalculator } from './vat-calculator';

const { cac: CAC, cbc: CBC } = UBL_NAMESPACES;

/**
 * Peppol BIS Billing 3.0 UBL serializer.
 *
 * Output is deterministic: every block is emitted from ordered arrays in the
 * canonical BIS sequence, never from object key order. The VAT breakdown and
 * the document totals are recomputed from the lines, so a line edited after
 * the invoice was built cannot leave stale totals in the document.
 */
export class UblGenerator {
  constructor(
    private readonly validator = new UblValidator(),
    private readonly calculator = new VatCalculator(),
  ) {}

  /**
   * UTF-8 encoded document, ready to be sent or archived
   */
  serialize(invoice: PeppolInvoice): Buffer {
    return Buffer.from(this.generate(invoice), 'utf8');
  }

  generate(invoice: PeppolInvoice): string {
    this.validator.assertComplete(invoice);

    const { vatBreakdown, totals } = this.calculator.calculate(invoice.lines, {
      exemptionReasons: exemptionReasonsOf(invoice.vatBreakdown),
      prepaidAmount: invoice.totals.prepaidAmount,
    });

    const currency = invoice.currency;
    const root = create({ version: '1.0', encoding: 'UTF-8' })
      .ele(UBL_NAMESPACES.invoice, 'Invoice', {
        'xmlns:cac': CAC,
        'xmlns:cbc': CBC,
      });

    // Customization and profile ID (Peppol BIS Billing 3.0)
    basic(root, 'CustomizationID', BIS_BILLING_CUSTOMIZATION_ID);
    basic(root, 'ProfileID', BIS_BILLING_PROFILE_ID);

    // Invoice identification
    basic(root, 'ID', invoice.id);
    basic(root, 'IssueDate', invoice.issueDate);
    if (invoice.dueDate) {
      basic(root, 'DueDate', invoice.dueDate);
    }
    basic(root, 'InvoiceTypeCode', invoice.invoiceTypeCode);
    basic(root, 'DocumentCurrencyCode', currency);
    if (invoice.buyerReference) {
      basic(root, 'BuyerReference', invoice.buyerReference);
    }

    this.addParty(aggregate(root, 'AccountingSupplierParty'), invoice.supplier, 'supplier');
    this.addParty(aggregate(root, 'AccountingCustomerParty'), invoice.buyer, 'buyer');

    if (invoice.paymentMeans) {
      this.addPaymentMeans(root, invoice.paymentMeans);
    }
    if (invoice.paymentTerms) {
      basic(aggregate(root, 'PaymentTerms'), 'Note', invoice.paymentTerms.note);
    }

    this.addTaxTotal(root, vatBreakdown, totals.taxAmount, currency);
    this.addLegalMonetaryTotal(root, totals, currency);

    invoice.lines.forEach(line => {
      this.addInvoiceLine(root, line, currency);
    });

    return root.end({ prettyPrint: true });
  }

  private addParty(container: XMLBuilder, party: PeppolParty, role: string): void {
    const node = aggregate(container, 'Party');

    const [scheme, id] = splitPeppolId(party.peppolId, `${role}.peppolId`);
    basic(node, 'EndpointID', id, { schemeID: scheme });

    basic(aggregate(node, 'PartyName'), 'Name', party.name);

    const address = aggregate(node, 'PostalAddress');
    if (party.address.street) {
      basic(address, 'StreetName', party.address.street);
    }
    if (party.address.city) {
      basic(address, 'CityName', party.address.city);
    }
    if (party.address.postalCode) {
      basic(address, 'PostalZone', party.address.postalCode);
    }
    basic(aggregate(address, 'Country'), 'IdentificationCode', party.address.countryCode);

    if (party.vatNumber) {
      const taxScheme = aggregate(node, 'PartyTaxScheme');
      basic(taxScheme, 'CompanyID', party.vatNumber);
      basic(aggregate(taxScheme, 'TaxScheme'), 'ID', VAT_TAX_SCHEME);
    }

    basic(aggregate(node, 'PartyLegalEntity'), 'RegistrationName', party.name);
  }

  private addPaymentMeans(parent: XMLBuilder, paymentMeans: PaymentMeans): void {
    const node = aggregate(parent, 'PaymentMeans');
    basic(node, 'PaymentMeansCode', paymentMeans.code);

    if (paymentMeans.paymentId) {
      basic(node, 'PaymentID', paymentMeans.paymentId);
    }

    const account = paymentMeans.payeeAccount;
    if (account) {
      const accountNode = aggregate(node, 'PayeeFinancialAccount');
      basic(accountNode, 'ID', account.iban);
      if (account.name) {
        basic(accountNode, 'Name', account.name);
      }
      if (account.bic) {
        basic(aggregate(accountNode, 'FinancialInstitutionBranch'), 'ID', account.bic);
      }
    }
  }

  private addTaxTotal(parent: XMLBuilder, vatBreakdown: VatBreakdownEntry[], taxAmount: number, currency: string): void {
    const taxTotal = aggregate(parent, 'TaxTotal');
    amount(taxTotal, 'TaxAmount', taxAmount, currency);

    vatBreakdown.forEach(entry => {
      const subtotal = aggregate(taxTotal, 'TaxSubtotal');
      amount(subtotal, 'TaxableAmount', entry.taxableAmount, currency);
      amount(subtotal, 'TaxAmount', entry.taxAmount, currency);
      this.addTaxCategory(aggregate(subtotal, 'TaxCategory'), entry.category, entry.rate, entry.exemptionReason);
    });
  }

  private addTaxCategory(node: XMLBuilder, category: VatCategoryCode, rate: number, exemptionReason?: string): void {
    basic(node, 'ID', category);
    // "Not subject to VAT" carries no rate at all
    if (category !== 'O') {
      basic(node, 'Percent', formatPercent(rate));
    }
    if (exemptionReason) {
      basic(node, 'TaxExemptionReason', exemptionReason);
    }
    basic(aggregate(node, 'TaxScheme'), 'ID', VAT_TAX_SCHEME);
  }

  private addLegalMonetaryTotal(parent: XMLBuilder, totals: InvoiceTotals, currency: string): void {
    const lmt = aggregate(parent, 'LegalMonetaryTotal');
    amount(lmt, 'LineExtensionAmount', totals.lineExtensionAmount, currency);
    amount(lmt, 'TaxExclusiveAmount', totals.taxExclusiveAmount, currency);
    amount(lmt, 'TaxInclusiveAmount', totals.taxInclusiveAmount, currency);

    if (totals.prepaidAmount) {
      amount(lmt, 'PrepaidAmount', totals.prepaidAmount, currency);
    }

    amount(lmt, 'PayableAmount', totals.payableAmount, currency);
  }

  private addInvoiceLine(parent: XMLBuilder, line: PeppolInvoiceLine, currency: string): void {
    const il = aggregate(parent, 'InvoiceLine');
    basic(il, 'ID', line.id);
    basic(il, 'InvoicedQuantity', formatQuantity(line.quantity), { unitCode: line.unitCode });
    amount(il, 'LineExtensionAmount', line.lineExtensionAmount, currency);

    // Item
    const item = aggregate(il, 'Item');
    if (line.description) {
      basic(item, 'Description', line.description);
    }
    basic(item, 'Name', line.name);
    this.addTaxCategory(aggregate(item, 'ClassifiedTaxCategory'), line.vatCategory, line.vatRate);

    // Price
    basic(aggregate(il, 'Price'), 'PriceAmount', formatPrice(line.unitPrice), { currencyID: currency });
  }
}

function exemptionReasonsOf(vatBreakdown: VatBreakdownEntry[]): VatExemptionReasons {
  const reasons: VatExemptionReasons = {};
  for (const entry of vatBreakdown) {
    if (entry.exemptionReason) {
      reasons[entry.category] = entry.exemptionReason;
    }
  }
  return reasons;
}

function basic(parent: XMLBuilder, name: string, text: string, attributes?: Record<string, string>): XMLBuilder {
  return parent.ele(CBC, `cbc:${name}`, attributes).txt(text);
}

function aggregate(parent: XMLBuilder, name: string): XMLBuilder {
  return parent.ele(CAC, `cac:${name}`);
}

function amount(parent: XMLBuilder, name: string, value: number, currency: string): XMLBuilder {
  return basic(parent, name, formatAmount(value), { currencyID: currency });
}
