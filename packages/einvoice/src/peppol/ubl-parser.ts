import { DOMParser } from '@xmldom/xmldom';
import Decimal from 'decimal.js';
import {
  InvoiceTotals,
  ParsedInvoice,
  PaymentMeans,
  PeppolInvoice,
  PeppolParty,
  TotalsMismatch,
  VatBreakdownEntry,
  VatCategoryCode,
  VatExemptionReasons,
} from '@peppol-books/shared/types/peppol.types';
import {
  MalformedXMLError,
  SchemaViolationError,
  TotalsMismatchError,
  UnsupportedFeatureError,
  UnsupportedVersionError,
  ValidationError,
} from './errors';
import { InvoiceLine } from './invoice-line';
import { amountsDiffer, percentToRate } from './money';
import {
  BIS_BILLING_CUSTOMIZATION_ID,
  BIS_BILLING_PROFILE_ID,
  UBL_NAMESPACES,
  UBL_VERSION_ID,
  VAT_TAX_SCHEME,
} from './ubl-constants';
import { VatCalculation, VatCalculator, isVatCategoryCode } from './vat-calculator';

export interface UblParseOptions {
  /**
   * 'throw' (default) raises TotalsMismatchError, 'report' only flags the result
   */
  totalsCheck?: 'throw' | 'report';
}

const ELEMENT_NODE = 1;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

const UNESCAPED_AMPERSAND = /&(?!(?:[A-Za-z_][\w.-]*|#\d+|#x[0-9A-Fa-f]+);)/;

/**
 * Offset of the first '&' that starts no entity or character reference, or -1.
 * Comments, CDATA sections and processing instructions may hold a literal '&';
 * they are blanked out with the same length so offsets stay put.
 */
function findUnescapedAmpersand(source: string): number {
  const markup = source.replace(/<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>/g, match =>
    ' '.repeat(match.length),
  );
  return markup.search(UNESCAPED_AMPERSAND);
}

function namespaceOf(prefix: string): string {
  if (prefix === 'cac') return UBL_NAMESPACES.cac;
  if (prefix === 'cbc') return UBL_NAMESPACES.cbc;
  throw new Error(`Unknown UBL prefix ${prefix}`);
}

/**
 * Element cursor that matches children by namespace URI and local name, so
 * the prefixes a sender picked and the order of siblings do not matter.
 * Steps are written as "cac:Party" and resolved against the UBL namespaces.
 */
class UblNode {
  constructor(
    readonly element: Element,
    readonly path: string,
  ) {}

  children(step: string): UblNode[] {
    const [prefix, localName] = step.split(':');
    const namespace = namespaceOf(prefix);
    const found: UblNode[] = [];
    const nodes = this.element.childNodes;

    for (let i = 0; i < nodes.length; i++) {
      const node = nodes.item(i);
      if (isElement(node) && node.namespaceURI === namespace && node.localName === localName) {
        found.push(new UblNode(node, `${this.path}/${step}`));
      }
    }

    return found;
  }

  child(step: string): UblNode | undefined {
    return this.children(step)[0];
  }

  require(step: string): UblNode {
    const node = this.child(step);
    if (!node) {
      throw new SchemaViolationError('Missing required element', `${this.path}/${step}`);
    }
    return node;
  }

  find(path: string): UblNode | undefined {
    let current: UblNode | undefined = this;
    for (const step of path.split('/')) {
      current = current?.child(step);
    }
    return current;
  }

  /**
   * Trimmed text of the element at `path` (or of this element), undefined when absent or empty
   */
  text(path?: string): string | undefined {
    const node = path ? this.find(path) : this;
    const value = node?.element.textContent?.trim();
    return value ? value : undefined;
  }

  requireText(path?: string): string {
    const value = this.text(path);
    if (value === undefined) {
      throw new SchemaViolationError('Missing required value', path ? `${this.path}/${path}` : this.path);
    }
    return value;
  }

  attribute(name: string): string | undefined {
    const value = this.element.getAttribute(name)?.trim();
    return value ? value : undefined;
  }

  requireAttribute(name: string): string {
    const value = this.attribute(name);
    if (value === undefined) {
      throw new SchemaViolationError(`Missing required attribute ${name}`, this.path);
    }
    return value;
  }

  decimal(path?: string): number {
    const value = this.requireText(path);
    if (!DECIMAL.test(value)) {
      throw new SchemaViolationError(`Invalid decimal "${value}"`, path ? `${this.path}/${path}` : this.path);
    }
    return Number(value);
  }

  optionalDecimal(path: string): number | undefined {
    return this.find(path) === undefined ? undefined : this.decimal(path);
  }
}

/**
 * Peppol BIS Billing 3.0 UBL decoder.
 *
 * Tolerates any element order on input but is strict on mandatory data, and
 * cross-checks the declared totals against a recomputation of the lines.
 */
export class UblParser {
  constructor(private readonly calculator = new VatCalculator()) {}

  parse(xml: string | Uint8Array, options: UblParseOptions = {}): ParsedInvoice {
    const source = typeof xml === 'string' ? xml : Buffer.from(xml).toString('utf8');
    const doc = this.parseXml(source.replace(/^\uFEFF/, ''));

    const rootElement = doc.documentElement;
    if (rootElement.localName !== 'Invoice' || rootElement.namespaceURI !== UBL_NAMESPACES.invoice) {
      throw new SchemaViolationError(
        `Unknown root element {${rootElement.namespaceURI ?? ''}}${rootElement.localName}`,
        rootElement.nodeName,
      );
    }

    const root = new UblNode(rootElement, 'Invoice');
    this.checkVersion(root);
    this.checkUnsupportedFeatures(root);

    const { invoice, declaredLineAmounts } = this.parseInvoice(root);
    const totalsCheck = this.checkTotals(invoice, declaredLineAmounts);

    if (!totalsCheck.passed && (options.totalsCheck ?? 'throw') === 'throw') {
      throw new TotalsMismatchError(totalsCheck.declared, totalsCheck.recomputed, totalsCheck.mismatches);
    }

    return { invoice, totalsCheck };
  }

  private parseXml(source: string): Document {
    const problems: string[] = [];
    const record = (message: string) => {
      problems.push(message);
    };

    const ampersand = findUnescapedAmpersand(source);
    if (ampersand !== -1) {
      throw new MalformedXMLError(`unescaped '&' at offset ${ampersand}`);
    }

    // xmldom reports a mismatched end tag as a warning only
    let doc: Document;
    try {
      doc = new DOMParser({
        errorHandler: { warning: record, error: record, fatalError: record },
      }).parseFromString(source, 'text/xml');
    } catch (error) {
      throw new MalformedXMLError(error instanceof Error ? error.message : String(error));
    }

    if (problems.length > 0) {
      throw new MalformedXMLError(problems[0]);
    }
    if (!doc || !doc.documentElement) {
      throw new MalformedXMLError('no root element');
    }

    return doc;
  }

  /**
   * Customization and profile decide how the rest is read, so check them first
   */
  private checkVersion(root: UblNode): void {
    const ublVersion = root.text('cbc:UBLVersionID');
    if (ublVersion !== undefined && ublVersion !== UBL_VERSION_ID) {
      throw new UnsupportedVersionError('UBLVersionID', ublVersion);
    }

    const customizationId = root.requireText('cbc:CustomizationID');
    if (customizationId !== BIS_BILLING_CUSTOMIZATION_ID) {
      throw new UnsupportedVersionError('CustomizationID', customizationId);
    }

    const profileId = root.requireText('cbc:ProfileID');
    if (profileId !== BIS_BILLING_PROFILE_ID) {
      throw new UnsupportedVersionError('ProfileID', profileId);
    }
  }

  private checkUnsupportedFeatures(root: UblNode): void {
    const embedded = root.element.getElementsByTagNameNS(UBL_NAMESPACES.cbc, 'EmbeddedDocumentBinaryObject');
    if (embedded.length > 0) {
      throw new UnsupportedFeatureError(
        'embedded binary attachment',
        'Invoice/cac:AdditionalDocumentReference/cac:Attachment/cbc:EmbeddedDocumentBinaryObject',
      );
    }

    if (root.child('cac:AllowanceCharge')) {
      throw new UnsupportedFeatureError('document level allowance or charge', 'Invoice/cac:AllowanceCharge');
    }

    root.children('cac:InvoiceLine').forEach((line, index) => {
      if (line.child('cac:AllowanceCharge')) {
        throw new UnsupportedFeatureError(
          'line level allowance or charge',
          `Invoice/cac:InvoiceLine[${index + 1}]/cac:AllowanceCharge`,
        );
      }
    });

    const rounding = root.find('cac:LegalMonetaryTotal/cbc:PayableRoundingAmount');
    if (rounding && rounding.decimal() !== 0) {
      throw new UnsupportedFeatureError('payable rounding amount', rounding.path);
    }
  }

  private parseInvoice(root: UblNode): { invoice: PeppolInvoice; declaredLineAmounts: number[] } {
    const currency = root.requireText('cbc:DocumentCurrencyCode');
    if (!/^[A-Z]{3}$/.test(currency)) {
      throw new SchemaViolationError(`Invalid currency code "${currency}"`, 'Invoice/cbc:DocumentCurrencyCode');
    }

    const invoice: PeppolInvoice = {
      id: root.requireText('cbc:ID'),
      issueDate: this.parseDate(root, 'cbc:IssueDate'),
      invoiceTypeCode: root.requireText('cbc:InvoiceTypeCode'),
      currency,
      supplier: this.parseParty(root.require('cac:AccountingSupplierParty')),
      buyer: this.parseParty(root.require('cac:AccountingCustomerParty')),
      lines: [],
      vatBreakdown: this.parseVatBreakdown(root),
      totals: this.parseLegalMonetaryTotal(root),
    };

    if (root.child('cbc:DueDate')) {
      invoice.dueDate = this.parseDate(root, 'cbc:DueDate');
    }

    const buyerReference = root.text('cbc:BuyerReference');
    if (buyerReference) {
      invoice.buyerReference = buyerReference;
    }

    const paymentMeans = root.child('cac:PaymentMeans');
    if (paymentMeans) {
      invoice.paymentMeans = this.parsePaymentMeans(paymentMeans);
    }

    const paymentTermsNote = root.text('cac:PaymentTerms/cbc:Note');
    if (paymentTermsNote) {
      invoice.paymentTerms = { note: paymentTermsNote };
    }

    const lineNodes = root.children('cac:InvoiceLine');
    if (lineNodes.length === 0) {
      throw new SchemaViolationError('At least one invoice line is required', 'Invoice/cac:InvoiceLine');
    }

    const declaredLineAmounts: number[] = [];
    lineNodes.forEach((node, index) => {
      const lineNode = new UblNode(node.element, `Invoice/cac:InvoiceLine[${index + 1}]`);
      invoice.lines.push(this.parseInvoiceLine(lineNode));
      declaredLineAmounts.push(lineNode.decimal('cbc:LineExtensionAmount'));
    });

    return { invoice, declaredLineAmounts };
  }

  private parseDate(parent: UblNode, step: string): string {
    const value = parent.requireText(step);
    if (!ISO_DATE.test(value)) {
      throw new SchemaViolationError(`Invalid date "${value}"`, `${parent.path}/${step}`);
    }
    return value;
  }

  private parseParty(container: UblNode): PeppolParty {
    const party = container.require('cac:Party');

    const endpoint = party.require('cbc:EndpointID');
    const scheme = endpoint.requireAttribute('schemeID');
    const endpointValue = endpoint.requireText();
    if (scheme.includes(':') || endpointValue.includes(':')) {
      throw new SchemaViolationError('Endpoint identifier must not contain ":"', endpoint.path);
    }

    const name = party.text('cac:PartyName/cbc:Name') ?? party.text('cac:PartyLegalEntity/cbc:RegistrationName');
    if (!name) {
      throw new SchemaViolationError('Missing party name', `${party.path}/cac:PartyLegalEntity/cbc:RegistrationName`);
    }

    const address = party.require('cac:PostalAddress');
    const countryCode = address.requireText('cac:Country/cbc:IdentificationCode');
    if (!/^[A-Z]{2}$/.test(countryCode)) {
      throw new SchemaViolationError(
        `Invalid country code "${countryCode}"`,
        `${address.path}/cac:Country/cbc:IdentificationCode`,
      );
    }

    const result: PeppolParty = {
      peppolId: `${scheme}:${endpointValue}`,
      name,
      address: { countryCode },
    };

    const street = address.text('cbc:StreetName');
    if (street) result.address.street = street;
    const city = address.text('cbc:CityName');
    if (city) result.address.city = city;
    const postalCode = address.text('cbc:PostalZone');
    if (postalCode) result.address.postalCode = postalCode;

    const vatScheme = party
      .children('cac:PartyTaxScheme')
      .find(taxScheme => taxScheme.text('cac:TaxScheme/cbc:ID') === VAT_TAX_SCHEME);
    const vatNumber = vatScheme?.text('cbc:CompanyID');
    if (vatNumber) result.vatNumber = vatNumber;

    return result;
  }

  private parsePaymentMeans(node: UblNode): PaymentMeans {
    const paymentMeans: PaymentMeans = { code: node.requireText('cbc:PaymentMeansCode') };

    const paymentId = node.text('cbc:PaymentID');
    if (paymentId) paymentMeans.paymentId = paymentId;

    const account = node.child('cac:PayeeFinancialAccount');
    if (account) {
      paymentMeans.payeeAccount = { iban: account.requireText('cbc:ID') };
      const accountName = account.text('cbc:Name');
      if (accountName) paymentMeans.payeeAccount.name = accountName;
      const bic = account.text('cac:FinancialInstitutionBranch/cbc:ID');
      if (bic) paymentMeans.payeeAccount.bic = bic;
    }

    return paymentMeans;
  }

  private parseVatBreakdown(root: UblNode): VatBreakdownEntry[] {
    // A second TaxTotal may state VAT in the tax currency, without subtotals
    const taxTotal = root.children('cac:TaxTotal').find(node => node.child('cac:TaxSubtotal'));
    if (!taxTotal) {
      throw new SchemaViolationError('Missing VAT breakdown', 'Invoice/cac:TaxTotal/cac:TaxSubtotal');
    }

    return taxTotal.children('cac:TaxSubtotal').map(subtotal => {
      const category = subtotal.require('cac:TaxCategory');
      const entry: VatBreakdownEntry = {
        category: this.parseCategoryCode(category),
        rate: this.parseRate(category),
        taxableAmount: subtotal.decimal('cbc:TaxableAmount'),
        taxAmount: subtotal.decimal('cbc:TaxAmount'),
      };

      const reason = category.text('cbc:TaxExemptionReason');
      if (reason) entry.exemptionReason = reason;

      return entry;
    });
  }

  private parseLegalMonetaryTotal(root: UblNode): InvoiceTotals {
    const lmt = root.require('cac:LegalMonetaryTotal');
    const taxTotal = root.children('cac:TaxTotal').find(node => node.child('cac:TaxSubtotal'));

    const totals: InvoiceTotals = {
      lineExtensionAmount: lmt.decimal('cbc:LineExtensionAmount'),
      taxExclusiveAmount: lmt.decimal('cbc:TaxExclusiveAmount'),
      taxAmount: taxTotal ? taxTotal.decimal('cbc:TaxAmount') : 0,
      taxInclusiveAmount: lmt.decimal('cbc:TaxInclusiveAmount'),
      payableAmount: lmt.decimal('cbc:PayableAmount'),
    };

    const prepaid = lmt.optionalDecimal('cbc:PrepaidAmount');
    if (prepaid) totals.prepaidAmount = prepaid;

    return totals;
  }

  private parseInvoiceLine(node: UblNode): InvoiceLine {
    const quantity = node.require('cbc:InvoicedQuantity');
    const item = node.require('cac:Item');
    const taxCategory = item.require('cac:ClassifiedTaxCategory');
    const price = node.require('cac:Price');

    // Price may be stated per base quantity, e.g. 12.00 per 10 units
    let unitPrice = price.decimal('cbc:PriceAmount');
    const baseQuantity = price.optionalDecimal('cbc:BaseQuantity');
    if (baseQuantity !== undefined && baseQuantity !== 1) {
      if (baseQuantity <= 0) {
        throw new SchemaViolationError('Base quantity must be positive', `${price.path}/cbc:BaseQuantity`);
      }
      unitPrice = new Decimal(unitPrice).dividedBy(baseQuantity).toNumber();
    }

    return new InvoiceLine({
      id: node.requireText('cbc:ID'),
      name: item.requireText('cbc:Name'),
      description: item.text('cbc:Description'),
      quantity: quantity.decimal(),
      unitCode: quantity.requireAttribute('unitCode'),
      unitPrice,
      vatRate: this.parseRate(taxCategory),
      vatCategory: this.parseCategoryCode(taxCategory),
    });
  }

  /**
   * Unknown codes are rejected rather than mapped to a default category
   */
  private parseCategoryCode(category: UblNode): VatCategoryCode {
    const code = category.requireText('cbc:ID');
    if (!isVatCategoryCode(code)) {
      throw new SchemaViolationError(`Unknown VAT category code "${code}"`, `${category.path}/cbc:ID`);
    }
    return code;
  }

  private parseRate(category: UblNode): number {
    const percent = category.optionalDecimal('cbc:Percent');
    return percent === undefined ? 0 : percentToRate(percent);
  }

  private checkTotals(invoice: PeppolInvoice, declaredLineAmounts: number[]): ParsedInvoice['totalsCheck'] {
    const exemptionReasons: VatExemptionReasons = {};
    invoice.vatBreakdown.forEach(entry => {
      if (entry.exemptionReason && !exemptionReasons[entry.category]) {
        exemptionReasons[entry.category] = entry.exemptionReason;
      }
    });

    let recomputed: VatCalculation;
    try {
      recomputed = this.calculator.calculate(invoice.lines, {
        exemptionReasons,
        prepaidAmount: invoice.totals.prepaidAmount,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        const path = error.lineIndex === undefined
          ? 'Invoice/cac:LegalMonetaryTotal'
          : `Invoice/cac:InvoiceLine[${error.lineIndex + 1}]`;
        throw new SchemaViolationError(error.message, path);
      }
      throw error;
    }

    const mismatches: TotalsMismatch[] = this.calculator.compare(
      { vatBreakdown: invoice.vatBreakdown, totals: invoice.totals },
      recomputed,
    );

    invoice.lines.forEach((line, index) => {
      const declared = declaredLineAmounts[index];
      if (amountsDiffer(declared, line.lineExtensionAmount)) {
        mismatches.push({
          field: `lines[${index}].lineExtensionAmount`,
          declared,
          recomputed: line.lineExtensionAmount,
        });
      }
    });

    return {
      passed: mismatches.length === 0,
      declared: invoice.totals,
      recomputed: recomputed.totals,
      mismatches,
    };
  }
}
