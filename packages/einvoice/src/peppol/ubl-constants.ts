export const UBL_NAMESPACES = {
  invoice: 'urn:oasis:names:specification:ubl:schema:xsd:Invoice-2',
  cac: 'urn:oasis:names:specification:ubl:schema:xsd:CommonAggregateComponents-2',
  cbc: 'urn:oasis:names:specification:ubl:schema:xsd:CommonBasicComponents-2',
} as const;

// Peppol BIS Billing 3.0
export const BIS_BILLING_CUSTOMIZATION_ID =
  'urn:cen.eu:en16931:2017#compliant#urn:fdc:peppol.eu:2017:poacc:billing:3.0';
export const BIS_BILLING_PROFILE_ID = 'urn:fdc:peppol.eu:2017:poacc:billing:01:1.0';

export const UBL_VERSION_ID = '2.1';

export const DEFAULT_INVOICE_TYPE_CODE = '380';
export const DEFAULT_UNIT_CODE = 'C62';
export const DEFAULT_CURRENCY = 'EUR';
export const DEFAULT_PAYMENT_DAYS = 30;

export const VAT_TAX_SCHEME = 'VAT';
