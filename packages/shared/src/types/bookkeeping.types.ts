export type InvoiceDirection = 'outgoing' | 'incoming';

export interface UserRecord {
  id: number;
  company: string;
  name: string | null;
  vatNumber: string | null;
  countryCode: string;
  street: string | null;
  city: string | null;
  postalCode: string | null;
  peppolId: string | null; // e.g. "0088:123456789"
}

export interface CreateUserInput {
  company: string;
  name?: string;
  vatNumber?: string;
  countryCode?: string;
  street?: string;
  city?: string;
  postalCode?: string;
  peppolId?: string;
}

export interface TransactionRecord {
  id: number;
  name: string;
  fromUserId: number;
  toUserId: number;
  value: number;
  vat: number;
  vatRecovery: number;
  currency: string;
  start: string;
  end: string | null;
  intervat: boolean;
  annotation: string | null;
  proof: string | null;
}

export interface CreateTransactionInput {
  name: string;
  fromUserId: number;
  toUserId: number;
  value: number;
  vat?: number;
  vatRecovery?: number;
  currency?: string;
  start: string;
  end?: string;
  intervat?: boolean;
  annotation?: string;
  proof?: string;
}

export interface InvoiceRecord {
  id: number;
  externalId: string; // UBL cbc:ID
  peppolMessageId: string | null;
  direction: InvoiceDirection;
  supplierId: number;
  buyerId: number;
  issueDate: string;
  currency: string;
  totalAmount: number;
  vatAmount: number;
  transactionId: number;
}

export type CreateInvoiceRecordInput = Omit<InvoiceRecord, 'id'>;
