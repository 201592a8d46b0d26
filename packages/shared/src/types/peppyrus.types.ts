export interface PeppyrusConfig {
  endpoint: string; // e.g. "https://api.test.peppyrus.be/"
  apiKey: string;
  timeoutMs?: number;
}

export type PeppyrusFolder = 'INBOX' | 'OUTBOX' | 'SENT' | 'FAILED';

export interface PeppyrusMessageSummary {
  id: string;
  sender?: string;
  recipient?: string;
  date?: string;
}

export interface PeppyrusMessageDetail {
  id?: string;
  document?: string; // base64 encoded UBL
}

export interface PeppyrusSendResult {
  status: number;
  body: string;
}

export type ImportStatus = 'imported' | 'duplicate' | 'error';

export interface ImportResult {
  messageId: string;
  status: ImportStatus;
  invoiceId?: string;
  supplier?: string;
  buyer?: string;
  date?: string;
  total?: number;
  vat?: number;
  transactionId?: number;
  invoiceDbId?: number;
  errorCode?: string;
  error?: string;
}
