import axios, { AxiosInstance } from 'axios';
import * as Joi from 'joi';
import { Logger } from '@nestjs/common';
import {
  PeppyrusConfig,
  PeppyrusFolder,
  PeppyrusMessageDetail,
  PeppyrusMessageSummary,
  PeppyrusSendResult,
} from '@peppol-books/shared/types/peppyrus.types';

export const PEPPOL_TRANSPORT = 'PEPPOL_TRANSPORT';

/**
 * What the bookkeeping side needs from a Peppol access point
 */
export interface PeppolTransport {
  sendInvoice(xml: string | Uint8Array): Promise<PeppyrusSendResult>;
  listMessages(folder?: PeppyrusFolder): Promise<PeppyrusMessageSummary[]>;
  getMessage(id: string): Promise<PeppyrusMessageDetail | null>;
}

export class PeppyrusApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Peppyrus API error ${status}: ${body}`);
    this.name = 'PeppyrusApiError';
  }
}

const messageListSchema = Joi.array<PeppyrusMessageSummary[]>().items(
  Joi.object({
    id: Joi.string().required(),
    sender: Joi.string(),
    recipient: Joi.string(),
    date: Joi.string(),
  }).unknown(true),
);

const messageDetailSchema = Joi.object<PeppyrusMessageDetail>({
  id: Joi.string(),
  document: Joi.string().allow(''),
}).unknown(true);

/**
 * REST client for the Peppyrus access point.
 *
 * HTTP status codes are handled here, so axios is told to accept every status.
 */
export class PeppyrusClient implements PeppolTransport {
  private readonly logger = new Logger(PeppyrusClient.name);
  private readonly client: AxiosInstance;

  constructor(config: PeppyrusConfig, client?: AxiosInstance) {
    const baseURL = config.endpoint.replace(/\/+$/, '') + '/';

    this.client = client ?? axios.create({ timeout: config.timeoutMs ?? 30000 });
    this.client.defaults.baseURL = baseURL;
    this.client.defaults.validateStatus = () => true;
    this.client.defaults.headers.common['Accept'] = 'application/json';
    this.client.defaults.headers.common['X-Api-Key'] = config.apiKey;
  }

  async sendInvoice(xml: string | Uint8Array): Promise<PeppyrusSendResult> {
    const body = typeof xml === 'string' ? xml : Buffer.from(xml).toString('utf8');

    const response = await this.client.post<string>('v1/message/send', body, {
      headers: { 'Content-Type': 'application/xml' },
      responseType: 'text',
      transformResponse: (data: string) => data,
    });

    this.logger.log(`Sent invoice, access point answered ${response.status}`);

    return { status: response.status, body: stringify(response.data) };
  }

  async listMessages(folder: PeppyrusFolder = 'INBOX'): Promise<PeppyrusMessageSummary[]> {
    const response = await this.client.get<unknown>('v1/message/list', { params: { folder } });

    if (response.status === 404) {
      return [];
    }
    if (response.status !== 200) {
      throw new PeppyrusApiError(response.status, stringify(response.data));
    }

    const result = messageListSchema.validate(response.data ?? []);
    if (result.error) {
      throw new PeppyrusApiError(response.status, `Unexpected message list: ${result.error.message}`);
    }

    return result.value;
  }

  /**
   * Message detail, or null when the access point will not hand it out
   */
  async getMessage(id: string): Promise<PeppyrusMessageDetail | null> {
    const response = await this.client.get<unknown>(`v1/message/${encodeURIComponent(id)}`);

    if (response.status !== 200) {
      this.logger.warn(`Skipping message ${id}: access point answered ${response.status}`);
      return null;
    }

    const result = messageDetailSchema.validate(response.data);
    if (result.error) {
      this.logger.warn(`Skipping message ${id}: ${result.error.message}`);
      return null;
    }

    return result.value;
  }

  /**
   * The UBL document carried by a message, base64 decoded
   */
  static decodeDocument(detail: PeppyrusMessageDetail): Buffer | null {
    if (!detail.document) {
      return null;
    }
    return Buffer.from(detail.document, 'base64');
  }
}

function stringify(data: unknown): string {
  if (data === undefined || data === null) return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}
