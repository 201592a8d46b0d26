import { PeppolTransport } from '@peppol-books/einvoice/peppyrus/peppyrus-client';
import {
  PeppyrusMessageDetail,
  PeppyrusMessageSummary,
  PeppyrusSendResult,
} from '@peppol-books/shared/types/peppyrus.types';

/**
 * In-process access point: keeps what was sent, serves a canned inbox
 */
export class FakeTransport implements PeppolTransport {
  sent: string[] = [];
  sendResult: PeppyrusSendResult = { status: 200, body: '{"id":"out-1"}' };
  inbox: PeppyrusMessageSummary[] = [];
  details = new Map<string, PeppyrusMessageDetail>();

  async sendInvoice(xml: string | Uint8Array): Promise<PeppyrusSendResult> {
    this.sent.push(typeof xml === 'string' ? xml : Buffer.from(xml).toString('utf8'));
    return this.sendResult;
  }

  async listMessages(): Promise<PeppyrusMessageSummary[]> {
    return this.inbox;
  }

  async getMessage(id: string): Promise<PeppyrusMessageDetail | null> {
    return this.details.get(id) ?? null;
  }
}
