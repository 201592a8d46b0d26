import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { PeppolService } from './peppol.service';

/**
 * Polls the access point inbox when PEPPOL_INBOX_POLL_ENABLED is set
 */
@Injectable()
export class PeppolInboxScheduler {
  private readonly logger = new Logger(PeppolInboxScheduler.name);
  private running = false;

  constructor(
    private readonly peppolService: PeppolService,
    private readonly config: ConfigService,
  ) {}

  /**
   * Cron job: import the inbox every 5 minutes
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  async pollInbox(): Promise<void> {
    if (!this.isEnabled() || this.running) {
      return;
    }

    this.running = true;
    try {
      const results = await this.peppolService.receiveInvoices();
      const imported = results.filter(result => result.status === 'imported').length;
      if (results.length > 0) {
        this.logger.log(`Inbox poll: ${imported} imported, ${results.length - imported} skipped or rejected`);
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Inbox poll failed: ${err.message}`, err.stack);
    } finally {
      this.running = false;
    }
  }

  // Outside the validated config (plain process.env) the flag is still a string
  private isEnabled(): boolean {
    const enabled = this.config.get<boolean | string>('PEPPOL_INBOX_POLL_ENABLED', false);
    return enabled === true || enabled === 'true';
  }
}
