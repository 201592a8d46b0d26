import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PEPPOL_TRANSPORT, PeppyrusClient } from '@peppol-books/einvoice/peppyrus/peppyrus-client';
import { BookkeepingModule } from '../bookkeeping/bookkeeping.module';
import { PeppolInboxScheduler } from './peppol-inbox.scheduler';
import { PeppolController } from './peppol.controller';
import { PeppolService } from './peppol.service';

/**
 * Module for Peppol exchange through the Peppyrus access point
 */
@Module({
  imports: [BookkeepingModule],
  controllers: [PeppolController],
  providers: [
    PeppolService,
    PeppolInboxScheduler,
    {
      provide: PEPPOL_TRANSPORT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new PeppyrusClient({
          endpoint: config.get<string>('PEPPOL_ENDPOINT', 'https://api.test.peppyrus.be/'),
          apiKey: config.get<string>('PEPPOL_API_KEY', ''),
          timeoutMs: config.get<number>('PEPPOL_TIMEOUT_MS', 30000),
        }),
    },
  ],
  exports: [PeppolService],
})
export class PeppolModule {}
