import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { envValidationSchema } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { BookkeepingModule } from './bookkeeping/bookkeeping.module';
import { PeppolModule } from './peppol/peppol.module';
import { HealthModule } from './health/health.module';
import { EInvoiceExceptionFilter } from './common/filters/einvoice-exception.filter';

/**
 * Root application module
 * Imports all feature modules and configures global settings
 */
@Module({
  imports: [
    // Global configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validationSchema: envValidationSchema,
    }),

    // Inbox polling
    ScheduleModule.forRoot(),

    // Database
    DatabaseModule,

    // Bookkeeping features
    BookkeepingModule,

    // Peppol exchange
    PeppolModule,

    // Health
    HealthModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: EInvoiceExceptionFilter,
    },
  ],
})
export class AppModule {}
