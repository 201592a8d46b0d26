import * as Joi from 'joi';

/**
 * Environment variable validation schema
 */
export const envValidationSchema = Joi.object({
  // Node
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().default(3000),

  // Database
  DATABASE_PATH: Joi.string().default('bookkeeping.db'),

  // Peppol access point
  PEPPOL_API_KEY: Joi.string().allow('').default(''),
  PEPPOL_ENDPOINT: Joi.string().uri().default('https://api.test.peppyrus.be/'),
  PEPPOL_TIMEOUT_MS: Joi.number().integer().min(1000).default(30000),
  PEPPOL_SENDER_ID: Joi.string().pattern(/^[^:]+:[^:]+$/).allow('').default(''),
  PEPPOL_INBOX_POLL_ENABLED: Joi.boolean().default(false),

  // Sender identity on outgoing invoices
  SENDER_COMPANY: Joi.string().default('Example Supplier'),
  SENDER_VAT: Joi.string().replace(/[\s.]/g, '').default('BE0123456789'),
  SENDER_STREET: Joi.string().default('Example Street 1'),
  SENDER_CITY: Joi.string().default('Example City'),
  SENDER_POSTAL: Joi.string().default('1000'),
  SENDER_COUNTRY_CODE: Joi.string().length(2).uppercase().default('BE'),

  // CORS
  CORS_ORIGIN: Joi.string().default('*'),

  // Optional
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug', 'verbose').default('info'),
});
