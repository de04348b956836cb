import { Logger } from '@nestjs/common';

const INSECURE_DATABASE_PASSWORDS = ['password', 'admin', 'postgres'];

/**
 * Settings without which the service cannot do its job. Missing values
 * stop a production start and only warn elsewhere.
 */
const REQUIRED_IN_PRODUCTION: ReadonlyArray<[string, string]> = [
  ['ANTHROPIC_API_KEY', 'Vendor emails will use the fixed templates and replies cannot be read.'],
  ['RAILS_API_BASE_URL', 'Conversation updates will not reach the planning backend.'],
  ['RAILS_API_KEY', 'Conversation updates will not reach the planning backend.'],
  ['SMTP_HOST', 'Outbound vendor email will only be logged.'],
  ['SMTP_USER', 'Outbound vendor email will only be logged.'],
  ['INBOUND_EMAIL_DOMAIN', 'Reply-to addresses will use example.com.'],
];

/**
 * Validates critical environment variables on application startup
 */
export function validateEnvironmentVariables(env: NodeJS.ProcessEnv = process.env): void {
  const logger = new Logger('EnvironmentValidation');
  const errors: string[] = [];
  const warnings: string[] = [];
  const isProduction = env.NODE_ENV === 'production';

  const dbPassword = env.DATABASE_PASSWORD;
  if (!dbPassword) {
    errors.push('DATABASE_PASSWORD is not defined.');
  } else if (INSECURE_DATABASE_PASSWORDS.includes(dbPassword)) {
    if (isProduction) {
      errors.push('DATABASE_PASSWORD uses a default/insecure value in production. Change immediately!');
    } else {
      warnings.push('DATABASE_PASSWORD uses a default value. This is acceptable for development but MUST be changed for production.');
    }
  }

  if (!env.DATABASE_HOST) {
    warnings.push('DATABASE_HOST not set, using default: localhost');
  }
  if (!env.DATABASE_NAME) {
    warnings.push('DATABASE_NAME not set, using default: vendor_bids');
  }

  for (const [key, consequence] of REQUIRED_IN_PRODUCTION) {
    if (env[key]) {
      continue;
    }
    if (isProduction) {
      errors.push(`${key} must be set in production.`);
    } else {
      warnings.push(`${key} is not set. ${consequence}`);
    }
  }

  const maxAttempts = env.CONVERSATION_MAX_ATTEMPTS;
  if (maxAttempts !== undefined && !/^[1-9]\d*$/.test(maxAttempts)) {
    errors.push(`CONVERSATION_MAX_ATTEMPTS must be a positive integer. Current value: ${maxAttempts}`);
  }

  if (isProduction && env.APP_ENV === 'dev') {
    warnings.push('APP_ENV is dev in production. Vendor replies will be routed to the dev address.');
  }

  if (warnings.length > 0) {
    logger.warn('Environment configuration warnings:');
    warnings.forEach((warning, index) => {
      logger.warn(`  ${index + 1}. ${warning}`);
    });
  }

  if (errors.length > 0) {
    logger.error('Environment configuration errors:');
    errors.forEach((error, index) => {
      logger.error(`  ${index + 1}. ${error}`);
    });
    throw new Error(
      `Environment validation failed with ${errors.length} error(s). Application cannot start.`,
    );
  }

  logger.log('Environment validation passed');
}
