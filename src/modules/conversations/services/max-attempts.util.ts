import { ConfigService } from '@nestjs/config';
import { DEFAULT_MAX_ATTEMPTS } from '../domain/conversation';

/**
 * Attempt ceiling for new conversations, from CONVERSATION_MAX_ATTEMPTS.
 * Anything that is not a positive integer falls back to the default.
 */
export function resolveMaxAttempts(configService: ConfigService): number {
  const configured = Number(configService.get<string>('CONVERSATION_MAX_ATTEMPTS'));
  return Number.isInteger(configured) && configured > 0 ? configured : DEFAULT_MAX_ATTEMPTS;
}
