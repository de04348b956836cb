import { Logger } from '@nestjs/common';
import { ClaudeApiResponse } from '../interfaces/claude-api.interfaces';

const logger = new Logger('parseJsonResponse');

/**
 * Parse a JSON response from the Claude API, tolerating markdown fences
 * around the payload. Returns null when the content is not JSON; callers
 * validate the shape themselves.
 */
export function parseJsonResponse(response: ClaudeApiResponse): unknown {
  let content = response.content.trim();

  if (content.startsWith('```json')) {
    content = content.slice(7);
  } else if (content.startsWith('```')) {
    content = content.slice(3);
  }
  if (content.endsWith('```')) {
    content = content.slice(0, -3);
  }
  content = content.trim();

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    logger.warn('Failed to parse Claude API response as JSON');
    return null;
  }
}
