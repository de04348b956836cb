import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * LoggingContext
 *
 * AsyncLocalStorage-based context carrying the correlation id of the
 * current request and, while a conversation is being worked on, its id.
 */

export interface RequestContext {
  traceId: string;
  conversationId?: string;
}

export const loggingContext = new AsyncLocalStorage<RequestContext>();

/**
 * Returns undefined outside of a request scope.
 */
export function getTraceId(): string | undefined {
  return loggingContext.getStore()?.traceId;
}

export function getConversationId(): string | undefined {
  return loggingContext.getStore()?.conversationId;
}

/**
 * Run `fn` with the conversation id attached to every log line it emits.
 * Keeps the surrounding trace id, or starts a new one outside a request.
 */
export function runWithConversation<T>(conversationId: string, fn: () => T): T {
  const traceId = getTraceId() ?? uuidv4();
  return loggingContext.run({ traceId, conversationId }, fn);
}
