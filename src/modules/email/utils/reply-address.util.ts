/**
 * Reply-to addressing for vendor conversations.
 *
 * Outbound mail carries a plus-addressed reply-to
 * (`<localPart>-<environment>+<conversationId>@<domain>`) so the vendor's
 * reply lands back on the inbound route tagged with its conversation.
 */

export interface InboundAddressConfig {
  localPart: string;
  environment: string;
  domain: string;
}

export function buildReplyToAddress(
  config: InboundAddressConfig,
  conversationId: string,
): string {
  return `${config.localPart}-${config.environment}+${conversationId}@${config.domain}`;
}

export function buildFromAddress(config: InboundAddressConfig): string {
  return `${config.localPart}-${config.environment}@${config.domain}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pull the conversation id out of the first recipient that matches the
 * reply-to pattern. Recipients may include a display name
 * (`Planner <bids-prod+id@example.com>`).
 */
export function extractConversationId(
  recipients: readonly string[],
  localPart: string,
): string | null {
  const pattern = new RegExp(`${escapeRegExp(localPart)}-[^+@\\s]+\\+([^@\\s>]+)@`, 'i');
  for (const recipient of recipients) {
    const match = pattern.exec(recipient);
    if (match) {
      return match[1];
    }
  }
  return null;
}
