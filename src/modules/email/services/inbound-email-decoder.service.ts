import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { extractReplyText } from '../utils/email-body.util';
import { extractConversationId } from '../utils/reply-address.util';

export interface DecodedInboundEmail {
  conversationId: string;
  fromEmail: string;
  subject: string;
  body: string;
  timestamp: string | null;
  messageId: string | null;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * InboundEmailDecoderService
 *
 * Turns one SNS record carrying an SES receipt notification into the
 * fields the reply processor needs. Anything it cannot correlate to a
 * conversation decodes to null; it never throws.
 */
@Injectable()
export class InboundEmailDecoderService {
  private readonly logger = new Logger(InboundEmailDecoderService.name);
  private readonly localPart: string;

  constructor(private readonly configService: ConfigService) {
    this.localPart = this.configService.get<string>('INBOUND_EMAIL_LOCAL_PART', 'bids');
  }

  decode(record: unknown): DecodedInboundEmail | null {
    const notification = this.unwrapNotification(record);
    if (!notification) {
      return null;
    }

    const mail = notification.mail;
    if (!isObject(mail)) {
      this.logger.warn('No mail object in inbound notification');
      return null;
    }

    const headers = isObject(mail.commonHeaders) ? mail.commonHeaders : {};
    const recipients = [...stringList(headers.to), ...stringList(mail.destination)];
    const conversationId = extractConversationId(recipients, this.localPart);
    if (!conversationId) {
      this.logger.warn(
        `Could not extract conversation id from recipients: ${recipients.join(', ') || '(none)'}`,
      );
      return null;
    }

    const content = notification.content;
    return {
      conversationId,
      fromEmail: stringList(headers.from)[0] ?? '',
      subject: optionalString(headers.subject) ?? '',
      body: typeof content === 'string' ? extractReplyText(content) : '',
      timestamp: optionalString(mail.timestamp),
      messageId: optionalString(mail.messageId),
    };
  }

  /**
   * Accepts `{Sns: {Message: "<json>"}}`, a bare `{Message: "<json>"}`,
   * or the notification object itself.
   */
  private unwrapNotification(record: unknown): JsonObject | null {
    const envelope = isObject(record) && isObject(record.Sns) ? record.Sns : record;
    if (!isObject(envelope)) {
      this.logger.warn('Inbound record is not an object');
      return null;
    }

    if (typeof envelope.Message !== 'string') {
      return envelope;
    }

    try {
      const parsed: unknown = JSON.parse(envelope.Message);
      if (isObject(parsed)) {
        return parsed;
      }
      this.logger.warn('SNS message is not a JSON object');
      return null;
    } catch (error) {
      this.logger.warn(
        `SNS message is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return null;
    }
  }
}
