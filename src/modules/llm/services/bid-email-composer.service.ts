import { Injectable, Logger } from '@nestjs/common';
import { Conversation } from '../../conversations/domain/conversation';
import { Question } from '../../conversations/domain/question';
import { ClaudeApiService } from './claude-api.service';
import { parseJsonResponse } from './parse-json-response.util';
import { ComposedEmail } from '../interfaces/claude-api.interfaces';
import {
  FOLLOW_UP_EMAIL_SYSTEM_PROMPT,
  OPENING_EMAIL_SYSTEM_PROMPT,
  buildFollowUpEmailPrompt,
  buildOpeningEmailPrompt,
} from '../prompts/bid-email.prompts';
import {
  buildFallbackFollowUpEmail,
  buildFallbackOpeningEmail,
} from '../prompts/fallback-emails';

const EMAIL_TEMPERATURE = 0.7;

function toComposedEmail(value: unknown): ComposedEmail | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const subject = 'subject' in value ? value.subject : undefined;
  const body = 'body' in value ? value.body : undefined;
  if (
    typeof subject !== 'string' ||
    typeof body !== 'string' ||
    subject.trim() === '' ||
    body.trim() === ''
  ) {
    return null;
  }
  return { subject: subject.trim(), body: body.trim() };
}

/**
 * BidEmailComposerService
 *
 * Writes the opening and follow-up emails for a conversation. Never
 * fails: any generation problem falls back to the fixed templates.
 */
@Injectable()
export class BidEmailComposerService {
  private readonly logger = new Logger(BidEmailComposerService.name);

  constructor(private readonly claudeApiService: ClaudeApiService) {}

  async composeOpening(conversation: Conversation): Promise<ComposedEmail> {
    return this.generate(
      'opening',
      conversation.conversationId,
      OPENING_EMAIL_SYSTEM_PROMPT,
      buildOpeningEmailPrompt(conversation),
      1500,
      () => buildFallbackOpeningEmail(conversation),
    );
  }

  async composeFollowUp(
    conversation: Conversation,
    unanswered: readonly Question[],
  ): Promise<ComposedEmail> {
    return this.generate(
      'follow-up',
      conversation.conversationId,
      FOLLOW_UP_EMAIL_SYSTEM_PROMPT,
      buildFollowUpEmailPrompt(conversation, unanswered),
      1000,
      () => buildFallbackFollowUpEmail(conversation, unanswered),
    );
  }

  private async generate(
    kind: string,
    conversationId: string,
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    fallback: () => ComposedEmail,
  ): Promise<ComposedEmail> {
    try {
      const response = await this.claudeApiService.sendMessage({
        systemPrompt,
        userPrompt,
        maxTokens,
        temperature: EMAIL_TEMPERATURE,
      });

      const email = toComposedEmail(parseJsonResponse(response));
      if (email) {
        return email;
      }
      this.logger.warn(
        `Unusable ${kind} email from Claude for conversation ${conversationId}, using template`,
      );
    } catch (error) {
      this.logger.warn(
        `Failed to generate ${kind} email for conversation ${conversationId}, using template: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    return fallback();
  }
}
