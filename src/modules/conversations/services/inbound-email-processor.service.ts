import { Injectable, Logger } from '@nestjs/common';
import { Conversation } from '../domain/conversation';
import { Question } from '../domain/question';
import { ConversationStatus } from '../enums/conversation-status.enum';
import { ConversationLoadError } from '../interfaces/conversation.interfaces';
import {
  InboundProcessingResult,
  ReplyFailedResult,
  ReplyProcessedResult,
} from '../interfaces/lifecycle.interfaces';
import { ConversationStoreService } from './conversation-store.service';
import { AnswerExtractorService } from '../../llm/services/answer-extractor.service';
import { BidEmailComposerService } from '../../llm/services/bid-email-composer.service';
import { VendorMailerService } from '../../email/services/vendor-mailer.service';
import {
  DecodedInboundEmail,
  InboundEmailDecoderService,
} from '../../email/services/inbound-email-decoder.service';
import { RailsApiService } from '../../rails-api/rails-api.service';
import { runWithConversation } from '../../logging/logging.context';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function toEmailData(email: DecodedInboundEmail): Record<string, unknown> {
  return {
    conversation_id: email.conversationId,
    from_email: email.fromEmail,
    subject: email.subject,
    body: email.body,
    timestamp: email.timestamp,
    message_id: email.messageId,
  };
}

/**
 * InboundEmailProcessorService
 *
 * Applies vendor replies to their conversations: records extracted
 * answers, then either follows up on the required questions still open,
 * completes the conversation, or fails it when a follow-up cannot be
 * sent. Reaching the attempt ceiling completes the conversation.
 *
 * Records are processed one at a time. Nothing guards against two replies
 * for the same conversation being processed concurrently.
 */
@Injectable()
export class InboundEmailProcessorService {
  private readonly logger = new Logger(InboundEmailProcessorService.name);

  constructor(
    private readonly decoder: InboundEmailDecoderService,
    private readonly conversationStore: ConversationStoreService,
    private readonly answerExtractor: AnswerExtractorService,
    private readonly emailComposer: BidEmailComposerService,
    private readonly vendorMailer: VendorMailerService,
    private readonly railsApiService: RailsApiService,
  ) {}

  /**
   * A failing record only affects its own result.
   */
  async processBatch(records: readonly unknown[]): Promise<InboundProcessingResult[]> {
    const results: InboundProcessingResult[] = [];
    for (const record of records) {
      try {
        results.push(await this.processRecord(record));
      } catch (error) {
        this.logger.error(
          `Unhandled error processing inbound record: ${describeError(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
        results.push({ status: 'error', error: describeError(error) });
      }
    }
    return results;
  }

  async processRecord(record: unknown): Promise<InboundProcessingResult> {
    const email = this.decoder.decode(record);
    if (!email) {
      return { status: 'error', error: 'Failed to parse email data' };
    }

    return runWithConversation(email.conversationId, () => this.processReply(email));
  }

  private async processReply(email: DecodedInboundEmail): Promise<InboundProcessingResult> {
    const conversationId = email.conversationId;
    let conversation: Conversation | null;
    try {
      conversation = await this.conversationStore.load(conversationId);
    } catch (error) {
      if (!(error instanceof ConversationLoadError)) {
        throw error;
      }
      // the store already logged it; nothing to fail or report without the conversation
      return { status: 'error', error: error.message, conversation_id: conversationId };
    }

    if (!conversation) {
      this.logger.warn(`Reply for unknown conversation ${conversationId}`);
      return {
        status: 'not_found',
        error: `Conversation ${conversationId} not found`,
        conversation_id: conversationId,
      };
    }

    if (conversation.isTerminal()) {
      this.logger.log(`Conversation ${conversationId} already ${conversation.status}, ignoring reply`);
      return {
        status: 'ignored',
        reason: `Conversation already ${conversation.status}`,
        conversation_id: conversationId,
      };
    }

    try {
      return await this.applyReply(conversation, email);
    } catch (error) {
      return this.failConversation(conversation, email, error);
    }
  }

  private async applyReply(
    conversation: Conversation,
    email: DecodedInboundEmail,
  ): Promise<ReplyProcessedResult> {
    if (conversation.status === ConversationStatus.INITIATED) {
      // the opening email went out but was never recorded as sent
      this.logger.warn(
        `Reply for conversation ${conversation.conversationId} arrived while still initiated`,
      );
      conversation.transitionTo(ConversationStatus.IN_PROGRESS);
    }

    // Answered questions included: a later reply may correct them
    const extracted = await this.answerExtractor.extract(email.body, conversation.questions);

    const answeredIds: number[] = [];
    for (const { questionId, answer } of extracted) {
      if (!conversation.recordAnswer(questionId, answer)) {
        this.logger.debug(`Dropping extracted answer for question ${questionId}: unknown question`);
        continue;
      }
      if (!answeredIds.includes(questionId)) {
        answeredIds.push(questionId);
      }
    }

    conversation.appendExchange('inbound', email.subject, email.body, answeredIds);

    const unanswered = conversation.getUnansweredRequiredQuestions();
    let followUpSent = false;

    if (unanswered.length > 0 && conversation.attemptCount < conversation.maxAttempts) {
      followUpSent = await this.sendFollowUp(conversation, unanswered);
      if (!followUpSent) {
        conversation.transitionTo(ConversationStatus.FAILED);
      }
    } else {
      conversation.transitionTo(ConversationStatus.COMPLETED);
    }

    await this.saveOrWarn(conversation);
    await this.reportProgress(conversation, email.body);

    return {
      status: 'success',
      conversation_id: conversation.conversationId,
      questions_answered: answeredIds.length,
      unanswered_required: unanswered.length,
      follow_up_sent: followUpSent,
      conversation_status: conversation.status,
      attempt_count: conversation.attemptCount,
    };
  }

  private async sendFollowUp(
    conversation: Conversation,
    unanswered: readonly Question[],
  ): Promise<boolean> {
    try {
      const email = await this.emailComposer.composeFollowUp(conversation, unanswered);
      const sent = await this.vendorMailer.send({
        to: conversation.vendorInfo.email,
        subject: email.subject,
        body: email.body,
        conversationId: conversation.conversationId,
        senderDisplayName: conversation.eventMetadata.plannerName,
      });

      if (!sent) {
        this.logger.warn(`Follow-up email to ${conversation.vendorInfo.email} was not sent`);
        return false;
      }

      conversation.appendExchange(
        'outbound',
        email.subject,
        email.body,
        unanswered.map((question) => question.id),
      );
      conversation.recordFollowUpSent();
      return true;
    } catch (error) {
      this.logger.error(`Failed to send follow-up email: ${describeError(error)}`);
      return false;
    }
  }

  private async reportProgress(conversation: Conversation, rawEmail: string): Promise<void> {
    const answered = this.railsApiService.formatQuestionsForRails(
      conversation.getAnsweredQuestions(),
    );
    const isFinal = conversation.isTerminal();

    await this.railsApiService.sendConversationUpdate(
      conversation.conversationId,
      conversation.status,
      answered,
      isFinal,
      rawEmail,
    );

    if (isFinal) {
      await this.railsApiService.notifyConversationCompleted(
        conversation.conversationId,
        conversation.status,
        answered,
        conversation.attemptCount,
      );
    }
  }

  private async failConversation(
    conversation: Conversation,
    email: DecodedInboundEmail,
    error: unknown,
  ): Promise<ReplyFailedResult> {
    const message = describeError(error);
    this.logger.error(
      `Error processing reply for conversation ${conversation.conversationId}: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );

    if (!conversation.isTerminal()) {
      conversation.transitionTo(ConversationStatus.FAILED);
    }
    await this.saveOrWarn(conversation);
    await this.railsApiService.reportError(
      conversation.conversationId,
      'email_processing_error',
      message,
      { email_data: toEmailData(email), handler: 'process_email' },
    );

    return { status: 'error', error: message, conversation_id: conversation.conversationId };
  }

  private async saveOrWarn(conversation: Conversation): Promise<void> {
    if (!(await this.conversationStore.save(conversation))) {
      this.logger.warn(
        `Conversation ${conversation.conversationId} could not be saved in status ${conversation.status}`,
      );
    }
  }
}
