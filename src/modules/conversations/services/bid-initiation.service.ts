import {
  BadRequestException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Conversation } from '../domain/conversation';
import { ConversationStatus } from '../enums/conversation-status.enum';
import {
  ConversationValidationError,
  CreateConversationInput,
} from '../interfaces/conversation.interfaces';
import { BidInitiationResponse } from '../interfaces/lifecycle.interfaces';
import { ConversationStoreService } from './conversation-store.service';
import { resolveMaxAttempts } from './max-attempts.util';
import { BidEmailComposerService } from '../../llm/services/bid-email-composer.service';
import { VendorMailerService } from '../../email/services/vendor-mailer.service';
import { RailsApiService } from '../../rails-api/rails-api.service';
import { runWithConversation } from '../../logging/logging.context';

export type BidInitiationInput = Omit<CreateConversationInput, 'maxAttempts'>;

/**
 * BidInitiationService
 *
 * Starts a vendor conversation: persists it, sends the opening email and
 * tells the planning backend. A failed send leaves the conversation
 * failed; there is no retry of the opening email.
 */
@Injectable()
export class BidInitiationService {
  private readonly logger = new Logger(BidInitiationService.name);
  private readonly maxAttempts: number;

  constructor(
    private readonly conversationStore: ConversationStoreService,
    private readonly emailComposer: BidEmailComposerService,
    private readonly vendorMailer: VendorMailerService,
    private readonly railsApiService: RailsApiService,
    configService: ConfigService,
  ) {
    this.maxAttempts = resolveMaxAttempts(configService);
  }

  /**
   * @throws BadRequestException when the payload breaks conversation invariants
   * @throws InternalServerErrorException when the conversation cannot be saved or the email cannot be sent
   */
  async initiate(input: BidInitiationInput): Promise<BidInitiationResponse> {
    let conversation: Conversation;
    try {
      conversation = Conversation.create({ ...input, maxAttempts: this.maxAttempts });
    } catch (error) {
      if (error instanceof ConversationValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    return runWithConversation(conversation.conversationId, () =>
      this.startConversation(conversation),
    );
  }

  private async startConversation(conversation: Conversation): Promise<BidInitiationResponse> {
    const conversationId = conversation.conversationId;
    const vendorEmail = conversation.vendorInfo.email;

    if (!(await this.conversationStore.save(conversation))) {
      await this.railsApiService.reportError(
        conversationId,
        'persistence_failed',
        'Failed to save conversation',
        { handler: 'initiate_bid' },
      );
      throw new InternalServerErrorException({
        error: 'Failed to save conversation',
        conversation_id: conversationId,
      });
    }

    try {
      const email = await this.emailComposer.composeOpening(conversation);
      const sent = await this.vendorMailer.send({
        to: vendorEmail,
        subject: email.subject,
        body: email.body,
        conversationId,
        senderDisplayName: conversation.eventMetadata.plannerName,
      });

      if (!sent) {
        conversation.transitionTo(ConversationStatus.FAILED);
        await this.saveOrWarn(conversation);
        await this.railsApiService.reportError(
          conversationId,
          'email_sending_failed',
          'Failed to send initial bid request email',
          { vendor_email: vendorEmail },
        );
        throw new InternalServerErrorException({
          error: 'Failed to send email to vendor',
          conversation_id: conversationId,
        });
      }

      conversation.appendExchange(
        'outbound',
        email.subject,
        email.body,
        conversation.questions.map((question) => question.id),
      );
      conversation.markOpeningSent();
      await this.saveOrWarn(conversation);
      await this.railsApiService.notifyConversationStarted(conversationId, vendorEmail, true);

      this.logger.log(`Bid request sent to ${vendorEmail}`);

      return {
        message: 'Bid request initiated successfully',
        conversation_id: conversationId,
        email_sent: true,
        vendor_email: vendorEmail,
        questions_count: conversation.questions.length,
      };
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to initiate conversation: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );

      if (!conversation.isTerminal()) {
        conversation.transitionTo(ConversationStatus.FAILED);
      }
      await this.saveOrWarn(conversation);
      await this.railsApiService.reportError(conversationId, 'initiation_error', message, {
        handler: 'initiate_bid',
      });
      throw new InternalServerErrorException({
        error: 'Internal server error',
        message,
        conversation_id: conversationId,
      });
    }
  }

  private async saveOrWarn(conversation: Conversation): Promise<void> {
    if (!(await this.conversationStore.save(conversation))) {
      this.logger.warn(
        `Conversation ${conversation.conversationId} could not be saved in status ${conversation.status}`,
      );
    }
  }
}
