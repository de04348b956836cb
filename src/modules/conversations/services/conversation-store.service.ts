import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { validate as isUuid } from 'uuid';
import { ConversationRecord } from '../../../database/entities/conversation.entity';
import { Conversation } from '../domain/conversation';
import { ConversationStatus } from '../enums/conversation-status.enum';
import {
  ConversationLoadError,
  EventMetadata,
  VendorInfo,
} from '../interfaces/conversation.interfaces';

export const DEFAULT_RECENT_LIMIT = 50;

export interface ConversationSummary {
  conversationId: string;
  status: ConversationStatus;
  createdAt: Date;
  eventMetadata: EventMetadata;
  vendorInfo: VendorInfo;
}

export function toConversationRecord(conversation: Conversation): ConversationRecord {
  const snapshot = conversation.toSnapshot();
  const record = new ConversationRecord();
  record.conversationId = snapshot.conversationId;
  record.status = snapshot.status;
  record.eventMetadata = snapshot.eventMetadata;
  record.vendorInfo = snapshot.vendorInfo;
  record.vendorEmail = snapshot.vendorInfo.email;
  record.questions = snapshot.questions;
  record.emailExchanges = snapshot.emailExchanges;
  record.attemptCount = snapshot.attemptCount;
  record.maxAttempts = snapshot.maxAttempts;
  record.railsApiCallbackData = snapshot.railsApiCallbackData;
  record.createdAt = conversation.createdAt;
  record.updatedAt = conversation.updatedAt;
  return record;
}

export function fromConversationRecord(record: ConversationRecord): Conversation {
  return Conversation.restore({
    conversationId: record.conversationId,
    status: record.status,
    eventMetadata: record.eventMetadata,
    vendorInfo: record.vendorInfo,
    questions: record.questions,
    emailExchanges: record.emailExchanges,
    attemptCount: record.attemptCount,
    maxAttempts: record.maxAttempts,
    createdAt: new Date(record.createdAt).toISOString(),
    updatedAt: new Date(record.updatedAt).toISOString(),
    railsApiCallbackData: record.railsApiCallbackData,
  });
}

/**
 * ConversationStoreService
 *
 * Durable store for conversations. A failed save comes back as false and
 * is logged; callers decide what that means for the conversation. A load
 * returns null only when there is no such conversation, and throws
 * ConversationLoadError when the row cannot be read. No retries here.
 */
@Injectable()
export class ConversationStoreService {
  private readonly logger = new Logger(ConversationStoreService.name);

  constructor(
    @InjectRepository(ConversationRecord)
    private readonly conversationRepository: Repository<ConversationRecord>,
  ) {}

  async save(conversation: Conversation): Promise<boolean> {
    try {
      await this.conversationRepository.save(toConversationRecord(conversation));
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to save conversation ${conversation.conversationId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  /**
   * @throws ConversationLoadError when the database call fails or the row is corrupt
   */
  async load(conversationId: string): Promise<Conversation | null> {
    if (!isUuid(conversationId)) {
      this.logger.warn(`Ignoring lookup for malformed conversation id: ${conversationId}`);
      return null;
    }

    let record: ConversationRecord | null;
    try {
      record = await this.conversationRepository.findOne({
        where: { conversationId },
      });
    } catch (error) {
      const loadError = new ConversationLoadError(
        conversationId,
        'unavailable',
        error instanceof Error ? error.message : 'Unknown error',
      );
      this.logger.error(loadError.message);
      throw loadError;
    }

    if (!record) {
      return null;
    }

    try {
      return fromConversationRecord(record);
    } catch (error) {
      const loadError = new ConversationLoadError(
        conversationId,
        'unreadable',
        error instanceof Error ? error.message : 'Unknown error',
      );
      this.logger.error(loadError.message);
      throw loadError;
    }
  }

  /**
   * Newest first, for monitoring and debugging.
   */
  async listRecent(limit: number = DEFAULT_RECENT_LIMIT): Promise<ConversationSummary[]> {
    try {
      const records = await this.conversationRepository.find({
        select: {
          conversationId: true,
          status: true,
          createdAt: true,
          eventMetadata: true,
          vendorInfo: true,
        },
        order: { createdAt: 'DESC' },
        take: limit,
      });

      return records.map((record) => ({
        conversationId: record.conversationId,
        status: record.status,
        createdAt: record.createdAt,
        eventMetadata: record.eventMetadata,
        vendorInfo: record.vendorInfo,
      }));
    } catch (error) {
      this.logger.error(
        `Failed to list recent conversations: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return [];
    }
  }
}
