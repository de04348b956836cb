import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { ConversationStatus } from '../../modules/conversations/enums/conversation-status.enum';
import {
  CallbackData,
  EmailExchangeSnapshot,
  EventMetadata,
  QuestionSnapshot,
  VendorInfo,
} from '../../modules/conversations/interfaces/conversation.interfaces';

/**
 * ConversationRecord Entity
 *
 * Stored form of the Conversation aggregate. Nested structures
 * (questions with sub-questions, the exchange log) live in jsonb columns
 * so their order and answer state survive a round trip unchanged.
 * Timestamps are written by the aggregate, not by the database.
 */
@Entity('conversations')
@Index(['status'])
@Index(['createdAt'])
@Index(['vendorEmail'])
export class ConversationRecord {
  @PrimaryColumn({ type: 'uuid', name: 'conversation_id' })
  conversationId!: string;

  @Column({ type: 'varchar', length: 20 })
  status!: ConversationStatus;

  @Column({ type: 'jsonb', name: 'event_metadata' })
  eventMetadata!: EventMetadata;

  @Column({ type: 'jsonb', name: 'vendor_info' })
  vendorInfo!: VendorInfo;

  // Denormalized from vendor_info for lookups by sender address
  @Column({ type: 'varchar', length: 320, name: 'vendor_email' })
  vendorEmail!: string;

  @Column({ type: 'jsonb' })
  questions!: QuestionSnapshot[];

  @Column({ type: 'jsonb', name: 'email_exchanges', default: () => "'[]'" })
  emailExchanges!: EmailExchangeSnapshot[];

  @Column({ type: 'int', name: 'attempt_count', default: 0 })
  attemptCount!: number;

  @Column({ type: 'int', name: 'max_attempts', default: 4 })
  maxAttempts!: number;

  @Column({ type: 'jsonb', name: 'rails_api_callback_data', nullable: true })
  railsApiCallbackData!: CallbackData | null;

  @Column({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @Column({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
