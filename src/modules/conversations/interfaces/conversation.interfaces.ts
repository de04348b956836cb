/**
 * Conversation Interfaces
 *
 * Plain data shapes owned by the Conversation aggregate, the snapshot
 * form used for persistence, and the domain errors it raises.
 */

import {
  ConversationStatus,
  VALID_STATUS_TRANSITIONS,
} from '../enums/conversation-status.enum';

export type ExchangeDirection = 'outbound' | 'inbound';

export interface EventMetadata {
  readonly name: string;
  readonly dates: readonly string[];
  readonly eventType: string;
  readonly plannerName: string;
  readonly plannerEmail: string;
  readonly plannerPhone: string | null;
}

export interface VendorInfo {
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
  readonly serviceType: string;
}

export interface EmailExchange {
  readonly timestamp: Date;
  readonly direction: ExchangeDirection;
  readonly subject: string;
  readonly body: string;
  readonly questionsAddressed: readonly number[];
}

/**
 * Input shape for a question at creation time.
 * Answer state is optional so stored questions can be rehydrated.
 */
export interface QuestionInput {
  id: number;
  text: string;
  required?: boolean;
  options?: string[] | null;
  subQuestions?: QuestionInput[] | null;
  answer?: string | null;
  answered?: boolean;
}

export interface QuestionSnapshot {
  id: number;
  text: string;
  required: boolean;
  options: string[] | null;
  subQuestions: QuestionSnapshot[] | null;
  answer: string | null;
  answered: boolean;
}

export interface EmailExchangeSnapshot {
  timestamp: string;
  direction: ExchangeDirection;
  subject: string;
  body: string;
  questionsAddressed: number[];
}

export type CallbackData = Record<string, unknown>;

export interface CreateConversationInput {
  eventMetadata: EventMetadata;
  vendorInfo: VendorInfo;
  questions: QuestionInput[];
  maxAttempts?: number;
  railsApiCallbackData?: CallbackData | null;
}

/**
 * Lossless plain-data form of a Conversation.
 * Dates are ISO-8601 strings so the snapshot survives JSON storage.
 */
export interface ConversationSnapshot {
  conversationId: string;
  status: ConversationStatus;
  eventMetadata: EventMetadata;
  vendorInfo: VendorInfo;
  questions: QuestionSnapshot[];
  emailExchanges: EmailExchangeSnapshot[];
  attemptCount: number;
  maxAttempts: number;
  createdAt: string;
  updatedAt: string;
  railsApiCallbackData: CallbackData | null;
}

/**
 * Thrown when a conversation (or a stored snapshot) is missing required
 * fields or breaks the question id invariants.
 */
export class ConversationValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversationValidationError';
  }
}

/**
 * Thrown when attempting a status change the lifecycle does not allow.
 */
export class InvalidStatusTransitionError extends Error {
  public readonly currentStatus: ConversationStatus;
  public readonly targetStatus: ConversationStatus;

  constructor(currentStatus: ConversationStatus, targetStatus: ConversationStatus) {
    const allowed = VALID_STATUS_TRANSITIONS[currentStatus];
    super(
      `Invalid status transition: ${currentStatus} -> ${targetStatus}. ` +
        `Allowed transitions from ${currentStatus}: [${allowed.join(', ')}]`,
    );
    this.name = 'InvalidStatusTransitionError';
    this.currentStatus = currentStatus;
    this.targetStatus = targetStatus;
  }
}

/**
 * Thrown by the store when a conversation exists (or may exist) but cannot
 * be read back: the database call failed, or the stored row is corrupt.
 */
export class ConversationLoadError extends Error {
  public readonly conversationId: string;
  public readonly reason: 'unavailable' | 'unreadable';

  constructor(conversationId: string, reason: 'unavailable' | 'unreadable', detail: string) {
    super(
      reason === 'unavailable'
        ? `Failed to load conversation ${conversationId}: ${detail}`
        : `Stored conversation ${conversationId} is unreadable: ${detail}`,
    );
    this.name = 'ConversationLoadError';
    this.conversationId = conversationId;
    this.reason = reason;
  }
}
