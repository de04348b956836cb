import { v4 as uuidv4 } from 'uuid';
import {
  ConversationStatus,
  TERMINAL_STATUSES,
  VALID_STATUS_TRANSITIONS,
  isConversationStatus,
} from '../enums/conversation-status.enum';
import {
  CallbackData,
  ConversationSnapshot,
  ConversationValidationError,
  CreateConversationInput,
  EmailExchange,
  EventMetadata,
  ExchangeDirection,
  InvalidStatusTransitionError,
  QuestionInput,
  VendorInfo,
} from '../interfaces/conversation.interfaces';
import { Question } from './question';

export const DEFAULT_MAX_ATTEMPTS = 4;

interface ConversationProps {
  conversationId: string;
  status: ConversationStatus;
  eventMetadata: EventMetadata;
  vendorInfo: VendorInfo;
  questions: QuestionInput[];
  emailExchanges: EmailExchange[];
  attemptCount: number;
  maxAttempts: number;
  createdAt: Date;
  updatedAt: Date;
  railsApiCallbackData: CallbackData | null;
}

/**
 * Conversation
 *
 * Aggregate root for one vendor bid negotiation. Owns the question list,
 * the append-only exchange log, the attempt counter and the status.
 * Every mutation goes through a method here so the invariants hold:
 * - question ids are unique and never change after construction
 * - answered implies an answer is present
 * - exchanges are never edited once appended
 * - status only moves along VALID_STATUS_TRANSITIONS
 *
 * Sub-questions are carried along but only top-level ids take part in
 * answer tracking and completion checks.
 */
export class Conversation {
  readonly conversationId: string;
  readonly eventMetadata: EventMetadata;
  readonly vendorInfo: VendorInfo;
  readonly questions: readonly Question[];
  readonly maxAttempts: number;
  readonly createdAt: Date;
  readonly railsApiCallbackData: CallbackData | null;

  private currentStatus: ConversationStatus;
  private currentAttemptCount: number;
  private lastUpdatedAt: Date;
  private readonly exchanges: EmailExchange[];

  private constructor(props: ConversationProps) {
    validateEventMetadata(props.eventMetadata);
    validateVendorInfo(props.vendorInfo);

    if (props.questions.length === 0) {
      throw new ConversationValidationError('At least one question is required');
    }
    const seen = new Set<number>();
    for (const question of props.questions) {
      if (seen.has(question.id)) {
        throw new ConversationValidationError(
          `Duplicate question id: ${question.id}`,
        );
      }
      seen.add(question.id);
    }

    if (!Number.isInteger(props.maxAttempts) || props.maxAttempts < 1) {
      throw new ConversationValidationError(
        `max_attempts must be a positive integer, got ${props.maxAttempts}`,
      );
    }
    if (!Number.isInteger(props.attemptCount) || props.attemptCount < 0) {
      throw new ConversationValidationError(
        `attempt_count must be a non-negative integer, got ${props.attemptCount}`,
      );
    }

    this.conversationId = props.conversationId;
    this.currentStatus = props.status;
    this.eventMetadata = Object.freeze({
      ...props.eventMetadata,
      dates: Object.freeze([...props.eventMetadata.dates]),
    });
    this.vendorInfo = Object.freeze({ ...props.vendorInfo });
    this.questions = Object.freeze(props.questions.map((q) => new Question(q)));
    this.exchanges = props.emailExchanges.map(freezeExchange);
    this.currentAttemptCount = props.attemptCount;
    this.maxAttempts = props.maxAttempts;
    this.createdAt = new Date(props.createdAt.getTime());
    this.lastUpdatedAt = new Date(props.updatedAt.getTime());
    this.railsApiCallbackData = props.railsApiCallbackData;
  }

  /**
   * Build a brand new conversation in the INITIATED state.
   * @throws ConversationValidationError on missing fields or duplicate question ids
   */
  static create(input: CreateConversationInput): Conversation {
    const now = new Date();
    return new Conversation({
      conversationId: uuidv4(),
      status: ConversationStatus.INITIATED,
      eventMetadata: input.eventMetadata,
      vendorInfo: input.vendorInfo,
      questions: input.questions,
      emailExchanges: [],
      attemptCount: 0,
      maxAttempts: input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      createdAt: now,
      updatedAt: now,
      railsApiCallbackData: input.railsApiCallbackData ?? null,
    });
  }

  /**
   * Rehydrate a conversation from its stored snapshot.
   * @throws ConversationValidationError when the snapshot is inconsistent
   */
  static restore(snapshot: ConversationSnapshot): Conversation {
    if (!isConversationStatus(snapshot.status)) {
      throw new ConversationValidationError(
        `Unknown conversation status: ${String(snapshot.status)}`,
      );
    }
    return new Conversation({
      conversationId: snapshot.conversationId,
      status: snapshot.status,
      eventMetadata: snapshot.eventMetadata,
      vendorInfo: snapshot.vendorInfo,
      questions: snapshot.questions,
      emailExchanges: snapshot.emailExchanges.map((exchange) => ({
        timestamp: parseTimestamp(exchange.timestamp, 'exchange timestamp'),
        direction: exchange.direction,
        subject: exchange.subject,
        body: exchange.body,
        questionsAddressed: exchange.questionsAddressed,
      })),
      attemptCount: snapshot.attemptCount,
      maxAttempts: snapshot.maxAttempts,
      createdAt: parseTimestamp(snapshot.createdAt, 'created_at'),
      updatedAt: parseTimestamp(snapshot.updatedAt, 'updated_at'),
      railsApiCallbackData: snapshot.railsApiCallbackData,
    });
  }

  get status(): ConversationStatus {
    return this.currentStatus;
  }

  get attemptCount(): number {
    return this.currentAttemptCount;
  }

  get updatedAt(): Date {
    return new Date(this.lastUpdatedAt.getTime());
  }

  get emailExchanges(): readonly EmailExchange[] {
    return [...this.exchanges];
  }

  getUnansweredRequiredQuestions(): Question[] {
    return this.questions.filter((q) => q.required && !q.answered);
  }

  getAnsweredQuestions(): Question[] {
    return this.questions.filter((q) => q.answered);
  }

  /**
   * Informational only: status changes are driven by the lifecycle services.
   */
  isComplete(): boolean {
    return (
      this.getUnansweredRequiredQuestions().length === 0 ||
      this.currentAttemptCount >= this.maxAttempts
    );
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.includes(this.currentStatus);
  }

  /**
   * Record an answer for a top-level question.
   * Returns false, and changes nothing, when the id is unknown.
   */
  recordAnswer(questionId: number, answer: string): boolean {
    const question = this.questions.find((q) => q.id === questionId);
    if (!question) {
      return false;
    }
    question.recordAnswer(answer);
    this.touch();
    return true;
  }

  appendExchange(
    direction: ExchangeDirection,
    subject: string,
    body: string,
    questionsAddressed: readonly number[] = [],
  ): EmailExchange {
    const exchange = freezeExchange({
      timestamp: new Date(),
      direction,
      subject,
      body,
      questionsAddressed,
    });
    this.exchanges.push(exchange);
    this.touch();
    return exchange;
  }

  /**
   * @throws InvalidStatusTransitionError if the move is not allowed
   */
  transitionTo(target: ConversationStatus): void {
    const allowed = VALID_STATUS_TRANSITIONS[this.currentStatus];
    if (!allowed.includes(target)) {
      throw new InvalidStatusTransitionError(this.currentStatus, target);
    }
    this.currentStatus = target;
    this.touch();
  }

  /**
   * The opening email counts as the first attempt.
   */
  markOpeningSent(): void {
    this.transitionTo(ConversationStatus.IN_PROGRESS);
    this.currentAttemptCount = 1;
  }

  recordFollowUpSent(): void {
    this.currentAttemptCount += 1;
    this.touch();
  }

  toSnapshot(): ConversationSnapshot {
    return {
      conversationId: this.conversationId,
      status: this.currentStatus,
      eventMetadata: {
        ...this.eventMetadata,
        dates: [...this.eventMetadata.dates],
      },
      vendorInfo: { ...this.vendorInfo },
      questions: this.questions.map((q) => q.toSnapshot()),
      emailExchanges: this.exchanges.map((exchange) => ({
        timestamp: exchange.timestamp.toISOString(),
        direction: exchange.direction,
        subject: exchange.subject,
        body: exchange.body,
        questionsAddressed: [...exchange.questionsAddressed],
      })),
      attemptCount: this.currentAttemptCount,
      maxAttempts: this.maxAttempts,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.lastUpdatedAt.toISOString(),
      railsApiCallbackData: this.railsApiCallbackData,
    };
  }

  private touch(): void {
    this.lastUpdatedAt = new Date();
  }
}

function freezeExchange(exchange: EmailExchange): EmailExchange {
  return Object.freeze({
    timestamp: new Date(exchange.timestamp.getTime()),
    direction: exchange.direction,
    subject: exchange.subject,
    body: exchange.body,
    questionsAddressed: Object.freeze([...exchange.questionsAddressed]),
  });
}

function parseTimestamp(value: string, field: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new ConversationValidationError(`Invalid ${field}: ${value}`);
  }
  return parsed;
}

function requireText(value: unknown, field: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConversationValidationError(`Missing required field: ${field}`);
  }
}

function validateEventMetadata(metadata: EventMetadata): void {
  requireText(metadata.name, 'event_metadata.name');
  requireText(metadata.eventType, 'event_metadata.event_type');
  requireText(metadata.plannerName, 'event_metadata.planner_name');
  requireText(metadata.plannerEmail, 'event_metadata.planner_email');
  if (
    !Array.isArray(metadata.dates) ||
    metadata.dates.some((date) => typeof date !== 'string')
  ) {
    throw new ConversationValidationError(
      'event_metadata.dates must be a list of date strings',
    );
  }
}

function validateVendorInfo(vendor: VendorInfo): void {
  requireText(vendor.name, 'vendor_info.name');
  requireText(vendor.email, 'vendor_info.email');
  requireText(vendor.serviceType, 'vendor_info.service_type');
}
