import { ConversationStatus } from '../enums/conversation-status.enum';

/**
 * Response bodies of the lifecycle operations. Snake_case because they
 * are returned to HTTP callers as-is.
 */

export interface BidInitiationResponse {
  message: string;
  conversation_id: string;
  email_sent: boolean;
  vendor_email: string;
  questions_count: number;
}

export interface ReplyProcessedResult {
  status: 'success';
  conversation_id: string;
  questions_answered: number;
  unanswered_required: number;
  follow_up_sent: boolean;
  conversation_status: ConversationStatus;
  attempt_count: number;
}

export interface ReplyIgnoredResult {
  status: 'ignored';
  reason: string;
  conversation_id: string;
}

export interface ConversationNotFoundResult {
  status: 'not_found';
  error: string;
  conversation_id: string;
}

export interface ReplyFailedResult {
  status: 'error';
  error: string;
  // absent when the record could not be tied to a conversation
  conversation_id?: string;
}

export type InboundProcessingResult =
  | ReplyProcessedResult
  | ReplyIgnoredResult
  | ConversationNotFoundResult
  | ReplyFailedResult;
