/**
 * Payloads exchanged with the upstream planning backend. Field names are
 * snake_case because they go over the wire as-is.
 */

export interface RailsQuestion {
  id: number;
  text: string;
  answer: string | null;
  answered: boolean;
  required: boolean;
}

export interface ConversationUpdatePayload {
  conversation_id: string;
  status: string;
  questions_answered: RailsQuestion[];
  is_final: boolean;
  timestamp: string;
  raw_email_content: string | null;
}

export interface ConversationStartedPayload {
  conversation_id: string;
  vendor_email: string;
  initial_email_sent: boolean;
  timestamp: string;
}

export interface ConversationCompletedPayload {
  conversation_id: string;
  final_status: string;
  all_answers: RailsQuestion[];
  attempt_count: number;
  completed_at: string;
}

export interface ErrorReportPayload {
  conversation_id: string | null;
  error_type: string;
  error_message: string;
  context: Record<string, unknown>;
  timestamp: string;
}
