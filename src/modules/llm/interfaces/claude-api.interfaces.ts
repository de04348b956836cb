/**
 * Claude API request/response types
 */

export interface ClaudeApiRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens?: number; // default: 1500
  temperature?: number; // default: 0.3
  model?: string; // default: CLAUDE_MODEL or 'claude-sonnet-4-20250514'
}

export interface ClaudeApiResponse {
  content: string; // The generated text response
  model: string;
  inputTokens: number;
  outputTokens: number;
  stopReason: string; // 'end_turn', 'max_tokens', etc.
}

export interface ComposedEmail {
  subject: string;
  body: string;
}

export interface ExtractedAnswer {
  questionId: number;
  answer: string;
}
