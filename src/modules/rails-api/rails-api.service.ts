import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { Question } from '../conversations/domain/question';
import {
  ConversationCompletedPayload,
  ConversationStartedPayload,
  ConversationUpdatePayload,
  ErrorReportPayload,
  RailsQuestion,
} from './interfaces/rails-api.interfaces';

const DEFAULT_TIMEOUT_MS = 30000;
const HEALTH_CHECK_TIMEOUT_MS = 10000;
const DEFAULT_RETRY_DELAY_MS = 500;
const MAX_ATTEMPTS = 3;
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);
const ACCEPTED_STATUSES = new Set([200, 201, 202]);
const USER_AGENT = 'vendor-bid-api/1.0';

type RequestOutcome =
  | { kind: 'response'; status: number }
  | { kind: 'network-error'; message: string };

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * RailsApiService
 *
 * Best-effort status reporting to the upstream planning backend. Every
 * call returns true/false; nothing here throws. Retryable failures
 * (429, 5xx, network) are attempted up to three times.
 */
@Injectable()
export class RailsApiService {
  private readonly logger = new Logger(RailsApiService.name);
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.baseUrl = (this.configService.get<string>('RAILS_API_BASE_URL') ?? '').replace(/\/+$/, '');
    this.apiKey = this.configService.get<string>('RAILS_API_KEY') ?? '';
    this.timeoutMs =
      Number(this.configService.get<string>('RAILS_API_TIMEOUT_MS')) || DEFAULT_TIMEOUT_MS;
    const retryDelay = Number(this.configService.get<string>('RAILS_API_RETRY_DELAY_MS'));
    this.retryDelayMs = Number.isFinite(retryDelay) && retryDelay >= 0 ? retryDelay : DEFAULT_RETRY_DELAY_MS;

    if (!this.baseUrl || !this.apiKey) {
      this.logger.warn(
        'RAILS_API_BASE_URL or RAILS_API_KEY not configured. Upstream reporting is disabled',
      );
    }
  }

  async sendConversationUpdate(
    conversationId: string,
    status: string,
    questionsAnswered: RailsQuestion[],
    isFinal = false,
    rawEmailContent: string | null = null,
  ): Promise<boolean> {
    const payload: ConversationUpdatePayload = {
      conversation_id: conversationId,
      status,
      questions_answered: questionsAnswered,
      is_final: isFinal,
      timestamp: new Date().toISOString(),
      raw_email_content: rawEmailContent,
    };
    return this.post(
      '/api/v1/chatbot/conversation_updates',
      payload,
      `conversation update for ${conversationId}`,
    );
  }

  async notifyConversationStarted(
    conversationId: string,
    vendorEmail: string,
    initialEmailSent: boolean,
  ): Promise<boolean> {
    const payload: ConversationStartedPayload = {
      conversation_id: conversationId,
      vendor_email: vendorEmail,
      initial_email_sent: initialEmailSent,
      timestamp: new Date().toISOString(),
    };
    return this.post(
      `/api/v1/chatbot/conversations/${encodeURIComponent(conversationId)}/started`,
      payload,
      `conversation start for ${conversationId}`,
    );
  }

  async notifyConversationCompleted(
    conversationId: string,
    finalStatus: string,
    allAnswers: RailsQuestion[],
    attemptCount: number,
  ): Promise<boolean> {
    const payload: ConversationCompletedPayload = {
      conversation_id: conversationId,
      final_status: finalStatus,
      all_answers: allAnswers,
      attempt_count: attemptCount,
      completed_at: new Date().toISOString(),
    };
    return this.post(
      `/api/v1/chatbot/conversations/${encodeURIComponent(conversationId)}/completed`,
      payload,
      `conversation completion for ${conversationId}`,
    );
  }

  async reportError(
    conversationId: string | null,
    errorType: string,
    errorMessage: string,
    context: Record<string, unknown> = {},
  ): Promise<boolean> {
    const payload: ErrorReportPayload = {
      conversation_id: conversationId,
      error_type: errorType,
      error_message: errorMessage,
      context,
      timestamp: new Date().toISOString(),
    };
    return this.post('/api/v1/chatbot/errors', payload, `error report (${errorType})`);
  }

  /**
   * Single-shot health probe, used by the readiness endpoint.
   */
  async validateConnection(): Promise<boolean> {
    if (!this.isConfigured()) {
      return false;
    }

    const outcome = await this.request('get', '/api/v1/health', undefined, HEALTH_CHECK_TIMEOUT_MS);
    if (outcome.kind === 'response' && outcome.status === 200) {
      return true;
    }
    this.logger.warn(
      `Upstream API health check failed: ${outcome.kind === 'response' ? `status ${outcome.status}` : outcome.message}`,
    );
    return false;
  }

  formatQuestionsForRails(questions: readonly Question[]): RailsQuestion[] {
    return questions.map((question) => ({
      id: question.id,
      text: question.text,
      answer: question.answer,
      answered: question.answered,
      required: question.required,
    }));
  }

  private isConfigured(): boolean {
    return this.baseUrl !== '' && this.apiKey !== '';
  }

  private async post(path: string, payload: object, description: string): Promise<boolean> {
    if (!this.isConfigured()) {
      this.logger.debug(`Skipping ${description}: upstream API not configured`);
      return false;
    }

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const outcome = await this.request('post', path, payload, this.timeoutMs);

      if (outcome.kind === 'response' && ACCEPTED_STATUSES.has(outcome.status)) {
        this.logger.log(`Sent ${description}`);
        return true;
      }

      const retryable =
        outcome.kind === 'network-error' || RETRYABLE_STATUSES.has(outcome.status);
      const reason =
        outcome.kind === 'response' ? `status ${outcome.status}` : outcome.message;

      if (!retryable || attempt === MAX_ATTEMPTS) {
        this.logger.error(`Failed to send ${description} after ${attempt} attempt(s): ${reason}`);
        return false;
      }

      this.logger.warn(`Retrying ${description} (attempt ${attempt} failed: ${reason})`);
      await delay(this.retryDelayMs * attempt);
    }

    return false;
  }

  private async request(
    method: 'get' | 'post',
    path: string,
    payload: object | undefined,
    timeout: number,
  ): Promise<RequestOutcome> {
    try {
      const response = await this.httpService.axiosRef.request({
        method,
        url: `${this.baseUrl}${path}`,
        data: payload,
        timeout,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
          'User-Agent': USER_AGENT,
        },
        validateStatus: () => true,
      });
      return { kind: 'response', status: response.status };
    } catch (error) {
      return {
        kind: 'network-error',
        message: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
