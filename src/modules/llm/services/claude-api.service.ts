import {
  Injectable,
  Logger,
  BadRequestException,
  ServiceUnavailableException,
  InternalServerErrorException,
  RequestTimeoutException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import {
  ClaudeApiRequest,
  ClaudeApiResponse,
} from '../interfaces/claude-api.interfaces';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 1500;
const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_TIMEOUT_MS = 60000;

interface ApiErrorShape {
  status?: unknown;
  code?: unknown;
  message?: unknown;
  headers?: unknown;
}

function toApiErrorShape(error: unknown): ApiErrorShape {
  if (typeof error !== 'object' || error === null) {
    return { message: typeof error === 'string' ? error : undefined };
  }
  return {
    status: 'status' in error ? error.status : undefined,
    code: 'code' in error ? error.code : undefined,
    message: 'message' in error ? error.message : undefined,
    headers: 'headers' in error ? error.headers : undefined,
  };
}

function retryAfterHeader(headers: unknown): string | undefined {
  if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) {
    return undefined;
  }
  const value = headers['retry-after'];
  return typeof value === 'string' ? value : undefined;
}

/**
 * ClaudeApiService
 *
 * Thin wrapper over the Anthropic SDK. Uses the deployment's API key and
 * maps SDK failures onto Nest exceptions so callers see one error family.
 */
@Injectable()
export class ClaudeApiService {
  private readonly logger = new Logger(ClaudeApiService.name);
  private readonly timeoutMs: number;
  private readonly defaultModel: string;
  private client: Anthropic | null = null;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs =
      Number(this.configService.get<string>('CLAUDE_API_TIMEOUT_MS')) ||
      DEFAULT_TIMEOUT_MS;
    this.defaultModel =
      this.configService.get<string>('CLAUDE_MODEL') || DEFAULT_MODEL;
  }

  private getClient(): Anthropic {
    if (this.client) {
      return this.client;
    }

    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');
    if (!apiKey) {
      throw new ServiceUnavailableException('Anthropic API key is not configured');
    }

    this.client = new Anthropic({ apiKey, timeout: this.timeoutMs });
    return this.client;
  }

  async sendMessage(request: ClaudeApiRequest): Promise<ClaudeApiResponse> {
    const model = request.model || this.defaultModel;
    const maxTokens = request.maxTokens || DEFAULT_MAX_TOKENS;
    const temperature = request.temperature ?? DEFAULT_TEMPERATURE;

    this.logger.debug(`Sending Claude API request (model: ${model}, maxTokens: ${maxTokens})`);

    const client = this.getClient();

    try {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        temperature,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
      });

      const textBlock = response.content.find(
        (block): block is Anthropic.TextBlock => block.type === 'text',
      );

      const result: ClaudeApiResponse = {
        content: textBlock?.text ?? '',
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason || 'end_turn',
      };

      this.logger.log(
        `Claude API response received: ${result.inputTokens} input tokens, ${result.outputTokens} output tokens`,
      );

      return result;
    } catch (error) {
      this.handleApiError(error);
    }
  }

  /**
   * Never logs API keys.
   */
  private handleApiError(error: unknown): never {
    const { status, code, message, headers } = toApiErrorShape(error);
    const errorMessage = typeof message === 'string' ? message : 'Unknown error';

    if (
      code === 'ETIMEDOUT' ||
      code === 'ECONNABORTED' ||
      errorMessage.toLowerCase().includes('timeout') ||
      errorMessage.toLowerCase().includes('timed out')
    ) {
      this.logger.error(`Claude API timeout: ${errorMessage}`);
      throw new RequestTimeoutException('Claude API request timed out. Please try again.');
    }

    if (status === 401) {
      this.logger.error('Claude API authentication error');
      throw new BadRequestException('Anthropic API key is invalid or revoked');
    }

    if (status === 429) {
      const retryAfter = retryAfterHeader(headers);
      this.logger.error(
        `Claude API rate limit${retryAfter ? `, retry after: ${retryAfter}s` : ''}`,
      );
      throw new ServiceUnavailableException(
        `Claude API rate limit exceeded${retryAfter ? `. Retry after ${retryAfter} seconds` : ''}`,
      );
    }

    if (typeof status === 'number' && status >= 500) {
      this.logger.error(`Claude API server error: status ${status}`);
      throw new InternalServerErrorException('Claude API is temporarily unavailable');
    }

    this.logger.error(`Claude API unknown error: ${errorMessage}`);
    throw new InternalServerErrorException(`Claude API error: ${errorMessage}`);
  }
}
