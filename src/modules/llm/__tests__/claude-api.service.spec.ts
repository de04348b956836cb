import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  BadRequestException,
  ServiceUnavailableException,
  InternalServerErrorException,
  RequestTimeoutException,
} from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { ClaudeApiService } from '../services/claude-api.service';
import { ClaudeApiRequest } from '../interfaces/claude-api.interfaces';

const mockCreate = jest.fn();
jest.mock('@anthropic-ai/sdk', () => {
  return {
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
      messages: {
        create: mockCreate,
      },
    })),
  };
});

describe('ClaudeApiService', () => {
  let service: ClaudeApiService;
  let config: Record<string, string>;

  const baseRequest: ClaudeApiRequest = {
    systemPrompt: 'You are a helpful assistant.',
    userPrompt: 'Write a short greeting.',
  };

  const mockAnthropicResponse = {
    content: [{ type: 'text', text: '{"subject": "Hi"}' }],
    model: 'claude-sonnet-4-20250514',
    usage: { input_tokens: 50, output_tokens: 20 },
    stop_reason: 'end_turn',
  };

  async function createService(): Promise<ClaudeApiService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ClaudeApiService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    return module.get<ClaudeApiService>(ClaudeApiService);
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    config = { ANTHROPIC_API_KEY: 'test-anthropic-key', CLAUDE_API_TIMEOUT_MS: '30000' };
    mockCreate.mockResolvedValue(mockAnthropicResponse);
    service = await createService();
  });

  describe('sendMessage', () => {
    it('should create the client with the configured key and timeout', async () => {
      await service.sendMessage(baseRequest);

      expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-anthropic-key', timeout: 30000 });
    });

    it('should reuse the client across calls', async () => {
      await service.sendMessage(baseRequest);
      await service.sendMessage(baseRequest);

      expect(Anthropic).toHaveBeenCalledTimes(1);
    });

    it('should call messages.create with defaults', async () => {
      await service.sendMessage(baseRequest);

      expect(mockCreate).toHaveBeenCalledWith({
        model: 'claude-sonnet-4-20250514',
        max_tokens: 1500,
        temperature: 0.3,
        system: 'You are a helpful assistant.',
        messages: [{ role: 'user', content: 'Write a short greeting.' }],
      });
    });

    it('should use the configured model and request overrides', async () => {
      config.CLAUDE_MODEL = 'claude-test-model';
      service = await createService();

      await service.sendMessage({ ...baseRequest, maxTokens: 800, temperature: 0 });

      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-test-model', max_tokens: 800, temperature: 0 }),
      );
    });

    it('should return the text content and token usage', async () => {
      expect(await service.sendMessage(baseRequest)).toEqual({
        content: '{"subject": "Hi"}',
        model: 'claude-sonnet-4-20250514',
        inputTokens: 50,
        outputTokens: 20,
        stopReason: 'end_turn',
      });
    });

    it('should return empty content when no text block is present', async () => {
      mockCreate.mockResolvedValueOnce({ ...mockAnthropicResponse, content: [] });

      expect((await service.sendMessage(baseRequest)).content).toBe('');
    });

    it('should throw ServiceUnavailableException when no API key is configured', async () => {
      config = {};
      service = await createService();

      await expect(service.sendMessage(baseRequest)).rejects.toThrow(ServiceUnavailableException);
      expect(mockCreate).not.toHaveBeenCalled();
    });
  });

  describe('error handling', () => {
    it('should throw BadRequestException for 401', async () => {
      mockCreate.mockRejectedValue({ status: 401, message: 'Unauthorized' });

      await expect(service.sendMessage(baseRequest)).rejects.toThrow(BadRequestException);
    });

    it('should throw ServiceUnavailableException with retry-after for 429', async () => {
      mockCreate.mockRejectedValue({
        status: 429,
        message: 'Rate limited',
        headers: { 'retry-after': '30' },
      });

      await expect(service.sendMessage(baseRequest)).rejects.toThrow(
        'Claude API rate limit exceeded. Retry after 30 seconds',
      );
    });

    it('should throw InternalServerErrorException for 5xx', async () => {
      mockCreate.mockRejectedValue({ status: 503, message: 'Service unavailable' });

      await expect(service.sendMessage(baseRequest)).rejects.toThrow(
        'Claude API is temporarily unavailable',
      );
    });

    it('should throw RequestTimeoutException for timeouts', async () => {
      mockCreate.mockRejectedValue({ code: 'ETIMEDOUT', message: 'Connection timed out' });

      await expect(service.sendMessage(baseRequest)).rejects.toThrow(RequestTimeoutException);
    });

    it('should throw InternalServerErrorException for unknown errors', async () => {
      mockCreate.mockRejectedValue(new Error('Something unexpected happened'));

      await expect(service.sendMessage(baseRequest)).rejects.toThrow(
        new InternalServerErrorException('Claude API error: Something unexpected happened'),
      );
    });
  });
});
