import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { RailsApiService } from '../rails-api.service';
import { buildInProgressConversation } from '../../conversations/__tests__/conversation-test-helpers';

const CONVERSATION_ID = '0b7e2c55-3f2a-4c1e-9a57-7d2f4b1a9c10';

describe('RailsApiService', () => {
  let service: RailsApiService;
  let axiosRequest: jest.Mock;
  let config: Record<string, string>;

  async function createService(): Promise<RailsApiService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RailsApiService,
        { provide: HttpService, useValue: { axiosRef: { request: axiosRequest } } },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    return module.get<RailsApiService>(RailsApiService);
  }

  beforeEach(async () => {
    axiosRequest = jest.fn().mockResolvedValue({ status: 200, data: {} });
    config = {
      RAILS_API_BASE_URL: 'https://planner.test/',
      RAILS_API_KEY: 'test-secret',
      RAILS_API_RETRY_DELAY_MS: '0',
    };
    service = await createService();
  });

  describe('sendConversationUpdate', () => {
    it('should post the update with bearer auth', async () => {
      const result = await service.sendConversationUpdate(
        CONVERSATION_ID,
        'in_progress',
        [{ id: 1, text: 'Dates?', answer: 'Yes', answered: true, required: true }],
        false,
        'Yes we are free',
      );

      expect(result).toBe(true);
      expect(axiosRequest).toHaveBeenCalledWith({
        method: 'post',
        url: 'https://planner.test/api/v1/chatbot/conversation_updates',
        data: {
          conversation_id: CONVERSATION_ID,
          status: 'in_progress',
          questions_answered: [
            { id: 1, text: 'Dates?', answer: 'Yes', answered: true, required: true },
          ],
          is_final: false,
          timestamp: expect.any(String),
          raw_email_content: 'Yes we are free',
        },
        timeout: 30000,
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
          'User-Agent': 'vendor-bid-api/1.0',
        },
        validateStatus: expect.any(Function),
      });
    });

    it('should retry a 503 and succeed on the next attempt', async () => {
      axiosRequest.mockResolvedValueOnce({ status: 503, data: {} });

      expect(await service.sendConversationUpdate(CONVERSATION_ID, 'completed', [], true)).toBe(true);
      expect(axiosRequest).toHaveBeenCalledTimes(2);
    });

    it('should give up after three server errors', async () => {
      axiosRequest.mockResolvedValue({ status: 500, data: {} });

      expect(await service.sendConversationUpdate(CONVERSATION_ID, 'completed', [])).toBe(false);
      expect(axiosRequest).toHaveBeenCalledTimes(3);
    });

    it('should retry network errors', async () => {
      axiosRequest.mockRejectedValue(new Error('ECONNREFUSED'));

      expect(await service.sendConversationUpdate(CONVERSATION_ID, 'completed', [])).toBe(false);
      expect(axiosRequest).toHaveBeenCalledTimes(3);
    });

    it('should not retry a client error', async () => {
      axiosRequest.mockResolvedValue({ status: 422, data: { error: 'bad' } });

      expect(await service.sendConversationUpdate(CONVERSATION_ID, 'completed', [])).toBe(false);
      expect(axiosRequest).toHaveBeenCalledTimes(1);
    });

    it('should return false without calling out when not configured', async () => {
      config = {};
      service = await createService();

      expect(await service.sendConversationUpdate(CONVERSATION_ID, 'completed', [])).toBe(false);
      expect(axiosRequest).not.toHaveBeenCalled();
    });
  });

  it('should notify the start of a conversation', async () => {
    axiosRequest.mockResolvedValue({ status: 201, data: {} });

    expect(
      await service.notifyConversationStarted(CONVERSATION_ID, 'sales@lakeside.example.com', true),
    ).toBe(true);
    expect(axiosRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        url: `https://planner.test/api/v1/chatbot/conversations/${CONVERSATION_ID}/started`,
        data: {
          conversation_id: CONVERSATION_ID,
          vendor_email: 'sales@lakeside.example.com',
          initial_email_sent: true,
          timestamp: expect.any(String),
        },
      }),
    );
  });

  it('should notify the completion of a conversation', async () => {
    axiosRequest.mockResolvedValue({ status: 202, data: {} });

    expect(await service.notifyConversationCompleted(CONVERSATION_ID, 'completed', [], 3)).toBe(true);
    expect(axiosRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        url: `https://planner.test/api/v1/chatbot/conversations/${CONVERSATION_ID}/completed`,
        data: {
          conversation_id: CONVERSATION_ID,
          final_status: 'completed',
          all_answers: [],
          attempt_count: 3,
          completed_at: expect.any(String),
        },
      }),
    );
  });

  it('should report errors with an empty default context', async () => {
    expect(await service.reportError(null, 'email_processing_error', 'boom')).toBe(true);
    expect(axiosRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'https://planner.test/api/v1/chatbot/errors',
        data: {
          conversation_id: null,
          error_type: 'email_processing_error',
          error_message: 'boom',
          context: {},
          timestamp: expect.any(String),
        },
      }),
    );
  });

  describe('validateConnection', () => {
    it('should probe the health endpoint once', async () => {
      expect(await service.validateConnection()).toBe(true);
      expect(axiosRequest).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'get',
          url: 'https://planner.test/api/v1/health',
          timeout: 10000,
        }),
      );
    });

    it('should return false for an unhealthy response without retrying', async () => {
      axiosRequest.mockResolvedValue({ status: 503, data: {} });

      expect(await service.validateConnection()).toBe(false);
      expect(axiosRequest).toHaveBeenCalledTimes(1);
    });

    it('should return false when the API is unreachable', async () => {
      axiosRequest.mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

      expect(await service.validateConnection()).toBe(false);
    });
  });

  it('should format questions with their answer state', () => {
    const conversation = buildInProgressConversation();
    conversation.recordAnswer(2, 'Deluxe at $189');

    expect(service.formatQuestionsForRails(conversation.questions.slice(0, 2))).toEqual([
      {
        id: 1,
        text: 'Do you have availability for our dates?',
        answer: null,
        answered: false,
        required: true,
      },
      {
        id: 2,
        text: 'What is your rate per room per night?',
        answer: 'Deluxe at $189',
        answered: true,
        required: true,
      },
    ]);
  });
});
