import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import request from 'supertest';
import { HttpExceptionFilter } from '../src/common/filters/http-exception.filter';
import { ConversationRecord } from '../src/database/entities/conversation.entity';
import { BidsController } from '../src/modules/conversations/controllers/bids.controller';
import { ConversationsController } from '../src/modules/conversations/controllers/conversations.controller';
import { InboundEmailController } from '../src/modules/conversations/controllers/inbound-email.controller';
import { BidInitiationService } from '../src/modules/conversations/services/bid-initiation.service';
import { ConversationStoreService } from '../src/modules/conversations/services/conversation-store.service';
import { InboundEmailProcessorService } from '../src/modules/conversations/services/inbound-email-processor.service';
import { InboundEmailDecoderService } from '../src/modules/email/services/inbound-email-decoder.service';
import { VendorMailerService } from '../src/modules/email/services/vendor-mailer.service';
import { HealthController } from '../src/modules/health/health.controller';
import { HealthCheckService } from '../src/modules/health/health.service';
import { AnswerExtractorService } from '../src/modules/llm/services/answer-extractor.service';
import { BidEmailComposerService } from '../src/modules/llm/services/bid-email-composer.service';
import { RailsApiService } from '../src/modules/rails-api/rails-api.service';

/**
 * In-process stand-in for the TypeORM repository, keyed by conversation id.
 */
class InMemoryConversationRepository {
  readonly rows = new Map<string, ConversationRecord>();

  async save(record: ConversationRecord): Promise<ConversationRecord> {
    this.rows.set(record.conversationId, { ...record });
    return record;
  }

  async findOne(options: { where: { conversationId: string } }): Promise<ConversationRecord | null> {
    return this.rows.get(options.where.conversationId) ?? null;
  }

  async find(options: { take: number }): Promise<ConversationRecord[]> {
    return [...this.rows.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, options.take);
  }
}

const BID_PAYLOAD = {
  event_metadata: {
    name: 'Spring Offsite',
    dates: ['2026-05-12', '2026-05-13'],
    event_type: 'corporate retreat',
    planner_name: 'Alex Rivera',
    planner_email: 'alex@example.com',
  },
  vendor_info: {
    name: 'Lakeside Lodge',
    email: 'sales@lakeside.example.com',
    service_type: 'hotel',
  },
  questions: [
    { id: 1, text: 'Do you have availability for our dates?', required: true },
    { id: 2, text: 'What is your rate per room per night?', required: true },
    { id: 3, text: 'Do you offer airport shuttles?', required: false },
  ],
  callback_data: { rails_request_id: 'req-1' },
};

function inboundRecord(conversationId: string, content: string): Record<string, unknown> {
  return {
    EventSource: 'aws:sns',
    Sns: {
      Message: JSON.stringify({
        notificationType: 'Received',
        mail: {
          timestamp: '2026-05-06T10:15:00.000Z',
          messageId: 'ses-msg-1',
          destination: [`bids-dev+${conversationId}@example.com`],
          commonHeaders: {
            from: ['Lakeside Sales <sales@lakeside.example.com>'],
            to: [`bids-dev+${conversationId}@example.com`],
            subject: 'Re: Pricing Inquiry',
          },
        },
        content,
      }),
    },
  };
}

describe('Vendor bid conversation flow (e2e)', () => {
  let app: INestApplication;
  let repository: InMemoryConversationRepository;
  let mockMailer: { send: jest.Mock };
  let mockExtractor: { extract: jest.Mock };
  let mockRailsApi: Record<string, jest.Mock>;

  beforeEach(async () => {
    repository = new InMemoryConversationRepository();
    mockMailer = { send: jest.fn().mockResolvedValue(true) };
    mockExtractor = { extract: jest.fn().mockResolvedValue([]) };
    mockRailsApi = {
      sendConversationUpdate: jest.fn().mockResolvedValue(true),
      notifyConversationStarted: jest.fn().mockResolvedValue(true),
      notifyConversationCompleted: jest.fn().mockResolvedValue(true),
      reportError: jest.fn().mockResolvedValue(true),
      formatQuestionsForRails: jest.fn().mockReturnValue([]),
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [BidsController, InboundEmailController, ConversationsController, HealthController],
      providers: [
        ConversationStoreService,
        BidInitiationService,
        InboundEmailProcessorService,
        InboundEmailDecoderService,
        { provide: getRepositoryToken(ConversationRecord), useValue: repository },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((_key: string, defaultValue?: string) => defaultValue) },
        },
        {
          provide: BidEmailComposerService,
          useValue: {
            composeOpening: jest.fn().mockResolvedValue({ subject: 'Pricing Inquiry', body: 'Hello' }),
            composeFollowUp: jest.fn().mockResolvedValue({ subject: 'Follow-up', body: 'One more thing' }),
          },
        },
        { provide: AnswerExtractorService, useValue: mockExtractor },
        { provide: VendorMailerService, useValue: mockMailer },
        { provide: RailsApiService, useValue: mockRailsApi },
        { provide: HealthCheckService, useValue: { checkReadiness: jest.fn() } },
      ],
    }).compile();

    app = moduleFixture.createNestApplication();

    // Same global setup as main.ts
    app.useGlobalFilters(new HttpExceptionFilter());
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );

    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  async function initiate(): Promise<string> {
    const response = await request(app.getHttpServer()).post('/api/bids').send(BID_PAYLOAD).expect(200);
    return response.body.conversation_id;
  }

  describe('POST /api/bids', () => {
    it('should start a conversation and send the opening email', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/bids')
        .send(BID_PAYLOAD)
        .expect(200);

      expect(response.body).toEqual({
        message: 'Bid request initiated successfully',
        conversation_id: expect.any(String),
        email_sent: true,
        vendor_email: 'sales@lakeside.example.com',
        questions_count: 3,
      });
      expect(mockMailer.send).toHaveBeenCalledWith({
        to: 'sales@lakeside.example.com',
        subject: 'Pricing Inquiry',
        body: 'Hello',
        conversationId: response.body.conversation_id,
        senderDisplayName: 'Alex Rivera',
      });

      const stored = repository.rows.get(response.body.conversation_id);
      expect(stored?.status).toBe('in_progress');
      expect(stored?.attemptCount).toBe(1);
    });

    it('should reject an invalid payload without storing anything', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/bids')
        .send({ ...BID_PAYLOAD, vendor_info: { ...BID_PAYLOAD.vendor_info, email: 'nope' } })
        .expect(400);

      expect(response.body.statusCode).toBe(400);
      expect(response.body.message).toBe('vendor_info.email must be an email');
      expect(repository.rows.size).toBe(0);
      expect(mockRailsApi.reportError).not.toHaveBeenCalled();
    });

    it.each(['event_metadata', 'vendor_info', 'questions'])(
      'should reject a payload without %s',
      async (property) => {
        const payload: Record<string, unknown> = { ...BID_PAYLOAD };
        delete payload[property];

        const response = await request(app.getHttpServer()).post('/api/bids').send(payload).expect(400);

        expect(response.body.message).toContain(`${property} should not be null or undefined`);
        expect(repository.rows.size).toBe(0);
        expect(mockMailer.send).not.toHaveBeenCalled();
      },
    );

    it('should reject duplicate question ids', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/bids')
        .send({
          ...BID_PAYLOAD,
          questions: [
            { id: 1, text: 'Availability?' },
            { id: 1, text: 'Rates?' },
          ],
        })
        .expect(400);

      expect(response.body.message).toBe('Duplicate question id: 1');
      expect(repository.rows.size).toBe(0);
    });

    it('should fail the conversation when the opening email cannot be sent', async () => {
      mockMailer.send.mockResolvedValue(false);

      const response = await request(app.getHttpServer())
        .post('/api/bids')
        .send(BID_PAYLOAD)
        .expect(500);

      expect(response.body.message).toBe('Failed to send email to vendor');
      expect(repository.rows.get(response.body.conversation_id)?.status).toBe('failed');
    });
  });

  describe('POST /api/inbound-email', () => {
    it('should follow up, then complete, then ignore further replies', async () => {
      const conversationId = await initiate();
      const server = app.getHttpServer();

      mockExtractor.extract.mockResolvedValueOnce([{ questionId: 1, answer: 'Yes, both nights' }]);
      const first = await request(server)
        .post('/api/inbound-email')
        .send({ Records: [inboundRecord(conversationId, 'Yes, both nights are open.')] })
        .expect(200);

      expect(first.body).toEqual({
        message: 'Email processing completed',
        results: [
          {
            status: 'success',
            conversation_id: conversationId,
            questions_answered: 1,
            unanswered_required: 1,
            follow_up_sent: true,
            conversation_status: 'in_progress',
            attempt_count: 2,
          },
        ],
      });

      mockExtractor.extract.mockResolvedValueOnce([{ questionId: 2, answer: '$180' }]);
      const second = await request(server)
        .post('/api/inbound-email')
        .send({ Records: [inboundRecord(conversationId, 'Rooms are $180.')] })
        .expect(200);

      expect(second.body.results[0]).toEqual(
        expect.objectContaining({ status: 'success', conversation_status: 'completed', follow_up_sent: false }),
      );
      expect(mockRailsApi.notifyConversationCompleted).toHaveBeenCalledTimes(1);

      const third = await request(server)
        .post('/api/inbound-email')
        .send({ Records: [inboundRecord(conversationId, 'Anything else?')] })
        .expect(200);

      expect(third.body.results[0]).toEqual({
        status: 'ignored',
        reason: 'Conversation already completed',
        conversation_id: conversationId,
      });
    });

    it('should isolate undecodable and unknown records in a batch', async () => {
      const unknownId = '0b7e2c55-3f2a-4c1e-9a57-7d2f4b1a9c10';

      const response = await request(app.getHttpServer())
        .post('/api/inbound-email')
        .send({ Records: [{ Sns: { Message: 'not json' } }, inboundRecord(unknownId, 'Hi')] })
        .expect(200);

      expect(response.body.results).toEqual([
        { status: 'error', error: 'Failed to parse email data' },
        {
          status: 'not_found',
          error: `Conversation ${unknownId} not found`,
          conversation_id: unknownId,
        },
      ]);
    });

    it('should report a database outage as an error rather than an unknown conversation', async () => {
      const conversationId = await initiate();
      jest.spyOn(repository, 'findOne').mockRejectedValueOnce(new Error('connection refused'));

      const response = await request(app.getHttpServer())
        .post('/api/inbound-email')
        .send({ Records: [inboundRecord(conversationId, 'Yes, both nights are open.')] })
        .expect(200);

      expect(response.body.results).toEqual([
        {
          status: 'error',
          error: `Failed to load conversation ${conversationId}: connection refused`,
          conversation_id: conversationId,
        },
      ]);
      expect(repository.rows.get(conversationId)?.status).toBe('in_progress');
    });

    it('should report an empty batch', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/inbound-email')
        .send({ Records: [] })
        .expect(200);

      expect(response.body).toEqual({ message: 'No records to process' });
    });
  });

  describe('GET /api/conversations', () => {
    it('should return a stored conversation', async () => {
      const conversationId = await initiate();

      const response = await request(app.getHttpServer())
        .get(`/api/conversations/${conversationId}`)
        .expect(200);

      expect(response.body.conversationId).toBe(conversationId);
      expect(response.body.status).toBe('in_progress');
      expect(response.body.emailExchanges).toHaveLength(1);
      expect(response.body.railsApiCallbackData).toEqual({ rails_request_id: 'req-1' });
    });

    it('should list recent conversations', async () => {
      const conversationId = await initiate();

      const response = await request(app.getHttpServer())
        .get('/api/conversations?limit=5')
        .expect(200);

      expect(response.body.limit).toBe(5);
      expect(response.body.conversations.map((c: { conversationId: string }) => c.conversationId)).toEqual([
        conversationId,
      ]);
    });

    it('should return 404 for an unknown conversation', async () => {
      await request(app.getHttpServer())
        .get('/api/conversations/0b7e2c55-3f2a-4c1e-9a57-7d2f4b1a9c10')
        .expect(404);
    });

    it('should return 503 when the database is unavailable', async () => {
      const conversationId = await initiate();
      jest.spyOn(repository, 'findOne').mockRejectedValueOnce(new Error('connection refused'));

      const response = await request(app.getHttpServer())
        .get(`/api/conversations/${conversationId}`)
        .expect(503);

      expect(response.body.message).toBe(`Conversation ${conversationId} could not be loaded`);
    });

    it('should return 400 for a malformed id', async () => {
      await request(app.getHttpServer()).get('/api/conversations/not-a-uuid').expect(400);
    });
  });

  describe('GET /health', () => {
    it('should report liveness', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body.status).toBe('ok');
    });
  });
});
