import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { InboundEmailDecoderService } from '../services/inbound-email-decoder.service';

const CONVERSATION_ID = '0b7e2c55-3f2a-4c1e-9a57-7d2f4b1a9c10';

function buildNotification(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    notificationType: 'Received',
    mail: {
      timestamp: '2026-05-06T10:15:00.000Z',
      messageId: 'ses-msg-1',
      destination: [`bids-prod+${CONVERSATION_ID}@example.com`],
      commonHeaders: {
        from: ['Lakeside Sales <sales@lakeside.example.com>'],
        to: [`bids-prod+${CONVERSATION_ID}@example.com`],
        subject: 'Re: Pricing Inquiry',
      },
    },
    content: 'We can host 120 guests.\n> original question',
    ...overrides,
  };
}

function wrapInSns(notification: unknown): Record<string, unknown> {
  return { EventSource: 'aws:sns', Sns: { Message: JSON.stringify(notification) } };
}

describe('InboundEmailDecoderService', () => {
  let service: InboundEmailDecoderService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InboundEmailDecoderService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, defaultValue?: string) =>
              key === 'INBOUND_EMAIL_LOCAL_PART' ? 'bids' : defaultValue,
            ),
          },
        },
      ],
    }).compile();

    service = module.get<InboundEmailDecoderService>(InboundEmailDecoderService);
  });

  it('should decode an SNS record into the reply fields', () => {
    expect(service.decode(wrapInSns(buildNotification()))).toEqual({
      conversationId: CONVERSATION_ID,
      fromEmail: 'Lakeside Sales <sales@lakeside.example.com>',
      subject: 'Re: Pricing Inquiry',
      body: 'We can host 120 guests.',
      timestamp: '2026-05-06T10:15:00.000Z',
      messageId: 'ses-msg-1',
    });
  });

  it('should accept a notification that is not wrapped in SNS', () => {
    expect(service.decode(buildNotification())?.conversationId).toBe(CONVERSATION_ID);
  });

  it('should fall back to the envelope destination', () => {
    const notification = buildNotification({
      mail: {
        destination: [`bids-prod+${CONVERSATION_ID}@example.com`],
        commonHeaders: { to: ['Planner Team <planners@example.com>'] },
      },
    });

    const decoded = service.decode(wrapInSns(notification));

    expect(decoded?.conversationId).toBe(CONVERSATION_ID);
    expect(decoded?.subject).toBe('');
    expect(decoded?.fromEmail).toBe('');
    expect(decoded?.timestamp).toBeNull();
    expect(decoded?.messageId).toBeNull();
  });

  it('should decode an empty body when the notification has no content', () => {
    const notification = buildNotification();
    delete notification.content;

    expect(service.decode(wrapInSns(notification))?.body).toBe('');
  });

  it('should return null when no recipient carries a conversation id', () => {
    const notification = buildNotification({
      mail: { commonHeaders: { to: ['bids-prod@example.com'] } },
    });

    expect(service.decode(wrapInSns(notification))).toBeNull();
  });

  it('should return null without a mail object', () => {
    expect(service.decode(wrapInSns({ notificationType: 'Received' }))).toBeNull();
  });

  it('should return null for a message that is not JSON', () => {
    expect(service.decode({ Sns: { Message: 'not json' } })).toBeNull();
  });

  it('should return null for a message that is a JSON array', () => {
    expect(service.decode({ Sns: { Message: '[1, 2]' } })).toBeNull();
  });

  it('should return null for records that are not objects', () => {
    expect(service.decode(null)).toBeNull();
    expect(service.decode('raw email')).toBeNull();
  });
});
