import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';
import {
  InboundAddressConfig,
  buildFromAddress,
  buildReplyToAddress,
} from '../utils/reply-address.util';

export interface VendorEmail {
  to: string;
  subject: string;
  body: string;
  conversationId: string;
  senderDisplayName: string;
}

/**
 * VendorMailerService
 *
 * Sends plain-text mail to vendors. Every message carries a reply-to
 * address tagged with its conversation id so replies can be routed back.
 * Returns false instead of throwing; the caller owns the conversation
 * state that depends on the outcome.
 */
@Injectable()
export class VendorMailerService {
  private readonly logger = new Logger(VendorMailerService.name);
  private transporter: Transporter | null = null;
  private readonly addressConfig: InboundAddressConfig;
  private readonly fromAddressOverride: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.addressConfig = {
      localPart: this.configService.get<string>('INBOUND_EMAIL_LOCAL_PART', 'bids'),
      environment: this.configService.get<string>('APP_ENV', 'dev'),
      domain: this.configService.get<string>('INBOUND_EMAIL_DOMAIN', 'example.com'),
    };
    this.fromAddressOverride = this.configService.get<string>('MAIL_FROM_ADDRESS');
    this.initializeTransporter();
  }

  private initializeTransporter(): void {
    const host = this.configService.get<string>('SMTP_HOST');
    const user = this.configService.get<string>('SMTP_USER');

    if (!host || !user) {
      this.logger.warn(
        'SMTP not configured. Vendor emails will be logged only. Configure SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASS',
      );
      return;
    }

    const port = parseInt(this.configService.get<string>('SMTP_PORT', '587'), 10);

    try {
      this.transporter = nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        auth: {
          user,
          pass: this.configService.get<string>('SMTP_PASS'),
        },
      });
      this.logger.log(`Email transporter initialized: ${host}:${port}`);
    } catch (error) {
      this.logger.error(
        `Failed to initialize email transporter: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async send(email: VendorEmail): Promise<boolean> {
    if (!this.transporter) {
      this.logger.log(
        `[EMAIL STUB] To: ${email.to} | Subject: ${email.subject} | Conversation: ${email.conversationId}`,
      );
      return false;
    }

    try {
      const info = await this.transporter.sendMail({
        from: {
          name: email.senderDisplayName,
          address: this.fromAddressOverride || buildFromAddress(this.addressConfig),
        },
        to: email.to,
        replyTo: buildReplyToAddress(this.addressConfig, email.conversationId),
        subject: email.subject,
        text: email.body,
        headers: {
          'X-Conversation-Id': email.conversationId,
          'X-Environment': this.addressConfig.environment,
        },
      });

      this.logger.log(
        `Email sent to ${email.to} for conversation ${email.conversationId}: ${info.messageId}`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to send email to ${email.to}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }
}
