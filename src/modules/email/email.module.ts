import { Module } from '@nestjs/common';
import { VendorMailerService } from './services/vendor-mailer.service';
import { InboundEmailDecoderService } from './services/inbound-email-decoder.service';

/**
 * EmailModule
 *
 * Outbound vendor mail over SMTP and decoding of inbound SES replies.
 */
@Module({
  providers: [VendorMailerService, InboundEmailDecoderService],
  exports: [VendorMailerService, InboundEmailDecoderService],
})
export class EmailModule {}
