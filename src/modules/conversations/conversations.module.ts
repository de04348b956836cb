import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConversationRecord } from '../../database/entities/conversation.entity';
import { EmailModule } from '../email/email.module';
import { LlmModule } from '../llm/llm.module';
import { RailsApiModule } from '../rails-api/rails-api.module';
import { BidsController } from './controllers/bids.controller';
import { ConversationsController } from './controllers/conversations.controller';
import { InboundEmailController } from './controllers/inbound-email.controller';
import { BidInitiationService } from './services/bid-initiation.service';
import { ConversationStoreService } from './services/conversation-store.service';
import { InboundEmailProcessorService } from './services/inbound-email-processor.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([ConversationRecord]),
    EmailModule,
    LlmModule,
    RailsApiModule,
  ],
  controllers: [BidsController, InboundEmailController, ConversationsController],
  providers: [ConversationStoreService, BidInitiationService, InboundEmailProcessorService],
  exports: [ConversationStoreService],
})
export class ConversationsModule {}
