import { Module } from '@nestjs/common';
import { ClaudeApiService } from './services/claude-api.service';
import { BidEmailComposerService } from './services/bid-email-composer.service';
import { AnswerExtractorService } from './services/answer-extractor.service';

@Module({
  providers: [ClaudeApiService, BidEmailComposerService, AnswerExtractorService],
  exports: [BidEmailComposerService, AnswerExtractorService],
})
export class LlmModule {}
