import { Body, Controller, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { InboundProcessingResult } from '../interfaces/lifecycle.interfaces';
import { InboundEmailProcessorService } from '../services/inbound-email-processor.service';

/**
 * SNS delivery envelope. Records are decoded one by one by the processor,
 * so the body is not validated as a DTO.
 */
export interface InboundEmailBody {
  Records?: unknown;
}

export type InboundEmailResponse =
  | { message: 'No records to process' }
  | { message: 'Email processing completed'; results: InboundProcessingResult[] };

@ApiTags('Inbound Email')
@Controller('api/inbound-email')
export class InboundEmailController {
  private readonly logger = new Logger(InboundEmailController.name);

  constructor(private readonly inboundEmailProcessor: InboundEmailProcessorService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Process vendor replies delivered by the mail provider' })
  @ApiResponse({ status: 200, description: 'Per-record processing results' })
  async receive(@Body() body: InboundEmailBody): Promise<InboundEmailResponse> {
    const records: unknown[] = Array.isArray(body.Records) ? body.Records : [];

    if (records.length === 0) {
      return { message: 'No records to process' };
    }

    this.logger.log(`Processing ${records.length} inbound email record(s)`);
    const results = await this.inboundEmailProcessor.processBatch(records);

    return { message: 'Email processing completed', results };
  }
}
