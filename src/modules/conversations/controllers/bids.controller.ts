import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { BidQuestionDto, InitiateBidDto } from '../dto/initiate-bid.dto';
import { QuestionInput } from '../interfaces/conversation.interfaces';
import { BidInitiationResponse } from '../interfaces/lifecycle.interfaces';
import {
  BidInitiationInput,
  BidInitiationService,
} from '../services/bid-initiation.service';

function toQuestionInput(question: BidQuestionDto): QuestionInput {
  return {
    id: question.id,
    text: question.text,
    required: question.required,
    options: question.options ?? null,
    subQuestions: question.sub_questions ? question.sub_questions.map(toQuestionInput) : null,
  };
}

export function toBidInitiationInput(dto: InitiateBidDto): BidInitiationInput {
  return {
    eventMetadata: {
      name: dto.event_metadata.name,
      dates: dto.event_metadata.dates,
      eventType: dto.event_metadata.event_type,
      plannerName: dto.event_metadata.planner_name,
      plannerEmail: dto.event_metadata.planner_email,
      plannerPhone: dto.event_metadata.planner_phone ?? null,
    },
    vendorInfo: {
      name: dto.vendor_info.name,
      email: dto.vendor_info.email,
      phone: dto.vendor_info.phone ?? null,
      serviceType: dto.vendor_info.service_type,
    },
    questions: dto.questions.map(toQuestionInput),
    railsApiCallbackData: dto.callback_data ?? null,
  };
}

@ApiTags('Bids')
@Controller('api/bids')
export class BidsController {
  constructor(private readonly bidInitiationService: BidInitiationService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Start a bid conversation with a vendor' })
  @ApiResponse({ status: 200, description: 'Conversation created and opening email sent' })
  @ApiResponse({ status: 400, description: 'Invalid event, vendor or questions' })
  @ApiResponse({ status: 500, description: 'Conversation could not be saved or the email could not be sent' })
  async initiateBid(@Body() dto: InitiateBidDto): Promise<BidInitiationResponse> {
    return this.bidInitiationService.initiate(toBidInitiationInput(dto));
  }
}
