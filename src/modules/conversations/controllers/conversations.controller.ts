import {
  Controller,
  Get,
  InternalServerErrorException,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ListConversationsQueryDto } from '../dto/list-conversations-query.dto';
import {
  ConversationLoadError,
  ConversationSnapshot,
} from '../interfaces/conversation.interfaces';
import {
  ConversationStoreService,
  ConversationSummary,
  DEFAULT_RECENT_LIMIT,
} from '../services/conversation-store.service';

@ApiTags('Conversations')
@Controller('api/conversations')
export class ConversationsController {
  constructor(private readonly conversationStore: ConversationStoreService) {}

  @Get()
  @ApiOperation({ summary: 'List recent conversations, newest first' })
  @ApiResponse({ status: 200, description: 'Conversation summaries' })
  async listConversations(
    @Query() query: ListConversationsQueryDto,
  ): Promise<{ conversations: ConversationSummary[]; limit: number }> {
    const limit = query.limit ?? DEFAULT_RECENT_LIMIT;
    const conversations = await this.conversationStore.listRecent(limit);
    return { conversations, limit };
  }

  @Get(':conversationId')
  @ApiOperation({ summary: 'Get a conversation with its questions and email history' })
  @ApiParam({ name: 'conversationId', type: 'string', format: 'uuid' })
  @ApiResponse({ status: 200, description: 'Conversation' })
  @ApiResponse({ status: 404, description: 'Conversation not found' })
  @ApiResponse({ status: 500, description: 'Stored conversation is unreadable' })
  @ApiResponse({ status: 503, description: 'Database unavailable' })
  async getConversation(
    @Param('conversationId', ParseUUIDPipe) conversationId: string,
  ): Promise<ConversationSnapshot> {
    const conversation = await this.conversationStore.load(conversationId).catch((error: unknown) => {
      if (!(error instanceof ConversationLoadError)) {
        throw error;
      }
      if (error.reason === 'unavailable') {
        throw new ServiceUnavailableException(`Conversation ${conversationId} could not be loaded`);
      }
      throw new InternalServerErrorException(`Conversation ${conversationId} is unreadable`);
    });
    if (!conversation) {
      throw new NotFoundException(`Conversation ${conversationId} not found`);
    }
    return conversation.toSnapshot();
  }
}
