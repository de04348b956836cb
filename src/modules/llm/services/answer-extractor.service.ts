import { Injectable, Logger } from '@nestjs/common';
import { Question } from '../../conversations/domain/question';
import { ClaudeApiService } from './claude-api.service';
import { parseJsonResponse } from './parse-json-response.util';
import { ExtractedAnswer } from '../interfaces/claude-api.interfaces';
import {
  ANSWER_EXTRACTION_SYSTEM_PROMPT,
  buildAnswerExtractionPrompt,
} from '../prompts/bid-email.prompts';

function toQuestionId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return null;
}

function toExtractedAnswer(item: unknown): ExtractedAnswer | null {
  if (typeof item !== 'object' || item === null) {
    return null;
  }
  const questionId = toQuestionId('question_id' in item ? item.question_id : undefined);
  const answer = 'answer' in item ? item.answer : undefined;
  if (questionId === null || typeof answer !== 'string' || answer.trim() === '') {
    return null;
  }
  return { questionId, answer: answer.trim() };
}

/**
 * AnswerExtractorService
 *
 * Pulls (question id, answer) pairs out of a vendor reply. "Nothing
 * answered" and malformed model output both come back as []; Claude API
 * failures propagate.
 */
@Injectable()
export class AnswerExtractorService {
  private readonly logger = new Logger(AnswerExtractorService.name);

  constructor(private readonly claudeApiService: ClaudeApiService) {}

  async extract(
    emailBody: string,
    questions: readonly Question[],
  ): Promise<ExtractedAnswer[]> {
    if (emailBody.trim() === '' || questions.length === 0) {
      return [];
    }

    const response = await this.claudeApiService.sendMessage({
      systemPrompt: ANSWER_EXTRACTION_SYSTEM_PROMPT,
      userPrompt: buildAnswerExtractionPrompt(emailBody, questions),
      maxTokens: 1000,
      temperature: 0.3,
    });

    const parsed = parseJsonResponse(response);
    if (!Array.isArray(parsed)) {
      this.logger.warn('Answer extraction returned no JSON array, treating as no answers');
      return [];
    }

    const answers: ExtractedAnswer[] = [];
    for (const item of parsed) {
      const extracted = toExtractedAnswer(item);
      if (extracted) {
        answers.push(extracted);
      } else {
        this.logger.debug(`Skipping malformed extracted answer: ${JSON.stringify(item)}`);
      }
    }
    return answers;
  }
}
