/**
 * Prompt templates for vendor bid emails.
 *
 * Every prompt asks Claude for a bare JSON payload so responses can go
 * through parseJsonResponse.
 */

import { Conversation } from '../../conversations/domain/conversation';
import { Question } from '../../conversations/domain/question';

export const OPENING_EMAIL_SYSTEM_PROMPT =
  'You are a professional event planner who writes effective vendor outreach emails.';

export const FOLLOW_UP_EMAIL_SYSTEM_PROMPT =
  'You are a professional event planner writing follow-up emails to vendors.';

export const ANSWER_EXTRACTION_SYSTEM_PROMPT =
  'You are an expert at parsing vendor responses and extracting structured information. Return only valid JSON, with no markdown code fences or commentary.';

/**
 * "1. Text (Required)" with an indented options line, blank line between
 * questions. Used in prompts and in the fallback templates.
 */
export function formatQuestionsForEmail(questions: readonly Question[]): string {
  return questions
    .map((question) => {
      let line = `${question.id}. ${question.text}`;
      if (question.required) {
        line += ' (Required)';
      }
      if (question.options && question.options.length > 0) {
        line += `\n   Options: ${question.options.join(', ')}`;
      }
      return line;
    })
    .join('\n\n');
}

export function formatQuestionsForParsing(questions: readonly Question[]): string {
  const lines: string[] = [];
  for (const question of questions) {
    lines.push(`ID ${question.id}: ${question.text}`);
    if (question.options && question.options.length > 0) {
      lines.push(`   (Options: ${question.options.join(', ')})`);
    }
  }
  return lines.join('\n');
}

export function buildOpeningEmailPrompt(conversation: Conversation): string {
  const { eventMetadata, vendorInfo } = conversation;

  return `Write an email to a vendor requesting pricing and availability information.
Use a conversational, professional but semi-casual tone that makes clear you are representing a client.

<event>
Event Name: ${eventMetadata.name}
Event Type: ${eventMetadata.eventType}
Dates: ${eventMetadata.dates.join(', ')}
Your Name: ${eventMetadata.plannerName}
</event>

<vendor>
Vendor Name: ${vendorInfo.name}
Service Type: ${vendorInfo.serviceType}
</vendor>

<questions>
${formatQuestionsForEmail(conversation.questions)}
</questions>

Requirements:
1. Make it clear you're representing a client
2. Ask all the questions in a natural way
3. Include a clear call to action for a response
4. Be friendly but business-focused
5. Use a compelling, clear subject line

Return a JSON object with this exact schema and nothing else:
{"subject": "...", "body": "..."}`;
}

export function buildFollowUpEmailPrompt(
  conversation: Conversation,
  unanswered: readonly Question[],
): string {
  const { eventMetadata, vendorInfo } = conversation;
  const recent = conversation.emailExchanges.slice(-2);
  const history = recent.length
    ? `\nPrevious email exchange summary:\n${recent
        .map((exchange) => `- ${exchange.direction === 'inbound' ? 'Inbound' : 'Outbound'}: ${exchange.subject}`)
        .join('\n')}\n`
    : '';

  return `You are following up with a vendor who replied to your inquiry but did not answer every question.
Write a polite, professional follow-up email.

Event: ${eventMetadata.name}
Vendor: ${vendorInfo.name}
Service Type: ${vendorInfo.serviceType}
${history}
<unanswered_questions>
${formatQuestionsForEmail(unanswered)}
</unanswered_questions>

Requirements:
1. Thank them for their previous response
2. Politely mention the specific information still needed
3. Keep it brief but complete
4. Include a clear deadline if this is attempt 2 or later

Attempt number: ${conversation.attemptCount + 1}

Return a JSON object with this exact schema and nothing else:
{"subject": "...", "body": "..."}`;
}

export function buildAnswerExtractionPrompt(
  emailBody: string,
  questions: readonly Question[],
): string {
  return `Extract answers to the questions below from a vendor's email reply.

<questions>
${formatQuestionsForParsing(questions)}
</questions>

<vendor_reply>
${emailBody}
</vendor_reply>

Instructions:
1. Look for explicit and implicit answers
2. Match each answer to its question ID
3. Use the vendor's own wording as the answer text
4. Only include answers that are clearly provided

Return a JSON array of objects with "question_id" and "answer" fields, for example:
[{"question_id": 1, "answer": "We have availability for those dates"}, {"question_id": 3, "answer": "$150 per person"}]
Return [] if nothing is answered.`;
}
