/**
 * Fixed templates used when Claude is unavailable or returns something
 * unusable. Always produce a non-empty subject and body.
 */

import { Conversation } from '../../conversations/domain/conversation';
import { Question } from '../../conversations/domain/question';
import { ComposedEmail } from '../interfaces/claude-api.interfaces';
import { formatQuestionsForEmail } from './bid-email.prompts';

export function buildFallbackOpeningEmail(conversation: Conversation): ComposedEmail {
  const { eventMetadata, vendorInfo } = conversation;

  return {
    subject: `Pricing Inquiry for ${eventMetadata.name} - ${eventMetadata.eventType}`,
    body: `Hi ${vendorInfo.name},

I hope this email finds you well. I'm ${eventMetadata.plannerName}, and I'm working with a client to plan their upcoming ${eventMetadata.eventType} called "${eventMetadata.name}" scheduled for ${eventMetadata.dates.join(', ')}.

We're exploring ${vendorInfo.serviceType} options and would love to discuss how you might be able to support this event. Could you please provide information on the following:

${formatQuestionsForEmail(conversation.questions)}

Thank you for your time, and I look forward to hearing from you soon!

Best regards,
${eventMetadata.plannerName}
${eventMetadata.plannerEmail}`,
  };
}

export function buildFallbackFollowUpEmail(
  conversation: Conversation,
  unanswered: readonly Question[],
): ComposedEmail {
  const { eventMetadata, vendorInfo } = conversation;

  return {
    subject: `Follow-up: ${eventMetadata.name} - Additional Information Needed`,
    body: `Hi ${vendorInfo.name},

Thank you for your response regarding ${eventMetadata.name}.

To complete our evaluation, I still need a few additional details:

${formatQuestionsForEmail(unanswered)}

I'd appreciate your response when you have a chance.

Best regards,
${eventMetadata.plannerName}`,
  };
}
