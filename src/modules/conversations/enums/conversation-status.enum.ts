/**
 * Lifecycle states of a vendor bid conversation.
 */
export enum ConversationStatus {
  INITIATED = 'initiated',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * Valid status transitions.
 * Key: current status, Value: statuses it may move to.
 */
export const VALID_STATUS_TRANSITIONS: Record<
  ConversationStatus,
  ConversationStatus[]
> = {
  [ConversationStatus.INITIATED]: [
    ConversationStatus.IN_PROGRESS,
    ConversationStatus.FAILED,
  ],
  [ConversationStatus.IN_PROGRESS]: [
    ConversationStatus.COMPLETED,
    ConversationStatus.FAILED,
  ],
  [ConversationStatus.COMPLETED]: [],
  [ConversationStatus.FAILED]: [],
};

/**
 * Statuses after which inbound replies are ignored.
 */
export const TERMINAL_STATUSES: ConversationStatus[] = [
  ConversationStatus.COMPLETED,
  ConversationStatus.FAILED,
];

export function isConversationStatus(value: unknown): value is ConversationStatus {
  return (
    typeof value === 'string' &&
    Object.values(ConversationStatus).some((status) => status === value)
  );
}
