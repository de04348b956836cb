import {
  ConversationValidationError,
  QuestionInput,
  QuestionSnapshot,
} from '../interfaces/conversation.interfaces';

/**
 * A single question put to the vendor.
 *
 * Text, requirement flag, options and sub-questions are fixed at
 * construction. Only the answer state changes afterwards, and only
 * through recordAnswer(). Options are display hints; answers are never
 * checked against them.
 */
export class Question {
  readonly id: number;
  readonly text: string;
  readonly required: boolean;
  readonly options: readonly string[] | null;
  readonly subQuestions: readonly Question[] | null;
  private currentAnswer: string | null;
  private isAnswered: boolean;

  constructor(input: QuestionInput) {
    if (!Number.isInteger(input.id)) {
      throw new ConversationValidationError(
        `Question id must be an integer, got ${String(input.id)}`,
      );
    }
    if (typeof input.text !== 'string' || input.text.trim() === '') {
      throw new ConversationValidationError(
        `Question ${input.id} is missing its text`,
      );
    }

    const answer = input.answer ?? null;
    const answered = input.answered ?? false;
    if (answered && answer === null) {
      throw new ConversationValidationError(
        `Question ${input.id} is marked answered but has no answer`,
      );
    }

    this.id = input.id;
    this.text = input.text;
    this.required = input.required ?? false;
    this.options = input.options ? Object.freeze([...input.options]) : null;
    this.subQuestions = input.subQuestions
      ? Object.freeze(input.subQuestions.map((sub) => new Question(sub)))
      : null;
    this.currentAnswer = answer;
    this.isAnswered = answered;
  }

  get answer(): string | null {
    return this.currentAnswer;
  }

  get answered(): boolean {
    return this.isAnswered;
  }

  /**
   * Last write wins; an answered question never reverts.
   */
  recordAnswer(answer: string): void {
    this.currentAnswer = answer;
    this.isAnswered = true;
  }

  toSnapshot(): QuestionSnapshot {
    return {
      id: this.id,
      text: this.text,
      required: this.required,
      options: this.options ? [...this.options] : null,
      subQuestions: this.subQuestions
        ? this.subQuestions.map((sub) => sub.toSnapshot())
        : null,
      answer: this.currentAnswer,
      answered: this.isAnswered,
    };
  }
}
