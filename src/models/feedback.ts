/**
 * Feedback Model
 */

import type { TasteRecord } from './taste-record.js';

export const FEEDBACK_KINDS = ['more', 'less', 'perfect'] as const;
export type Feedback = (typeof FEEDBACK_KINDS)[number];

export function isFeedback(value: string): value is Feedback {
  return (FEEDBACK_KINDS as readonly string[]).includes(value);
}

/**
 * Outcome of a successful feedback write
 */
export interface FeedbackUpdate {
  id: string;
  feedback: Feedback;

  /** Record as written */
  record: TasteRecord;

  /** Record as found before the update */
  previous: TasteRecord;
}

export interface FeedbackOptions {
  namespace?: string;

  /**
   * Require an exact ingredient and cuisine match before ranking by
   * feedback weight. Off by default: the lookup is similarity based.
   */
  exactMatch?: boolean;
}
