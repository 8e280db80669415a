/**
 * Reviewer feedback store interface.
 * Append-only record of the corrections reviewers applied, oldest first.
 */

export interface FeedbackRecord {
  /** ISO-8601 timestamp. */
  timestamp: string;
  requestId: string;
  dishName: string;
  humanLabel: boolean;
  feedbackType: 'hitl_correction';
}

export interface IFeedbackStore {
  append(records: readonly FeedbackRecord[]): Promise<void>;
  list(): Promise<FeedbackRecord[]>;
}
