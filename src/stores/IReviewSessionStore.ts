/**
 * Review session store interface.
 * Sessions expire a fixed time after creation; expired sessions read as absent.
 */

import type { ReviewSessionSnapshot } from '../services/ReviewSession.js';

export interface IReviewSessionStore {
  get(requestId: string): Promise<ReviewSessionSnapshot | null>;
  /** Insert or replace. Expiry is anchored to the snapshot's `createdAt`. */
  save(snapshot: ReviewSessionSnapshot): Promise<void>;
  delete(requestId: string): Promise<void>;
}
