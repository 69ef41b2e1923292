/**
 * Review Types
 */

import { Pos } from '../pos/types';
import { User } from '../users/types';

export interface Review {
  /** `null` until the store has persisted the review */
  id: number | null;
  createdAt?: string;
  updatedAt?: string;
  pos: Pos;
  author: User;
  review: string;
  approvalCount: number;
  /** Derived from approvalCount; only the review service recomputes it */
  approved: boolean;
}

/** A review as submitted: the POS is a reference the service resolves */
export type ReviewInput = Omit<Review, 'pos'> & { pos: Pick<Pos, 'id'> };

/**
 * Persistence port for reviews.
 *
 * `upsert` enforces one review per (author, POS) atomically: a write that
 * would give a second review the same pair rejects with ValidationError,
 * even when two creates race past the service's own check.
 *
 * Otherwise `upsert` is last-write-wins per review id. Two concurrent
 * approvals of the same review both read the old count, so one increment can
 * be lost unless the implementation serializes writes to that id.
 */
export interface ReviewStore {
  getAll(): Promise<Review[]>;
  /** Rejects with NotFoundError when no review has this id */
  getById(id: number): Promise<Review>;
  /**
   * Assigns id and timestamps when `review.id` is null; otherwise overwrites
   * (NotFoundError if unknown). Rejects with ValidationError on a duplicate
   * (author, POS) pair.
   */
  upsert(review: Review): Promise<Review>;
  delete(id: number): Promise<void>;
  filterByApproval(pos: Pos, approved: boolean): Promise<Review[]>;
  filterByAuthor(pos: Pos, author: User): Promise<Review[]>;
}
