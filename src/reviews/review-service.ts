/**
 * Review Service
 *
 * Owns the review lifecycle: one review per author and POS, approvals by
 * users other than the author, and the approved flag derived from the
 * configured threshold. Stateless; all state lives behind the store ports.
 */

import { Review, ReviewInput, ReviewStore } from './types';
import { UserStore } from '../users/types';
import { PosStore } from '../pos/types';
import { ApprovalConfiguration } from '../config/approval-config';
import { NotFoundError, ValidationError, duplicateReviewError } from '../common/errors';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'review-service' });

export class ReviewService {
  constructor(
    private readonly reviewStore: ReviewStore,
    private readonly userStore: UserStore,
    private readonly posStore: PosStore,
    private readonly approvalConfiguration: ApprovalConfiguration,
  ) {}

  async getAll(): Promise<Review[]> {
    return this.reviewStore.getAll();
  }

  async getById(id: number): Promise<Review> {
    return this.reviewStore.getById(id);
  }

  async delete(id: number): Promise<void> {
    await this.reviewStore.delete(id);
    log.info({ reviewId: id }, 'Review deleted');
  }

  /**
   * Create or update a review. The POS must exist, and a new review is
   * rejected when its author already reviewed that POS. The review is stored
   * with the POS as loaded from the POS store.
   */
  async upsert(review: ReviewInput): Promise<Review> {
    const pos = await this.posStore.getById(review.pos.id);

    if (review.id === null) {
      const existing = await this.reviewStore.filterByAuthor(pos, review.author);
      if (existing.length > 0) {
        log.warn({ authorId: review.author.id, posId: pos.id }, 'Duplicate review rejected');
        throw duplicateReviewError(review.author.id, pos.id);
      }
    }

    const saved = await this.reviewStore.upsert({ ...review, pos });
    log.info({ reviewId: saved.id, posId: pos.id, authorId: saved.author.id }, 'Review saved');
    return saved;
  }

  /**
   * Record one approval by `approverUserId`. Only the id of `review` is
   * used; the count is taken from the persisted review.
   */
  async approve(review: Pick<Review, 'id'>, approverUserId: number): Promise<Review> {
    const approver = await this.userStore.getById(approverUserId);
    if (review.id === null) {
      throw new NotFoundError('Review', null);
    }
    const persisted = await this.reviewStore.getById(review.id);

    if (approver.id === persisted.author.id) {
      log.warn({ reviewId: persisted.id, userId: approver.id }, 'Self-approval rejected');
      throw new ValidationError('Users cannot approve their own reviews.');
    }

    const updated = this.updateApprovalStatus({
      ...persisted,
      approvalCount: persisted.approvalCount + 1,
    });
    const saved = await this.reviewStore.upsert(updated);

    log.info({
      reviewId: saved.id,
      approverId: approver.id,
      approvalCount: saved.approvalCount,
      approved: saved.approved,
    }, 'Review approved');

    return saved;
  }

  /** Reviews of a POS with the given approval state, in store order */
  async filter(posId: number, approved: boolean): Promise<Review[]> {
    const pos = await this.posStore.getById(posId);
    return this.reviewStore.filterByApproval(pos, approved);
  }

  /** Returns a copy with `approved` recomputed from `approvalCount` */
  updateApprovalStatus(review: Review): Review {
    return {
      ...review,
      approved: review.approvalCount >= this.approvalConfiguration.minCount,
    };
  }
}
