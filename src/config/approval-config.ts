/**
 * Approval threshold configuration.
 *
 * Loaded once at start-up and handed to the review service; the object is
 * frozen so every call sees the same threshold.
 */

export interface ApprovalConfiguration {
  /** Number of approvals at which a review counts as approved */
  readonly minCount: number;
}

export function loadApprovalConfiguration(minCount: number): ApprovalConfiguration {
  if (!Number.isInteger(minCount) || minCount < 1) {
    throw new Error(`Invalid approval threshold: ${minCount} (expected an integer >= 1)`);
  }
  return Object.freeze({ minCount });
}
