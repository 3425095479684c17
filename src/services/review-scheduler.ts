import { Clock, ReviewState, TrainerRepository } from "../types";
import { KeyedLock } from "../utils/keyed-lock";
import { elapsedDays, systemClock } from "../utils/time";
import {
  INITIAL_PRIOR,
  Rating,
  ReviewUpdate,
  updateReview,
} from "./review-model";

export interface ScheduledReview {
  state: ReviewState;
  update: ReviewUpdate;
  firstReview: boolean;
}

/**
 * Applies a rating to a problem's stored review state. The read-modify-write
 * is serialized per problem, so two ratings for one problem cannot
 * interleave.
 */
export class ReviewScheduler {
  private readonly problemLocks = new KeyedLock();

  constructor(
    private readonly repository: TrainerRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async rate(problemId: number, rating: Rating): Promise<ScheduledReview> {
    return this.problemLocks.runExclusive(String(problemId), async () => {
      const now = this.clock();
      const existing = await this.repository.getReviewState(problemId);

      const update = existing
        ? updateReview(
            existing,
            rating,
            elapsedDays(existing.lastReviewed, now),
            now
          )
        : updateReview(INITIAL_PRIOR, rating, 0, now);

      const state: ReviewState = {
        problemId,
        stability: update.stability,
        difficulty: update.difficulty,
        lastReviewed: update.lastReviewed,
        nextReviewDue: update.nextReviewDue,
      };
      await this.repository.saveReviewState(state);

      return { state, update, firstReview: existing === undefined };
    });
  }
}
