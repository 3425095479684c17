import { Clock, DueReview, TrainerRepository } from "../types";
import { endOfDay, systemClock } from "../utils/time";

/**
 * Problems due for review on or before the calendar day of `asOf`
 * (local time), soonest first
 */
export async function dueProblems(
  repository: TrainerRepository,
  asOf: Date
): Promise<DueReview[]> {
  const due = await repository.reviewStatesDueBy(endOfDay(asOf));
  return [...due].sort(
    (a, b) =>
      a.state.nextReviewDue.getTime() - b.state.nextReviewDue.getTime() ||
      a.problem.id - b.problem.id
  );
}

export class ReviewQueue {
  constructor(
    private readonly repository: TrainerRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async dueProblems(asOf: Date = this.clock()): Promise<DueReview[]> {
    return dueProblems(this.repository, asOf);
  }
}
