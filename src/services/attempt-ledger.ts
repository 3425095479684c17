import { InvalidAttemptError } from "../errors";
import {
  Attempt,
  AttemptOutcome,
  Clock,
  ProblemStatus,
  TrainerRepository,
} from "../types";
import { systemClock } from "../utils/time";

/**
 * Whole seconds between `startedAt` and `now`, at least 1
 */
export function elapsedSeconds(startedAt: Date, now: Date): number {
  return Math.max(1, Math.floor((now.getTime() - startedAt.getTime()) / 1000));
}

export function statusFromAttempt(attempt: Attempt | undefined): ProblemStatus {
  if (!attempt) return "unsolved";
  return attempt.outcome === "Pass" ? "solved" : "attempted";
}

/**
 * Append-only record of verification runs. Corrections are made by
 * recording a new attempt, never by editing an old one.
 */
export class AttemptLedger {
  constructor(
    private readonly repository: TrainerRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async record(
    problemId: number,
    outcome: AttemptOutcome,
    duration: number
  ): Promise<Attempt> {
    if (!Number.isInteger(duration) || duration < 1) {
      throw new InvalidAttemptError(
        `Attempt duration must be a positive whole number of seconds, got ${duration}`
      );
    }

    // Timestamps never go backwards within a problem's history
    const previous = await this.repository.latestAttempt(problemId);
    const now = this.clock();
    const timestamp =
      previous && previous.timestamp.getTime() > now.getTime()
        ? new Date(previous.timestamp.getTime())
        : now;

    return this.repository.appendAttempt({
      problemId,
      timestamp,
      outcome,
      duration,
    });
  }

  async latestAttempt(problemId: number): Promise<Attempt | undefined> {
    return this.repository.latestAttempt(problemId);
  }

  async latestStatus(problemId: number): Promise<ProblemStatus> {
    return statusFromAttempt(await this.repository.latestAttempt(problemId));
  }

  /**
   * Every attempt for the problem, oldest first
   */
  async history(problemId: number): Promise<Attempt[]> {
    return this.repository.attemptsFor(problemId);
  }
}
