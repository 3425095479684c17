import { InvalidRatingError } from "../errors";
import { addDays } from "../utils/time";

/**
 * Learner-reported recall quality after solving a problem again
 */
export enum Rating {
  Again = 1,
  Hard = 2,
  Good = 3,
  Easy = 4,
}

export type RecallRating = Exclude<Rating, Rating.Again>;

export interface RatingPolicy {
  difficultyDelta: number;
  recallBonus: number;
  intervalMultiplier: number;
}

export const RATING_POLICY: Readonly<Record<RecallRating, RatingPolicy>> = {
  [Rating.Hard]: { difficultyDelta: 0.15, recallBonus: 0.9, intervalMultiplier: 1.3 },
  [Rating.Good]: { difficultyDelta: -0.1, recallBonus: 1.2, intervalMultiplier: 2.4 },
  [Rating.Easy]: { difficultyDelta: -0.3, recallBonus: 1.5, intervalMultiplier: 3.2 },
};

export const MIN_STABILITY = 0.1;
export const MIN_DIFFICULTY = 1.0;
export const MAX_DIFFICULTY = 10.0;

// Lapse: stability keeps between 35% and 60% of its value depending on r
const LAPSE_DIFFICULTY_PENALTY = 0.6;
const LAPSE_STABILITY_BASE = 0.35;
const LAPSE_STABILITY_RANGE = 0.25;
const GROWTH_RATE = 0.04;

/**
 * Memory state before a review. Used for the synthetic prior as well.
 */
export interface ReviewPrior {
  stability: number;
  difficulty: number;
}

export const INITIAL_PRIOR: Readonly<ReviewPrior> = {
  stability: 0.5,
  difficulty: 5.0,
};

export interface ReviewUpdate {
  stability: number;
  difficulty: number;
  lastReviewed: Date;
  nextReviewDue: Date;
  intervalDays: number;
  retrievability: number;
}

function clamp(value: number, low: number, high: number): number {
  return Math.max(low, Math.min(high, value));
}

/**
 * Nearest integer, ties to the even neighbour (2.5 -> 2, 3.5 -> 4)
 */
export function roundHalfEven(value: number): number {
  const lower = Math.floor(value);
  const fraction = value - lower;
  if (fraction > 0.5) return lower + 1;
  if (fraction < 0.5) return lower;
  return lower % 2 === 0 ? lower : lower + 1;
}

/**
 * Estimated probability of unprompted recall after `elapsedDays`.
 * 1 at zero elapsed time, decaying towards 0.
 */
export function retrievability(stability: number, elapsedDays: number): number {
  const safeStability = Math.max(stability, MIN_STABILITY);
  const safeDays = Math.max(elapsedDays, 0);
  return 1 / (1 + safeDays / (9 * safeStability));
}

/**
 * Compute the memory state after a rated review
 * @param prior State before the review (INITIAL_PRIOR for a first review)
 * @param rating Learner's recall rating
 * @param elapsedDays Days since the prior review (0 for a first review)
 * @param now Instant of this review
 */
export function updateReview(
  prior: ReviewPrior,
  rating: Rating,
  elapsedDays: number,
  now: Date
): ReviewUpdate {
  const previousStability = Math.max(prior.stability, MIN_STABILITY);
  const previousDifficulty = clamp(prior.difficulty, MIN_DIFFICULTY, MAX_DIFFICULTY);
  const r = retrievability(previousStability, elapsedDays);

  let stability: number;
  let difficulty: number;
  let intervalDays: number;

  if (rating === Rating.Again) {
    difficulty = clamp(
      previousDifficulty + LAPSE_DIFFICULTY_PENALTY * (1 - r),
      MIN_DIFFICULTY,
      MAX_DIFFICULTY
    );
    stability = Math.max(
      MIN_STABILITY,
      previousStability * (LAPSE_STABILITY_BASE + LAPSE_STABILITY_RANGE * r)
    );
    intervalDays = 1;
  } else {
    const policy = RATING_POLICY[rating];
    difficulty = clamp(
      previousDifficulty + policy.difficultyDelta,
      MIN_DIFFICULTY,
      MAX_DIFFICULTY
    );
    const growth =
      1 + (11 - difficulty) * GROWTH_RATE * (1 - r) * policy.recallBonus;
    stability = Math.max(MIN_STABILITY, previousStability * growth);
    intervalDays = Math.max(1, roundHalfEven(stability * policy.intervalMultiplier));
  }

  return {
    stability,
    difficulty,
    lastReviewed: now,
    nextReviewDue: addDays(now, intervalDays),
    intervalDays,
    retrievability: r,
  };
}

const RATING_NAMES = new Map<string, Rating>([
  ["1", Rating.Again],
  ["2", Rating.Hard],
  ["3", Rating.Good],
  ["4", Rating.Easy],
  ["again", Rating.Again],
  ["hard", Rating.Hard],
  ["good", Rating.Good],
  ["easy", Rating.Easy],
]);

/**
 * Accepts 1-4 or again/hard/good/easy (any case)
 */
export function parseRating(value: string | number): Rating {
  const text = String(value).trim().toLowerCase();
  const named = RATING_NAMES.get(text);
  if (named === undefined) throw new InvalidRatingError(value);
  return named;
}
