/**
 * Base class for every error the trainer raises on purpose
 */
export class TrainerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * No cached samples exist for the requested problem. The workspace cannot
 * be seeded, so the harness must not be invoked.
 */
export class SamplesNotFoundError extends TrainerError {
  constructor(
    public readonly contestId: string,
    public readonly problemId: string
  ) {
    super(
      `No cached samples found for contest='${contestId}', problem_id='${problemId}'.`
    );
  }
}

export class ProblemNotFoundError extends TrainerError {
  constructor(public readonly problemId: number) {
    super(`Problem ${problemId} does not exist`);
  }
}

export class InvalidAttemptError extends TrainerError {}

export class ConfigurationError extends TrainerError {
  constructor(detail: string) {
    super(`Invalid trainer configuration: ${detail}`);
  }
}

export class InvalidRatingError extends TrainerError {
  constructor(public readonly value: string | number) {
    super(
      `Invalid rating "${value}". Use 1-4 (1=Again, 2=Hard, 3=Good, 4=Easy)`
    );
  }
}

export class ReviewNotAllowedError extends TrainerError {
  constructor(public readonly problemId: number) {
    super(`Problem ${problemId} has no passing attempt to rate`);
  }
}

export class StoreCorruptedError extends TrainerError {
  constructor(public readonly filePath: string, detail: string) {
    super(`Trainer data at ${filePath} is unreadable: ${detail}`);
  }
}

export class VerificationCancelledError extends TrainerError {
  constructor(solutionPath: string) {
    super(`Verification of ${solutionPath} was cancelled`);
  }
}
