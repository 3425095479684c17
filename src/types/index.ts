/**
 * A practice problem as stored by the trainer
 */
export interface Problem {
  id: number;
  contestId: string;
  title: string;
  body: string;
}

/**
 * One sample test: input fed to stdin and the expected stdout
 */
export interface TestCase {
  input: string;
  output: string;
}

export type AttemptOutcome = "Pass" | "Fail";

/**
 * Immutable record of a single verification run
 */
export interface Attempt {
  id: number;
  problemId: number;
  timestamp: Date;
  outcome: AttemptOutcome;
  duration: number; // seconds, >= 1
}

export type ProblemStatus = "unsolved" | "attempted" | "solved";

/**
 * Memory-strength state kept for every problem that has been rated at least once
 */
export interface ReviewState {
  problemId: number;
  stability: number;
  difficulty: number;
  lastReviewed: Date;
  nextReviewDue: Date;
}

export interface DueReview {
  problem: Problem;
  state: ReviewState;
}

/**
 * Source of "now". Injected wherever the current time matters.
 */
export type Clock = () => Date;

/**
 * Result of a single subprocess invocation
 */
export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean; // output hit MAX_CAPTURED_OUTPUT bytes
  elapsedMs: number;
}

export interface ProcessOptions {
  input?: string;
  timeoutMs: number;
  cwd?: string;
  signal?: AbortSignal;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options: ProcessOptions
) => Promise<ProcessResult>;

export type CaseStatus =
  | "passed"
  | "missing-output"
  | "runtime-error"
  | "timeout"
  | "wrong-answer";

/**
 * Outcome of one test case inside a verification run
 */
export interface CaseResult {
  name: string;
  status: CaseStatus;
  diagnostic?: string;
  elapsedMs: number;
}

/**
 * Aggregate verdict of a verification run
 */
export interface Verdict {
  passed: boolean;
  diagnostics: string;
  cases: CaseResult[];
}

/**
 * Persistence collaborator. Attempts and review states belong to their
 * problem and disappear with it.
 */
export interface TrainerRepository {
  saveProblem(problem: Omit<Problem, "id"> & { id?: number }): Promise<Problem>;
  getProblem(problemId: number): Promise<Problem | undefined>;
  deleteProblem(problemId: number): Promise<boolean>;
  distinctContests(): Promise<string[]>;
  problemsInContest(contestId: string): Promise<Problem[]>;

  appendAttempt(attempt: Omit<Attempt, "id">): Promise<Attempt>;
  attemptsFor(problemId: number): Promise<Attempt[]>;
  latestAttempt(problemId: number): Promise<Attempt | undefined>;

  getReviewState(problemId: number): Promise<ReviewState | undefined>;
  saveReviewState(state: ReviewState): Promise<void>;
  reviewStatesDueBy(instant: Date): Promise<DueReview[]>;
}
