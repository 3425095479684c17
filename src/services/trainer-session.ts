import { TrainerConfig } from "../config";
import { ProblemNotFoundError, ReviewNotAllowedError } from "../errors";
import {
  Attempt,
  Clock,
  DueReview,
  Problem,
  ProblemStatus,
  ReviewState,
  TrainerRepository,
  Verdict,
} from "../types";
import * as fsUtils from "../utils/fs-utils";
import { systemClock } from "../utils/time";
import { TrainerStore } from "../storage/trainer-store";
import {
  AttemptLedger,
  elapsedSeconds,
  statusFromAttempt,
} from "./attempt-ledger";
import { Rating } from "./review-model";
import { ReviewQueue } from "./review-queue";
import { ReviewScheduler, ScheduledReview } from "./review-scheduler";
import { SampleStore } from "./sample-store";
import { gppToolchain, VerificationHarness } from "./verification-harness";
import { Workspace, WorkspaceManager } from "./workspace-manager";

export interface ProblemSummary {
  problem: Problem;
  status: ProblemStatus;
}

export interface ProblemDetail extends ProblemSummary {
  attempts: Attempt[];
  reviewState?: ReviewState;
}

export interface RunOutcome {
  verdict: Verdict;
  attempt: Attempt;
  status: ProblemStatus;
}

export interface TrainerSessionDeps {
  repository: TrainerRepository;
  workspaces: WorkspaceManager;
  harness: VerificationHarness;
  clock?: Clock;
}

/**
 * Everything the presentation layer needs: browsing problems, preparing a
 * workspace, verifying a solution, rating a solved problem and reading the
 * review queue
 */
export class TrainerSession {
  readonly ledger: AttemptLedger;
  readonly scheduler: ReviewScheduler;
  readonly queue: ReviewQueue;

  private readonly repository: TrainerRepository;
  private readonly workspaces: WorkspaceManager;
  private readonly harness: VerificationHarness;
  private readonly clock: Clock;
  private readonly startTimes = new Map<number, Date>();

  constructor(deps: TrainerSessionDeps) {
    this.repository = deps.repository;
    this.workspaces = deps.workspaces;
    this.harness = deps.harness;
    this.clock = deps.clock ?? systemClock;
    this.ledger = new AttemptLedger(this.repository, this.clock);
    this.scheduler = new ReviewScheduler(this.repository, this.clock);
    this.queue = new ReviewQueue(this.repository, this.clock);
  }

  static fromConfig(config: TrainerConfig): TrainerSession {
    const samples = new SampleStore({ cacheFile: config.samplesFile });
    return new TrainerSession({
      repository: new TrainerStore(config.dataFile),
      workspaces: new WorkspaceManager({
        baseDir: config.workspaceDir,
        samples,
        editor: config.editor,
      }),
      harness: new VerificationHarness({
        toolchain: gppToolchain(config.compiler, config.compileFlags),
        compileTimeoutMs: config.compileTimeoutMs,
        runTimeoutMs: config.runTimeoutMs,
      }),
    });
  }

  async listContests(): Promise<string[]> {
    return this.repository.distinctContests();
  }

  async listProblems(contestId: string): Promise<ProblemSummary[]> {
    const problems = await this.repository.problemsInContest(contestId);
    const summaries: ProblemSummary[] = [];
    for (const problem of problems) {
      summaries.push({
        problem,
        status: await this.ledger.latestStatus(problem.id),
      });
    }
    return summaries;
  }

  async showProblem(problemId: number): Promise<ProblemDetail> {
    const problem = await this.requireProblem(problemId);
    const [attempts, reviewState] = await Promise.all([
      this.ledger.history(problemId),
      this.repository.getReviewState(problemId),
    ]);

    return {
      problem,
      status: statusFromAttempt(attempts[attempts.length - 1]),
      attempts,
      reviewState,
    };
  }

  /**
   * Prepare the workspace and start the clock for this problem
   */
  async openProblem(problemId: number): Promise<Workspace> {
    const problem = await this.requireProblem(problemId);
    const workspace = await this.workspaces.setupWorkspace(problem);

    const startedAt = this.clock();
    this.startTimes.set(problemId, startedAt);
    await this.workspaces.markStarted(problem, startedAt);
    return workspace;
  }

  async editSolution(problemId: number): Promise<void> {
    const problem = await this.requireProblem(problemId);
    await this.workspaces.openEditor(this.workspaces.solutionPath(problem));
  }

  /**
   * Verify the problem's solution and record the attempt. A missing
   * workspace is set up first; missing samples surface as
   * SamplesNotFoundError before anything is run.
   */
  async runProblem(
    problemId: number,
    options: { signal?: AbortSignal } = {}
  ): Promise<RunOutcome> {
    const problem = await this.requireProblem(problemId);

    const solutionPath = this.workspaces.solutionPath(problem);
    if (!(await fsUtils.fileExists(solutionPath))) {
      await this.openProblem(problemId);
    }

    const startedAt =
      this.startTimes.get(problemId) ??
      (await this.workspaces.startedAt(problem)) ??
      this.clock();

    const verdict = await this.harness.run(solutionPath, options);
    const attempt = await this.ledger.record(
      problemId,
      verdict.passed ? "Pass" : "Fail",
      elapsedSeconds(startedAt, this.clock())
    );

    return {
      verdict,
      attempt,
      status: verdict.passed ? "solved" : "attempted",
    };
  }

  /**
   * Apply the learner's recall rating. Only a problem whose latest attempt
   * passed can be rated.
   */
  async rateProblem(problemId: number, rating: Rating): Promise<ScheduledReview> {
    await this.requireProblem(problemId);
    if ((await this.ledger.latestStatus(problemId)) !== "solved") {
      throw new ReviewNotAllowedError(problemId);
    }
    return this.scheduler.rate(problemId, rating);
  }

  async dueReviews(asOf?: Date): Promise<DueReview[]> {
    return this.queue.dueProblems(asOf);
  }

  private async requireProblem(problemId: number): Promise<Problem> {
    const problem = await this.repository.getProblem(problemId);
    if (!problem) throw new ProblemNotFoundError(problemId);
    return problem;
  }
}
