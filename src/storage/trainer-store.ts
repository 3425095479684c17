import { z } from "zod";
import { StoreCorruptedError } from "../errors";
import {
  Attempt,
  DueReview,
  Problem,
  ReviewState,
  TrainerRepository,
} from "../types";
import * as fsUtils from "../utils/fs-utils";
import { KeyedLock } from "../utils/keyed-lock";

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const problemSchema = z.object({
  id: z.number().int().positive(),
  contestId: z.string().min(1),
  title: z.string().min(1),
  body: z.string(),
});

const attemptSchema = z.object({
  id: z.number().int().positive(),
  problemId: z.number().int().positive(),
  timestamp: isoDate,
  outcome: z.enum(["Pass", "Fail"]),
  duration: z.number().int().positive(),
});

const reviewStateSchema = z.object({
  problemId: z.number().int().positive(),
  stability: z.number().positive(),
  difficulty: z.number().min(1).max(10),
  lastReviewed: isoDate,
  nextReviewDue: isoDate,
});

const storeFileSchema = z.object({
  version: z.literal(1),
  problems: z.array(problemSchema),
  attempts: z.array(attemptSchema),
  reviewStates: z.array(reviewStateSchema),
});

interface StoreData {
  problems: Map<number, Problem>;
  attempts: Attempt[];
  reviewStates: Map<number, ReviewState>;
}

function emptyData(): StoreData {
  return { problems: new Map(), attempts: [], reviewStates: new Map() };
}

function cloneData(data: StoreData): StoreData {
  return {
    problems: new Map(
      Array.from(data.problems, ([id, problem]): [number, Problem] => [
        id,
        { ...problem },
      ])
    ),
    attempts: data.attempts.map(cloneAttempt),
    reviewStates: new Map(
      Array.from(data.reviewStates, ([id, state]): [number, ReviewState] => [
        id,
        cloneReviewState(state),
      ])
    ),
  };
}

/**
 * Trainer persistence backed by a single JSON file. Without a file path
 * everything lives in memory, which is what the tests use.
 */
export class TrainerStore implements TrainerRepository {
  private loading: Promise<StoreData> | undefined;
  private readonly writeLock = new KeyedLock();

  constructor(private readonly filePath?: string) {}

  async saveProblem(
    input: Omit<Problem, "id"> & { id?: number }
  ): Promise<Problem> {
    return this.mutate((data) => {
      const id =
        input.id ?? Math.max(0, ...Array.from(data.problems.keys())) + 1;
      const problem: Problem = {
        id,
        contestId: input.contestId,
        title: input.title,
        body: input.body,
      };
      data.problems.set(id, problem);
      return { ...problem };
    });
  }

  async getProblem(problemId: number): Promise<Problem | undefined> {
    const data = await this.load();
    const problem = data.problems.get(problemId);
    return problem ? { ...problem } : undefined;
  }

  /**
   * Deletes the problem together with its attempts and review state
   */
  async deleteProblem(problemId: number): Promise<boolean> {
    return this.mutate((data) => {
      if (!data.problems.delete(problemId)) return false;
      data.attempts = data.attempts.filter(
        (attempt) => attempt.problemId !== problemId
      );
      data.reviewStates.delete(problemId);
      return true;
    });
  }

  async distinctContests(): Promise<string[]> {
    const data = await this.load();
    const contests = new Set(
      Array.from(data.problems.values()).map((problem) => problem.contestId)
    );
    return Array.from(contests).sort();
  }

  async problemsInContest(contestId: string): Promise<Problem[]> {
    const data = await this.load();
    return Array.from(data.problems.values())
      .filter((problem) => problem.contestId === contestId)
      .sort((a, b) => a.id - b.id)
      .map((problem) => ({ ...problem }));
  }

  async appendAttempt(input: Omit<Attempt, "id">): Promise<Attempt> {
    return this.mutate((data) => {
      const id =
        data.attempts.reduce((max, attempt) => Math.max(max, attempt.id), 0) + 1;
      const attempt: Attempt = { ...input, id, timestamp: new Date(input.timestamp) };
      data.attempts.push(attempt);
      return cloneAttempt(attempt);
    });
  }

  async attemptsFor(problemId: number): Promise<Attempt[]> {
    const data = await this.load();
    return data.attempts
      .filter((attempt) => attempt.problemId === problemId)
      .sort(compareAttempts)
      .map(cloneAttempt);
  }

  async latestAttempt(problemId: number): Promise<Attempt | undefined> {
    const attempts = await this.attemptsFor(problemId);
    return attempts[attempts.length - 1];
  }

  async getReviewState(problemId: number): Promise<ReviewState | undefined> {
    const data = await this.load();
    const state = data.reviewStates.get(problemId);
    return state ? cloneReviewState(state) : undefined;
  }

  async saveReviewState(state: ReviewState): Promise<void> {
    await this.mutate((data) => {
      data.reviewStates.set(state.problemId, cloneReviewState(state));
    });
  }

  /**
   * Problems whose review is due at or before `instant`, soonest first and
   * by problem id on ties
   */
  async reviewStatesDueBy(instant: Date): Promise<DueReview[]> {
    const data = await this.load();
    const due: DueReview[] = [];

    for (const state of data.reviewStates.values()) {
      const problem = data.problems.get(state.problemId);
      if (!problem) continue;
      if (state.nextReviewDue.getTime() <= instant.getTime()) {
        due.push({ problem: { ...problem }, state: cloneReviewState(state) });
      }
    }

    return due.sort(
      (a, b) =>
        a.state.nextReviewDue.getTime() - b.state.nextReviewDue.getTime() ||
        a.problem.id - b.problem.id
    );
  }

  /**
   * Apply `change` to a copy of the data; the copy replaces the cached data
   * only once it has been written
   */
  private async mutate<T>(change: (data: StoreData) => T): Promise<T> {
    return this.writeLock.runExclusive("store", async () => {
      const draft = cloneData(await this.load());
      const result = change(draft);
      await this.persist(draft);
      this.loading = Promise.resolve(draft);
      return result;
    });
  }

  private load(): Promise<StoreData> {
    if (!this.loading) {
      this.loading = this.readStoreFile().catch((error: unknown) => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  private async readStoreFile(): Promise<StoreData> {
    const filePath = this.filePath;
    if (!filePath || !(await fsUtils.fileExists(filePath))) {
      return emptyData();
    }

    const raw = await fsUtils.readFile(filePath);
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreCorruptedError(
        filePath,
        error instanceof Error ? error.message : String(error)
      );
    }

    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreCorruptedError(
        filePath,
        parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")
      );
    }

    return {
      problems: new Map(parsed.data.problems.map((p) => [p.id, p])),
      attempts: parsed.data.attempts,
      reviewStates: new Map(
        parsed.data.reviewStates.map((state) => [state.problemId, state])
      ),
    };
  }

  private async persist(data: StoreData): Promise<void> {
    if (!this.filePath) return;

    const payload = {
      version: 1,
      problems: Array.from(data.problems.values()),
      attempts: data.attempts.map((attempt) => ({
        ...attempt,
        timestamp: attempt.timestamp.toISOString(),
      })),
      reviewStates: Array.from(data.reviewStates.values()).map((state) => ({
        ...state,
        lastReviewed: state.lastReviewed.toISOString(),
        nextReviewDue: state.nextReviewDue.toISOString(),
      })),
    };
    await fsUtils.writeFileAtomic(
      this.filePath,
      JSON.stringify(payload, null, 2)
    );
  }
}

function compareAttempts(a: Attempt, b: Attempt): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;
}

function cloneAttempt(attempt: Attempt): Attempt {
  return { ...attempt, timestamp: new Date(attempt.timestamp.getTime()) };
}

function cloneReviewState(state: ReviewState): ReviewState {
  return {
    ...state,
    lastReviewed: new Date(state.lastReviewed.getTime()),
    nextReviewDue: new Date(state.nextReviewDue.getTime()),
  };
}
