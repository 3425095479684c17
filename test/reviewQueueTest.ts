import { expect } from "chai";
import { dueProblems, ReviewQueue } from "../src/services/review-queue";
import { TrainerStore } from "../src/storage/trainer-store";
import { fixedClock } from "../src/utils/time";

// All instants in local time: the queue works on local calendar days
const TODAY_NOON = new Date(2026, 6, 15, 12, 0, 0, 0);

async function seed(store: TrainerStore, title: string, due: Date): Promise<number> {
  const problem = await store.saveProblem({ contestId: "abc200", title, body: "" });
  await store.saveReviewState({
    problemId: problem.id,
    stability: 1,
    difficulty: 5,
    lastReviewed: new Date(due.getTime() - 86_400_000),
    nextReviewDue: due,
  });
  return problem.id;
}

describe("review queue", () => {
  let store: TrainerStore;

  beforeEach(() => {
    store = new TrainerStore();
  });

  it("should include overdue problems and exclude those due tomorrow", async () => {
    const overdue = await seed(store, "Overdue", new Date(2026, 6, 14, 23, 59));
    await seed(store, "Tomorrow", new Date(2026, 6, 16, 0, 1));

    const due = await dueProblems(store, TODAY_NOON);
    expect(due.map((entry) => entry.problem.id)).to.deep.equal([overdue]);
  });

  it("should count anything due later today as due", async () => {
    const lastMoment = await seed(store, "Late", new Date(2026, 6, 15, 23, 59, 59, 999));
    await seed(store, "Midnight", new Date(2026, 6, 16, 0, 0, 0, 0));

    const due = await dueProblems(store, TODAY_NOON);
    expect(due.map((entry) => entry.problem.title)).to.deep.equal(["Late"]);
    expect(due[0].problem.id).to.equal(lastMoment);
  });

  it("should order by due date, then by problem id", async () => {
    const sameTime = new Date(2026, 6, 10, 9, 0);
    const b = await seed(store, "B", new Date(2026, 6, 12, 9, 0));
    const a1 = await seed(store, "A1", sameTime);
    const a2 = await seed(store, "A2", sameTime);

    const due = await dueProblems(store, TODAY_NOON);
    expect(due.map((entry) => entry.problem.id)).to.deep.equal([a1, a2, b]);
  });

  it("should return nothing when no problem has been rated", async () => {
    await store.saveProblem({ contestId: "abc200", title: "Fresh", body: "" });
    expect(await dueProblems(store, TODAY_NOON)).to.deep.equal([]);
  });

  it("should default to the clock's day", async () => {
    await seed(store, "Overdue", new Date(2026, 6, 14, 8, 0));
    const queue = new ReviewQueue(store, fixedClock(new Date(2026, 6, 13, 12, 0)));

    expect(await queue.dueProblems()).to.deep.equal([]);
    expect(await queue.dueProblems(TODAY_NOON)).to.have.length(1);
  });
});
