import { DueReview, ProblemStatus, Verdict } from "../types";
import { ProblemDetail, ProblemSummary } from "../services/trainer-session";
import { ScheduledReview } from "../services/review-scheduler";
import { Rating } from "../services/review-model";
import { formatDate } from "../utils/time";

const STATUS_ICONS: Record<ProblemStatus, string> = {
  solved: "✅",
  attempted: "🟡",
  unsolved: "⚪",
};

export function statusIcon(status: ProblemStatus): string {
  return STATUS_ICONS[status];
}

/**
 * Title plus body text for a verdict
 */
export function formatVerdict(verdict: Verdict): string {
  const title = verdict.passed ? "✅ Tests Passed" : "❌ Tests Failed";
  const body = verdict.diagnostics || "All tests passed.";
  return `${title}\n\n${body}`;
}

export function printVerdict(verdict: Verdict): void {
  console.log(`\n${formatVerdict(verdict)}`);

  if (verdict.cases.length > 0) {
    const passedCount = verdict.cases.filter((c) => c.status === "passed").length;
    console.log(
      `\n${passedCount}/${verdict.cases.length} test case(s) passed`
    );
  }
}

export function formatProblemLine(summary: ProblemSummary): string {
  return `${statusIcon(summary.status)} [${summary.problem.id}] ${summary.problem.title}`;
}

export function printProblemList(
  contestId: string,
  summaries: ProblemSummary[]
): void {
  console.log(`\n=== ${contestId} ===`);
  if (summaries.length === 0) {
    console.log("No problems found for this contest.");
    return;
  }
  summaries.forEach((summary) => console.log(formatProblemLine(summary)));
}

export function formatDueLine(entry: DueReview): string {
  return `${entry.problem.contestId} • ${entry.problem.title} (due ${formatDate(
    entry.state.nextReviewDue
  )})`;
}

export function printReviewQueue(asOf: Date, due: DueReview[]): void {
  console.log(`\n=== Problems due for review (${formatDate(asOf)}) ===`);
  if (due.length === 0) {
    console.log("No problems due today.");
    return;
  }
  due.forEach((entry) => console.log(`- [${entry.problem.id}] ${formatDueLine(entry)}`));
}

export function printProblemDetail(detail: ProblemDetail): void {
  const { problem, status, attempts, reviewState } = detail;
  console.log(`\n## ${problem.title}`);
  console.log(`Contest: ${problem.contestId}`);
  console.log(`Status: ${statusIcon(status)} ${status}`);
  console.log(`Attempts: ${attempts.length}`);

  if (reviewState) {
    console.log(`Stability: ${reviewState.stability.toFixed(2)}`);
    console.log(`Difficulty: ${reviewState.difficulty.toFixed(2)}`);
    console.log(`Next review: ${formatDate(reviewState.nextReviewDue)}`);
  }

  if (problem.body.trim() !== "") {
    console.log(`\n${problem.body}`);
  }
}

export function printScheduledReview(
  rating: Rating,
  scheduled: ScheduledReview
): void {
  const { update } = scheduled;
  console.log(
    `Rated ${Rating[rating]}: next review in ${update.intervalDays} day(s) on ${formatDate(
      update.nextReviewDue
    )} (stability ${update.stability.toFixed(2)}, difficulty ${update.difficulty.toFixed(2)})`
  );
}
