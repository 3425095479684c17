#!/usr/bin/env node
import * as readline from "readline/promises";
import { loadConfig } from "./config";
import { TrainerError, VerificationCancelledError } from "./errors";
import {
  printProblemDetail,
  printProblemList,
  printReviewQueue,
  printScheduledReview,
  printVerdict,
} from "./reporters/console-reporter";
import { importProblems } from "./services/problem-importer";
import { parseRating, Rating } from "./services/review-model";
import { RunOutcome, TrainerSession } from "./services/trainer-session";
import { TrainerStore } from "./storage/trainer-store";
import { parseDate } from "./utils/time";

const USAGE = `Usage: trainer <command>

Commands:
  import <file.csv>                 Import problems (contest,title,body[,id])
  contests                          List contests
  problems <contest>                List problems of a contest with status
  show <problemId>                  Show a problem with its review state
  open <problemId> [--no-editor]    Prepare the workspace and open the editor
  run <problemId> [--rating=<1-4>]  Verify the solution and record the attempt
  review [--date=YYYY-MM-DD]        List problems due for review`;

function findOption(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const match = args.find((arg) => arg.startsWith(prefix));
  return match === undefined ? undefined : match.slice(prefix.length);
}

function parseProblemId(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const id = Number(value);
  return id > 0 ? id : undefined;
}

/**
 * Ask for a rating on an interactive terminal; empty input skips
 */
async function promptRating(): Promise<Rating | undefined> {
  if (!process.stdin.isTTY) return undefined;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    while (true) {
      const answer = (
        await rl.question("Perceived difficulty 1-4 (1=Again, 2=Hard, 3=Good, 4=Easy, empty to skip): ")
      ).trim();
      if (answer === "") return undefined;
      try {
        return parseRating(answer);
      } catch (error) {
        if (!(error instanceof TrainerError)) throw error;
        console.warn(error.message);
      }
    }
  } finally {
    rl.close();
  }
}

/**
 * Run the verification; Ctrl+C kills the running subprocess and discards
 * the partial result
 */
async function verifyWithInterrupt(
  session: TrainerSession,
  problemId: number
): Promise<RunOutcome | undefined> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    return await session.runProblem(problemId, { signal: controller.signal });
  } catch (error) {
    if (error instanceof VerificationCancelledError) {
      console.warn(error.message);
      return undefined;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function runCommand(
  session: TrainerSession,
  problemId: number,
  args: string[]
): Promise<number> {
  const ratingArg = findOption(args, "rating");
  const presetRating =
    ratingArg === undefined ? undefined : parseRating(ratingArg);

  const outcome = await verifyWithInterrupt(session, problemId);
  if (!outcome) return 130;

  printVerdict(outcome.verdict);
  console.log(`Attempt recorded (${outcome.attempt.duration}s)`);

  if (!outcome.verdict.passed) return 1;

  const rating = presetRating ?? (await promptRating());
  if (rating === undefined) {
    console.log("Skipped rating; review schedule unchanged.");
    return 0;
  }

  printScheduledReview(rating, await session.rateProblem(problemId, rating));
  return 0;
}

/**
 * Entry point for the command line
 * @returns Process exit code
 */
export async function runCli(args: string[]): Promise<number> {
  const [command, ...rest] = args;
  const config = loadConfig();

  if (command === "import") {
    const csvPath = rest[0];
    if (!csvPath) {
      console.error(USAGE);
      return 1;
    }
    const result = await importProblems(csvPath, new TrainerStore(config.dataFile));
    return result.skipped.length > 0 ? 1 : 0;
  }

  const session = TrainerSession.fromConfig(config);

  switch (command) {
    case "contests": {
      const contests = await session.listContests();
      if (contests.length === 0) console.log("No training data available.");
      contests.forEach((contest) => console.log(contest));
      return 0;
    }
    case "problems": {
      const contestId = rest[0];
      if (!contestId) break;
      printProblemList(contestId, await session.listProblems(contestId));
      return 0;
    }
    case "show": {
      const problemId = parseProblemId(rest[0]);
      if (problemId === undefined) break;
      printProblemDetail(await session.showProblem(problemId));
      return 0;
    }
    case "open": {
      const problemId = parseProblemId(rest[0]);
      if (problemId === undefined) break;
      const workspace = await session.openProblem(problemId);
      if (!rest.includes("--no-editor")) {
        await session.editSolution(problemId);
      } else {
        console.log(workspace.solutionPath);
      }
      return 0;
    }
    case "run": {
      const problemId = parseProblemId(rest[0]);
      if (problemId === undefined) break;
      return runCommand(session, problemId, rest);
    }
    case "review": {
      const dateArg = findOption(rest, "date");
      const asOf = dateArg === undefined ? new Date() : parseDate(dateArg);
      if (!asOf) {
        console.error(`Invalid date "${dateArg}", expected YYYY-MM-DD`);
        return 1;
      }
      printReviewQueue(asOf, await session.dueReviews(asOf));
      return 0;
    }
  }

  console.error(USAGE);
  return 1;
}

// Run the trainer if this file is executed directly
if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      if (error instanceof TrainerError) {
        console.error(error.message);
      } else {
        console.error("Error running trainer:", error);
      }
      process.exit(1);
    });
}
