import * as os from "os";
import * as path from "path";
import * as fsPromises from "fs/promises";
import { expect } from "chai";
import { Clock, ProcessOptions, ProcessResult, ProcessRunner } from "../src/types";

export async function makeTempDir(prefix = "trainer-test-"): Promise<string> {
  return fsPromises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dirPath: string): Promise<void> {
  await fsPromises.rm(dirPath, { recursive: true, force: true });
}

export async function writeFiles(
  dirPath: string,
  files: Record<string, string>
): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fsPromises.writeFile(path.join(dirPath, name), content, "utf-8");
  }
}

export function processResult(partial: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    timedOut: false,
    truncated: false,
    elapsedMs: 1,
    ...partial,
  };
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: ProcessOptions;
}

/**
 * Runner stand-in: "g++" calls go to `compile`, everything else to
 * `execute`, which receives the stdin text
 */
export function fakeRunner(handlers: {
  compile?: (call: RecordedCall) => ProcessResult | Promise<ProcessResult>;
  execute?: (input: string, call: RecordedCall) => ProcessResult | Promise<ProcessResult>;
}): { runner: ProcessRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: ProcessRunner = async (command, args, options) => {
    const call = { command, args, options };
    calls.push(call);
    if (command === "g++") {
      return handlers.compile ? handlers.compile(call) : processResult();
    }
    return handlers.execute
      ? handlers.execute(options.input ?? "", call)
      : processResult({ stdout: options.input ?? "" });
  };
  return { runner, calls };
}

/**
 * Clock whose time the test moves explicitly
 */
export function manualClock(start: Date): { clock: Clock; advance(ms: number): void; set(instant: Date): void } {
  let now = new Date(start.getTime());
  return {
    clock: () => new Date(now.getTime()),
    advance(ms: number) {
      now = new Date(now.getTime() + ms);
    },
    set(instant: Date) {
      now = new Date(instant.getTime());
    },
  };
}

export async function expectRejection<T extends Error>(
  promise: Promise<unknown>,
  errorType: new (...args: never[]) => T
): Promise<T> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(errorType);
    if (error instanceof errorType) return error;
  }
  throw new Error(`Expected promise to reject with ${errorType.name}`);
}
