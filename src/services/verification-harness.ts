import * as path from "path";
import {
  BINARY_FILENAME,
  DEFAULT_COMPILE_FLAGS,
  DEFAULT_COMPILE_TIMEOUT_MS,
  DEFAULT_COMPILER,
  DEFAULT_RUN_TIMEOUT_MS,
  INPUT_EXTENSION,
  MAX_CAPTURED_OUTPUT,
  OUTPUT_EXTENSION,
} from "../constants";
import { VerificationCancelledError } from "../errors";
import {
  CaseResult,
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
  Verdict,
} from "../types";
import * as fsUtils from "../utils/fs-utils";
import { KeyedLock } from "../utils/keyed-lock";
import { outputsMatch } from "./output-normalizer";
import { runProcess } from "./process-runner";

export interface CommandSpec {
  command: string;
  args: string[];
}

/**
 * How a solution is turned into something runnable and how it is run
 */
export interface Toolchain {
  compile(sourcePath: string, binaryPath: string): CommandSpec;
  execute(binaryPath: string): CommandSpec;
}

export function gppToolchain(
  compiler: string = DEFAULT_COMPILER,
  flags: string[] = DEFAULT_COMPILE_FLAGS
): Toolchain {
  return {
    compile: (sourcePath, binaryPath) => ({
      command: compiler,
      args: [...flags, sourcePath, "-o", binaryPath],
    }),
    execute: (binaryPath) => ({ command: binaryPath, args: [] }),
  };
}

export interface HarnessOptions {
  toolchain?: Toolchain;
  compileTimeoutMs?: number;
  runTimeoutMs?: number;
  runner?: ProcessRunner;
  workspaceLock?: KeyedLock;
  quiet?: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
}

// One queue per workspace across all harness instances
const sharedWorkspaceLock = new KeyedLock();

function failedVerdict(diagnostics: string): Verdict {
  return { passed: false, diagnostics, cases: [] };
}

/**
 * Compiles a solution and checks it against every `*.in` / `*.out` pair in
 * the solution's directory
 */
export class VerificationHarness {
  private readonly toolchain: Toolchain;
  private readonly compileTimeoutMs: number;
  private readonly runTimeoutMs: number;
  private readonly runner: ProcessRunner;
  private readonly workspaceLock: KeyedLock;
  private readonly quiet: boolean;

  constructor(options: HarnessOptions = {}) {
    this.toolchain = options.toolchain ?? gppToolchain();
    this.compileTimeoutMs =
      options.compileTimeoutMs ?? DEFAULT_COMPILE_TIMEOUT_MS;
    this.runTimeoutMs = options.runTimeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
    this.runner = options.runner ?? runProcess;
    this.workspaceLock = options.workspaceLock ?? sharedWorkspaceLock;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Verify the solution at `solutionPath`. Runs on the same workspace are
   * queued. Aborting `options.signal` kills the running subprocess and
   * rejects with VerificationCancelledError.
   */
  async run(solutionPath: string, options: RunOptions = {}): Promise<Verdict> {
    const sourcePath = path.resolve(solutionPath);
    const workspaceDir = path.dirname(sourcePath);

    return this.workspaceLock.runExclusive(workspaceDir, () =>
      this.verify(sourcePath, workspaceDir, options.signal)
    );
  }

  private async verify(
    sourcePath: string,
    workspaceDir: string,
    signal?: AbortSignal
  ): Promise<Verdict> {
    if (!(await fsUtils.fileExists(sourcePath))) {
      return failedVerdict(`Source file not found: ${sourcePath}`);
    }

    const binaryPath = path.join(workspaceDir, BINARY_FILENAME);
    const compileCommand = this.toolchain.compile(sourcePath, binaryPath);

    this.log(`Compiling ${sourcePath}`);
    const compileResult = await this.invoke(
      sourcePath,
      compileCommand,
      { timeoutMs: this.compileTimeoutMs, cwd: workspaceDir, signal }
    );

    if (compileResult.timedOut) {
      return failedVerdict(
        `Compilation timed out after ${this.compileTimeoutMs} ms`
      );
    }
    if (compileResult.exitCode !== 0) {
      return failedVerdict(compileResult.stderr || "Compilation failed.");
    }

    const inputFiles = await fsUtils.listFilesWithExtension(
      workspaceDir,
      INPUT_EXTENSION
    );
    if (inputFiles.length === 0) {
      return failedVerdict(`No ${INPUT_EXTENSION} test files found.`);
    }

    this.log(`Running ${inputFiles.length} test case(s)`);
    const cases: CaseResult[] = [];
    for (const inputFile of inputFiles) {
      cases.push(
        await this.runCase(sourcePath, binaryPath, inputFile, workspaceDir, signal)
      );
    }

    const diagnostics = cases
      .map((result) => result.diagnostic)
      .filter((diagnostic): diagnostic is string => diagnostic !== undefined);

    return {
      passed: diagnostics.length === 0,
      diagnostics: diagnostics.join("\n\n"),
      cases,
    };
  }

  private async runCase(
    sourcePath: string,
    binaryPath: string,
    inputFile: string,
    workspaceDir: string,
    signal?: AbortSignal
  ): Promise<CaseResult> {
    const name = path.basename(inputFile);
    const expectedFile = fsUtils.withExtension(inputFile, OUTPUT_EXTENSION);

    if (!(await fsUtils.fileExists(expectedFile))) {
      return {
        name,
        status: "missing-output",
        diagnostic: `Missing expected output file: ${path.basename(expectedFile)}`,
        elapsedMs: 0,
      };
    }

    const [testInput, expectedOutput] = await Promise.all([
      fsUtils.readFile(inputFile),
      fsUtils.readFile(expectedFile),
    ]);

    const result = await this.invoke(
      sourcePath,
      this.toolchain.execute(binaryPath),
      {
        input: testInput,
        timeoutMs: this.runTimeoutMs,
        cwd: workspaceDir,
        signal,
      }
    );

    if (result.timedOut) {
      return {
        name,
        status: "timeout",
        diagnostic: `[${name}] Time limit exceeded (${this.runTimeoutMs} ms)`,
        elapsedMs: result.elapsedMs,
      };
    }

    if (result.exitCode !== 0) {
      const code =
        result.exitCode !== null
          ? `code ${result.exitCode}`
          : `signal ${result.signal ?? "unknown"}`;
      return {
        name,
        status: "runtime-error",
        diagnostic: `[${name}] Runtime error (${code}):\n${result.stderr.trim()}`,
        elapsedMs: result.elapsedMs,
      };
    }

    if (!outputsMatch(result.stdout, expectedOutput)) {
      return {
        name,
        status: "wrong-answer",
        diagnostic: [
          `[${name}] Wrong answer`,
          `Expected:\n${expectedOutput.trimEnd()}`,
          `Got:\n${result.stdout.trimEnd()}`,
          ...(result.truncated
            ? [`(output truncated at ${MAX_CAPTURED_OUTPUT} bytes)`]
            : []),
        ].join("\n"),
        elapsedMs: result.elapsedMs,
      };
    }

    return { name, status: "passed", elapsedMs: result.elapsedMs };
  }

  /**
   * Run one subprocess, translating an abort into VerificationCancelledError
   */
  private async invoke(
    sourcePath: string,
    spec: CommandSpec,
    options: ProcessOptions
  ): Promise<ProcessResult> {
    if (options.signal?.aborted) {
      throw new VerificationCancelledError(sourcePath);
    }
    try {
      return await this.runner(spec.command, spec.args, options);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new VerificationCancelledError(sourcePath);
      }
      throw error;
    }
  }

  private log(message: string): void {
    if (!this.quiet) console.log(message);
  }
}
