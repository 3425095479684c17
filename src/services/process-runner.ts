import { spawn } from "child_process";
import { MAX_CAPTURED_OUTPUT } from "../constants";
import { ProcessOptions, ProcessResult } from "../types";

/**
 * Raw bytes of one output stream, kept up to MAX_CAPTURED_OUTPUT and decoded
 * once so multi-byte characters split across chunks survive
 */
class StreamCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  truncated = false;

  push(chunk: Buffer): void {
    const room = MAX_CAPTURED_OUTPUT - this.bytes;
    if (chunk.length > room) this.truncated = true;
    if (room <= 0) return;

    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.bytes += kept.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }
}

/**
 * Run a command without a shell, feed `input` to its stdin and collect
 * stdout/stderr. The process is killed when the timeout elapses or the
 * signal aborts; a timeout resolves with `timedOut: true`, an abort rejects
 * with the signal's reason.
 */
export function runProcess(
  command: string,
  args: string[],
  options: ProcessOptions
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(options.signal.reason);
      return;
    }

    const startTime = Date.now();
    const stdout = new StreamCapture();
    const stderr = new StreamCapture();
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["pipe", "pipe", "pipe"],
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    const onAbort = () => {
      child.kill("SIGKILL");
      finish(() => reject(options.signal?.reason));
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      settle();
    };

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (error) => {
      // Spawn failures (e.g. ENOENT) resolve as a failed process
      finish(() =>
        resolve({
          exitCode: null,
          signal: null,
          stdout: stdout.text(),
          stderr: stderr.text() || error.message,
          timedOut,
          truncated: stdout.truncated || stderr.truncated,
          elapsedMs: Date.now() - startTime,
        })
      );
    });

    child.on("close", (code, signal) => {
      finish(() =>
        resolve({
          exitCode: code,
          signal,
          stdout: stdout.text(),
          stderr: stderr.text(),
          timedOut,
          truncated: stdout.truncated || stderr.truncated,
          elapsedMs: Date.now() - startTime,
        })
      );
    });

    // The program may exit without reading its input
    child.stdin.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code !== "EPIPE") {
        stderr.push(Buffer.from(error.message));
      }
    });
    child.stdin.end(options.input ?? "");
  });
}
