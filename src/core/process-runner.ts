import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

export interface ProcessResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  reason?: string;
  timedOut?: boolean;
}

export interface RunCommandOptions {
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  /** Piped into the child's stdin; stdin is closed immediately when absent. */
  input?: Readable | undefined;
  maxBufferBytes?: number | undefined;
  timeoutMs?: number | undefined;
  onActivity?: ((message: string) => void) | undefined;
}

const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;
const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;
const ACTIVITY_EMIT_THROTTLE_MS = 3_000;

function consumeCompleteLines(buffer: string, onLine: (line: string) => void): string {
  let lineStart = 0;
  for (let index = 0; index < buffer.length; index += 1) {
    const char = buffer[index];
    if (char !== "\n" && char !== "\r") continue;
    onLine(buffer.slice(lineStart, index));
    if (char === "\r" && buffer[index + 1] === "\n") {
      index += 1;
    }
    lineStart = index + 1;
  }
  return buffer.slice(lineStart);
}

export function inferActivityFromLine(rawLine: string): string | null {
  const line = rawLine.trim();
  if (!line) return null;
  const lower = line.toLowerCase();

  if (lower.includes("thinking") || lower.includes("planning")) {
    return "Activity: planning the edit";
  }

  if (/^read(?:ing)?\s+file\b/i.test(line) || /^open(?:ed)?\s+file\b/i.test(line) || lower.includes("analyzing")) {
    return "Activity: reading project files";
  }

  if (/^collected\s+\d+\s+items?\b/i.test(line) || /^(?:PASS|FAIL)\s+\S/.test(line) || /^=+ test session starts/i.test(line)) {
    return "Activity: running tests";
  }

  if (/^(?:copying|uploading|deploying)\b/i.test(line)) {
    return "Activity: deploying files";
  }

  if (/^tokens used\b/i.test(line)) {
    return "Activity: finishing response";
  }

  return null;
}

function trimToTailWithinBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) return value;
  let low = 0;
  let high = value.length;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return value.slice(low);
}

/**
 * Spawns `command` without a shell and resolves once it exits. Never rejects:
 * spawn errors, non-zero exits and timeouts come back as `ok: false`.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<ProcessResult> {
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolveResult) => {
    let stdout = "";
    let stderr = "";
    let done = false;
    let timedOut = false;
    let stdoutTruncated = false;
    let stderrTruncated = false;
    let stdoutActivityPending = "";
    let stderrActivityPending = "";
    let lastActivityMessage = "";
    let lastActivityAtMs = 0;

    const resolveOnce = (value: ProcessResult): void => {
      if (done) return;
      done = true;
      clearTimeout(timeoutHandle);
      resolveResult(value);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: [options.input ? "pipe" : "ignore", "pipe", "pipe"]
    });

    if (options.input && child.stdin) {
      const stdin = child.stdin;
      // The child may exit before consuming everything it was given.
      stdin.on("error", () => undefined);
      options.input.on("error", (error) => {
        stderr += `\ninput stream failed: ${error.message}`;
        stdin.end();
      });
      options.input.pipe(stdin);
    }

    const addChunk = (
      current: string,
      chunk: string
    ): {
      next: string;
      truncated: boolean;
    } => {
      const next = trimToTailWithinBytes(current + chunk, maxBufferBytes);
      const truncated = Buffer.byteLength(current + chunk, "utf8") > maxBufferBytes;
      return { next, truncated };
    };

    const withOutputTailNotice = (reason: string): string => {
      if (!stdoutTruncated && !stderrTruncated) return reason;
      return `${reason}; output truncated to last ${maxBufferBytes} bytes per stream`;
    };

    const emitActivity = (line: string): void => {
      if (!options.onActivity) return;
      const activity = inferActivityFromLine(line);
      if (!activity) return;
      const now = Date.now();
      if (activity === lastActivityMessage && now - lastActivityAtMs < ACTIVITY_EMIT_THROTTLE_MS) {
        return;
      }
      lastActivityMessage = activity;
      lastActivityAtMs = now;
      options.onActivity(activity);
    };

    const processActivityChunk = (stream: "stdout" | "stderr", chunk: string): void => {
      if (!options.onActivity) return;
      if (stream === "stdout") {
        stdoutActivityPending = consumeCompleteLines(stdoutActivityPending + chunk, emitActivity);
        return;
      }
      stderrActivityPending = consumeCompleteLines(stderrActivityPending + chunk, emitActivity);
    };

    if (child.stdout) {
      child.stdout.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        processActivityChunk("stdout", chunk);
        const appended = addChunk(stdout, chunk);
        stdout = appended.next;
        stdoutTruncated = stdoutTruncated || appended.truncated;
      });
    }

    if (child.stderr) {
      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => {
        processActivityChunk("stderr", chunk);
        const appended = addChunk(stderr, chunk);
        stderr = appended.next;
        stderrTruncated = stderrTruncated || appended.truncated;
      });
    }

    child.on("error", (error) => {
      resolveOnce({
        ok: false,
        stdout,
        stderr,
        reason: withOutputTailNotice(error.message)
      });
    });

    child.on("close", (code) => {
      if (stdoutActivityPending.length > 0) {
        emitActivity(stdoutActivityPending);
        stdoutActivityPending = "";
      }
      if (stderrActivityPending.length > 0) {
        emitActivity(stderrActivityPending);
        stderrActivityPending = "";
      }

      if (timedOut) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          timedOut: true,
          reason: withOutputTailNotice(`timeout after ${timeoutMs / 1000}s`)
        });
        return;
      }

      if (code !== 0) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          reason: withOutputTailNotice(`exit code ${code ?? "unknown"}`)
        });
        return;
      }

      resolveOnce({
        ok: true,
        stdout,
        stderr
      });
    });

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);
  });
}

export function combineOutput(result: ProcessResult): string {
  return `${result.stdout}\n${result.stderr}`.trim();
}

export function summarizeFailure(result: ProcessResult): string {
  const reason = result.reason ?? "unknown error";
  const combined = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  if (!combined) return reason;
  const snippet = combined.length > 280 ? `${combined.slice(0, 280)}...` : combined;
  return `${reason}: ${snippet}`;
}
