import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import { CollaboratorFailure, CollaboratorTimeoutError } from "../errors.js";
import { runCommand, summarizeFailure } from "../process-runner.js";
import { splitCommandLine } from "../text.js";
import type { ProjectFiles, StatusCallback, TestRunner, TestRunOptions, TestRunReport } from "../types.js";

export const TEST_PATTERN_ENV = "VOXDEV_TEST_PATTERN";

const PYTHON_TEST_FILE = /^tests\/(?:.+\/)?(?:test_[^/]*|[^/]*_test)\.py$/;
const NODE_TEST_FILE = /^tests\/(?:.+\/)?[^/]+\.test\.(?:js|mjs|cjs)$/;

export interface ProcessTestRunnerOptions {
  /** Overrides detection; receives the pattern through `VOXDEV_TEST_PATTERN`. */
  command?: string | undefined;
  timeoutMs: number;
  onStatus?: StatusCallback | undefined;
}

interface PlannedCommand {
  label: string;
  command: string;
  args: string[];
}

export interface TestSummaryCounts {
  passed: number;
  failed: number;
  found: boolean;
}

function lastMatchCount(output: string, pattern: RegExp): number | null {
  let value: number | null = null;
  for (const match of output.matchAll(pattern)) {
    if (match[1]) value = Number.parseInt(match[1], 10);
  }
  return value;
}

/**
 * Reads pass/fail totals from pytest, TAP (`node --test`) or jest/vitest
 * style summaries. The last summary in the output wins.
 */
export function parseTestSummary(output: string): TestSummaryCounts {
  const tapPassed = lastMatchCount(output, /^# pass (\d+)\s*$/gm);
  const tapFailed = lastMatchCount(output, /^# fail (\d+)\s*$/gm);
  if (tapPassed !== null || tapFailed !== null) {
    return { passed: tapPassed ?? 0, failed: tapFailed ?? 0, found: true };
  }

  const passed = lastMatchCount(output, /(\d+) passed\b/g);
  const failed = lastMatchCount(output, /(\d+) failed\b/g);
  const errors = lastMatchCount(output, /(\d+) errors?\b/g);
  if (passed === null && failed === null && errors === null) {
    return { passed: 0, failed: 0, found: false };
  }
  return { passed: passed ?? 0, failed: (failed ?? 0) + (errors ?? 0), found: true };
}

export function planTestCommand(files: ProjectFiles, options: { command?: string | undefined; pattern?: string | undefined }): PlannedCommand | null {
  if (options.command) {
    const [command, ...args] = splitCommandLine(options.command);
    if (!command) return null;
    return { label: options.command, command, args };
  }

  const paths = Object.keys(files).sort();
  if (paths.some((path) => PYTHON_TEST_FILE.test(path))) {
    const args = ["-m", "pytest", "tests", "-v", "--tb=short", "-p", "no:warnings"];
    if (options.pattern) args.push("-k", options.pattern);
    return { label: "pytest", command: "python3", args };
  }

  const nodeTests = paths.filter((path) => NODE_TEST_FILE.test(path));
  if (nodeTests.length > 0) {
    const args = ["--test", "--test-reporter=tap"];
    if (options.pattern) args.push(`--test-name-pattern=${options.pattern}`);
    args.push(...nodeTests);
    return { label: "node --test", command: process.execPath, args };
  }

  return null;
}

/** Runs a project's tests in a throwaway copy of its files. */
export class ProcessTestRunner implements TestRunner {
  constructor(private readonly options: ProcessTestRunnerOptions) {}

  async runTests(files: ProjectFiles, options: TestRunOptions = {}): Promise<TestRunReport> {
    const planned = planTestCommand(files, { command: this.options.command, pattern: options.pattern });
    if (!planned) {
      throw new CollaboratorFailure("No tests found under tests/ and no test command is configured.", "NotFound");
    }

    const workDir = await mkdtemp(join(tmpdir(), "voxdev-tests-"));
    try {
      for (const [path, content] of Object.entries(files)) {
        const target = join(workDir, path);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, "utf8");
      }

      this.options.onStatus?.(`Running ${planned.label}...`);
      const result = await runCommand(planned.command, planned.args, {
        cwd: workDir,
        timeoutMs: this.options.timeoutMs,
        env: { ...process.env, ...(options.pattern ? { [TEST_PATTERN_ENV]: options.pattern } : {}) },
        ...(this.options.onStatus ? { onActivity: this.options.onStatus } : {})
      });

      if (result.timedOut) {
        throw new CollaboratorTimeoutError(`Tests did not finish (${summarizeFailure(result)}).`);
      }
      if (!result.ok && !result.reason?.startsWith("exit code")) {
        throw new CollaboratorFailure(`Could not start ${planned.label} (${summarizeFailure(result)}).`);
      }

      const log = `${result.stdout}${result.stderr ? `\n${result.stderr}` : ""}`.trim();
      const counts = parseTestSummary(log);
      return {
        passed: counts.passed,
        failed: result.ok ? counts.failed : Math.max(counts.failed, 1),
        log
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
