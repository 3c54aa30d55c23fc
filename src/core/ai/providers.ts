import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runCommand } from "../process-runner.js";
import type { ProcessResult } from "../process-runner.js";
import type { StatusCallback } from "../types.js";
import type { ResolvedAiProvider } from "./provider-selection.js";

const DEFAULT_CODEX_REASONING_EFFORT = "medium";
const DEFAULT_CODEX_SANDBOX_MODE = "read-only";
const DEFAULT_STRUCTURED_TIMEOUT_MS = 5 * 60 * 1000;

export interface StructuredTaskOptions {
  cwd?: string | undefined;
  onStatus?: StatusCallback | undefined;
  model?: string | undefined;
  timeoutMs?: number | undefined;
}

function codexBaseArgs(model: string | undefined): string[] {
  const args = [
    "exec",
    "--sandbox",
    DEFAULT_CODEX_SANDBOX_MODE,
    "--skip-git-repo-check",
    "-c",
    `model_reasoning_effort="${DEFAULT_CODEX_REASONING_EFFORT}"`
  ];
  if (model) {
    args.push("--model", model);
  }
  return args;
}

async function runCodexStructured(
  prompt: string,
  outputSchema: unknown,
  options: StructuredTaskOptions = {}
): Promise<ProcessResult> {
  const tempDir = mkdtempSync(join(tmpdir(), "voxdev-codex-"));
  const schemaPath = join(tempDir, "output-schema.json");
  writeFileSync(schemaPath, JSON.stringify(outputSchema, null, 2), "utf8");
  const timeoutMs = options.timeoutMs ?? DEFAULT_STRUCTURED_TIMEOUT_MS;

  try {
    options.onStatus?.("Trying codex structured JSON mode...");
    const primary = await runCommand("codex", [...codexBaseArgs(options.model), "--output-schema", schemaPath, prompt], {
      cwd: options.cwd,
      timeoutMs
    });
    if (primary.ok || primary.timedOut) return primary;
    options.onStatus?.("Structured mode unavailable, retrying codex standard mode...");

    return runCommand("codex", [...codexBaseArgs(options.model), prompt], { cwd: options.cwd, timeoutMs });
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }
}

async function runClaudeStructured(
  prompt: string,
  outputSchema: unknown,
  options: StructuredTaskOptions = {}
): Promise<ProcessResult> {
  const schemaJson = JSON.stringify(outputSchema);
  const timeoutMs = options.timeoutMs ?? DEFAULT_STRUCTURED_TIMEOUT_MS;
  const modelArgs = options.model ? ["--model", options.model] : [];
  options.onStatus?.("Trying claude JSON schema mode...");

  const primary = await runCommand(
    "claude",
    ["-p", prompt, "--output-format", "json", "--json-schema", schemaJson, "--tools", "", "--no-session-persistence", ...modelArgs],
    { cwd: options.cwd, timeoutMs }
  );
  if (primary.ok || primary.timedOut) return primary;

  options.onStatus?.("Schema mode failed, retrying claude JSON output mode...");
  const secondary = await runCommand(
    "claude",
    ["-p", prompt, "--output-format", "json", "--tools", "", "--no-session-persistence", ...modelArgs],
    { cwd: options.cwd, timeoutMs }
  );
  if (secondary.ok || secondary.timedOut) return secondary;

  options.onStatus?.("JSON output mode failed, retrying plain claude mode...");
  return runCommand("claude", ["-p", prompt, "--tools", "", "--no-session-persistence", ...modelArgs], {
    cwd: options.cwd,
    timeoutMs
  });
}

export async function runStructuredTask(
  provider: ResolvedAiProvider,
  prompt: string,
  outputSchema: unknown,
  options: StructuredTaskOptions = {}
): Promise<ProcessResult> {
  return provider === "codex"
    ? runCodexStructured(prompt, outputSchema, options)
    : runClaudeStructured(prompt, outputSchema, options);
}
