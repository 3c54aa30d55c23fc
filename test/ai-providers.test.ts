import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  runCommand: vi.fn()
}));

vi.mock("../src/core/process-runner.js", () => ({
  runCommand: mocks.runCommand
}));

describe("ai provider command wiring", () => {
  beforeEach(() => {
    mocks.runCommand.mockReset();
    mocks.runCommand.mockResolvedValue({
      ok: true,
      stdout: "{\"content\":\"x\"}",
      stderr: ""
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("runs codex read-only with an output schema file", async () => {
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("codex", "edit the file", { type: "object" }, { model: "gpt-test", timeoutMs: 1000 });

    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
    const [command, args, options] = mocks.runCommand.mock.calls[0] ?? [];
    expect(command).toBe("codex");
    expect(args).toEqual([
      "exec",
      "--sandbox",
      "read-only",
      "--skip-git-repo-check",
      "-c",
      'model_reasoning_effort="medium"',
      "--model",
      "gpt-test",
      "--output-schema",
      expect.stringMatching(/voxdev-codex-.*output-schema\.json$/),
      "edit the file"
    ]);
    expect(options).toEqual({ cwd: undefined, timeoutMs: 1000 });
  });

  it("falls back to plain codex mode when the schema run fails", async () => {
    mocks.runCommand.mockResolvedValueOnce({ ok: false, stdout: "", stderr: "unknown flag", reason: "exit code 2" });
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("codex", "edit the file", { type: "object" });

    expect(mocks.runCommand).toHaveBeenCalledTimes(2);
    const fallbackArgs: unknown = mocks.runCommand.mock.calls[1]?.[1];
    expect(fallbackArgs).toEqual([
      "exec",
      "--sandbox",
      "read-only",
      "--skip-git-repo-check",
      "-c",
      'model_reasoning_effort="medium"',
      "edit the file"
    ]);
  });

  it("does not retry after a timeout", async () => {
    mocks.runCommand.mockResolvedValueOnce({ ok: false, stdout: "", stderr: "", timedOut: true, reason: "timeout after 1s" });
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    const result = await runStructuredTask("claude", "edit the file", { type: "object" });

    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
    expect(result.timedOut).toBe(true);
  });

  it("walks down the claude modes until one succeeds", async () => {
    mocks.runCommand
      .mockResolvedValueOnce({ ok: false, stdout: "", stderr: "", reason: "exit code 1" })
      .mockResolvedValueOnce({ ok: false, stdout: "", stderr: "", reason: "exit code 1" });
    const { runStructuredTask } = await import("../src/core/ai/providers.js");

    await runStructuredTask("claude", "edit the file", { type: "object" }, { model: "claude-test" });

    expect(mocks.runCommand).toHaveBeenCalledTimes(3);
    expect(mocks.runCommand.mock.calls[0]?.[1]).toEqual([
      "-p",
      "edit the file",
      "--output-format",
      "json",
      "--json-schema",
      "{\"type\":\"object\"}",
      "--tools",
      "",
      "--no-session-persistence",
      "--model",
      "claude-test"
    ]);
    expect(mocks.runCommand.mock.calls[2]?.[1]).toEqual([
      "-p",
      "edit the file",
      "--tools",
      "",
      "--no-session-persistence",
      "--model",
      "claude-test"
    ]);
  });
});
