import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  success: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  info: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  log: {
    info: mocks.info,
    warn: mocks.warn,
    success: mocks.success,
    error: mocks.error
  }
}));

import { exitCodeForReply, runExec } from "../src/commands/exec.js";
import { UserInputError } from "../src/core/errors.js";
import { readHistoryLog } from "../src/core/session/history-log.js";

const overrides = { generator: { generate: async () => "x = 1\n" } };

describe("exec command", () => {
  let root: string;
  let printed: string[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "voxdev-exec-"));
    printed = [];
    vi.spyOn(console, "log").mockImplementation((value: unknown) => {
      printed.push(String(value));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    mocks.success.mockReset();
    mocks.warn.mockReset();
    mocks.error.mockReset();
    process.exitCode = undefined;
    rmSync(root, { recursive: true, force: true });
  });

  it("prints the reply as JSON and appends to the history log", async () => {
    await runExec(["create", "project", "demo"], { root, format: "json" }, overrides);

    expect(printed).toHaveLength(1);
    const [output] = printed;
    expect(JSON.parse(output ?? "")).toMatchObject({
      type: "result",
      command: { kind: "CreateProject", name: "demo" },
      result: { status: "ok", message: 'Created project "demo".' }
    });
    expect(process.exitCode).toBeUndefined();
    expect((await readHistoryLog(root)).map((entry) => entry.rawText)).toEqual(["create project demo"]);
  });

  it("loads --project first so project commands work", async () => {
    await runExec(["create", "project", "demo"], { root }, overrides);
    const reply = await runExec(["create", "file", "app.py", "in", "src"], { root, project: "demo" }, overrides);

    expect(reply).toMatchObject({ type: "result", result: { status: "ok", message: "Created src/app.py." } });
    expect(mocks.success).toHaveBeenLastCalledWith("Created src/app.py.\n(empty file)");
    expect((await readHistoryLog(root)).map((entry) => entry.kind)).toEqual([
      "CreateProject",
      "LoadProject",
      "CreateFile"
    ]);
  });

  it("stops when --project cannot be loaded", async () => {
    const reply = await runExec(["run", "tests"], { root, project: "ghost" }, overrides);

    expect(reply).toMatchObject({ type: "result", command: { kind: "LoadProject" }, result: { reason: "NotFound" } });
    expect(mocks.error).toHaveBeenCalledWith('Project "ghost" not found. [NotFound]');
    expect(process.exitCode).toBe(1);
  });

  it("exits with 2 for rejected or unparsed commands", async () => {
    await runExec(["run", "tests"], { root }, overrides);
    expect(process.exitCode).toBe(2);
    expect(mocks.warn).toHaveBeenCalledWith("No project is loaded. Create or load a project first. [NoActiveProject]");

    process.exitCode = undefined;
    const reply = await runExec(["sing"], { root }, overrides);
    expect(exitCodeForReply(reply)).toBe(2);
    expect(process.exitCode).toBe(2);
  });

  it("strips a leading --wake-phrase before parsing", async () => {
    await runExec(["computer,", "list", "projects"], { root, wakePhrase: "computer", format: "json" }, overrides);

    const [output] = printed;
    expect(JSON.parse(output ?? "")).toMatchObject({
      type: "result",
      command: { kind: "ListProjects" },
      result: { status: "ok" }
    });
    expect(process.exitCode).toBeUndefined();
  });

  it("needs an utterance", async () => {
    await expect(runExec([" "], { root }, overrides)).rejects.toBeInstanceOf(UserInputError);
  });
});
