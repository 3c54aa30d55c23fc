import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { HELP_LINES } from "../src/core/assistant.js";
import { loadConfig } from "../src/core/config.js";
import { createRuntime } from "../src/core/runtime.js";
import type { Runtime } from "../src/core/runtime.js";

const STARTED = new Date("2026-10-18T08:30:00.000Z");

describe("Assistant", () => {
  let root: string;
  let runtime: Runtime;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "voxdev-assistant-"));
    runtime = createRuntime(loadConfig({ root }, {}), {
      now: () => STARTED,
      generator: { generate: async () => "generated\n" }
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("dispatches parsed commands and renders the result", async () => {
    const reply = await runtime.assistant.handle("create project demo Demo app", "text");

    expect(reply).toMatchObject({ type: "result", command: { kind: "CreateProject", name: "demo" } });
    expect(reply.text).toBe('Created project "demo".\n- demo: Demo app (last opened 2026-10-18T08:30:00.000Z)');
    expect(runtime.context.getCurrent()).toBe("demo");
  });

  it("answers meta commands without dispatching", async () => {
    const help = await runtime.assistant.handle("help", "text");
    expect(help.type).toBe("meta");
    expect(help.text.split("\n")).toEqual(["Commands:", ...HELP_LINES.map((line) => `  ${line}`)]);

    expect(await runtime.assistant.handle("Quit.", "text")).toEqual({ type: "quit", text: "Goodbye." });
    expect(await runtime.assistant.handle("exit", "text")).toEqual({ type: "quit", text: "Goodbye." });
    expect(runtime.context.getHistory()).toHaveLength(0);
  });

  it("lists projects through the projects shortcut", async () => {
    const reply = await runtime.assistant.handle("projects", "text");
    expect(reply).toMatchObject({ type: "result", command: { kind: "ListProjects", rawText: "projects" } });
    expect(reply.text).toBe("No projects yet.");
  });

  it("describes parse errors", async () => {
    expect(await runtime.assistant.handle("sing a song", "text")).toEqual({
      type: "parse-error",
      error: { reason: "Unrecognized", rawText: "sing a song" },
      text: "Did not recognize \"sing a song\". Type 'help' for the command list."
    });
  });

  it("ignores voice input that lacks the wake phrase", async () => {
    expect(await runtime.assistant.handle("delete project demo", "voice")).toEqual({ type: "ignored", text: "" });
    expect(await runtime.assistant.handle("hey assistant help", "voice")).toMatchObject({ type: "meta", meta: "help" });
    expect(runtime.context.getHistory()).toHaveLength(0);
  });

  it("reports session context and history", async () => {
    await runtime.assistant.handle("create project demo", "text");
    await runtime.assistant.handle("show file missing.py", "text");
    await runtime.assistant.handle("create file app.py in lib", "text");

    expect((await runtime.assistant.handle("history", "text")).text).toBe(
      [
        "1. create project demo -> ok",
        "2. show file missing.py -> failed:NotFound",
        "3. create file app.py in lib -> rejected:InvalidArgument"
      ].join("\n")
    );
    expect((await runtime.assistant.handle("context", "text")).text).toBe(
      ["Current project: demo", "Session started: 2026-10-18T08:30:00.000Z", "Commands this session: 3"].join("\n")
    );
  });

  it("handles one utterance at a time", async () => {
    const [created, loaded] = await Promise.all([
      runtime.assistant.handle("create project demo", "text"),
      runtime.assistant.handle("show project files", "text")
    ]);

    expect(created).toMatchObject({ type: "result", result: { status: "ok" } });
    expect(loaded).toMatchObject({ type: "result", result: { status: "ok", message: '"demo" has no files yet.' } });
  });
});
