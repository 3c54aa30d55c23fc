import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RateLimitedError } from "../src/core/errors.js";
import { CodeManager, resolveFileName } from "../src/core/managers/code-manager.js";
import type { CodeGenerator } from "../src/core/types.js";
import { FsWorkspaceStore } from "../src/core/workspace/fs-store.js";

describe("resolveFileName", () => {
  const files = {
    "src/app.py": "",
    "src/util/helpers.py": "",
    "tests/helpers.py": "",
    "docs/readme.md": ""
  };

  it("prefers an exact path, then a unique base name", () => {
    expect(resolveFileName(files, "src/app.py")).toEqual({ status: "found", path: "src/app.py" });
    expect(resolveFileName(files, "app.py")).toEqual({ status: "found", path: "src/app.py" });
    expect(resolveFileName(files, "util/helpers.py")).toEqual({ status: "found", path: "src/util/helpers.py" });
  });

  it("reports ambiguous and missing names", () => {
    expect(resolveFileName(files, "helpers.py")).toEqual({
      status: "ambiguous",
      matches: ["src/util/helpers.py", "tests/helpers.py"]
    });
    expect(resolveFileName(files, "main.py")).toEqual({ status: "missing" });
    expect(resolveFileName(files, "../app.py")).toEqual({ status: "missing" });
  });
});

describe("CodeManager", () => {
  let root: string;
  let store: FsWorkspaceStore;
  const generate = vi.fn<CodeGenerator["generate"]>();
  let manager: CodeManager;

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), "voxdev-code-"));
    store = new FsWorkspaceStore(root);
    generate.mockReset();
    manager = new CodeManager(store, { generate });
    await store.createProject({ name: "demo", description: "" });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("creates files once", async () => {
    expect(await manager.createFile("demo", "src/app.py", "print('hi')\n")).toEqual({
      status: "ok",
      message: "Created src/app.py.",
      payload: { type: "file", path: "src/app.py", content: "print('hi')\n", lines: 1 }
    });
    expect(await manager.createFile("demo", "src/app.py", "")).toEqual({
      status: "failed",
      reason: "AlreadyExists",
      message: 'src/app.py already exists in "demo".'
    });
    expect(await manager.createFile("ghost", "src/app.py", "")).toMatchObject({ reason: "NotFound" });
  });

  it("replaces content for literal edits", async () => {
    await manager.createFile("demo", "src/app.py", "old\n");
    const result = await manager.editFile("demo", "app.py", { type: "content", content: "new\nlines\n" });

    expect(result).toMatchObject({ status: "ok", message: "Updated src/app.py.", payload: { lines: 2 } });
    expect((await store.getProject("demo"))?.files["src/app.py"]).toBe("new\nlines\n");
    expect(generate).not.toHaveBeenCalled();
  });

  it("asks the generator for prompt edits with the project as context", async () => {
    await manager.createFile("demo", "src/app.py", "def main():\n    pass\n");
    generate.mockResolvedValue("import logging\n\ndef main():\n    logging.info('start')\n");

    const result = await manager.editFile("demo", "app.py", { type: "prompt", prompt: "add logging" });

    expect(result).toMatchObject({ status: "ok", payload: { path: "src/app.py", lines: 4 } });
    expect(generate).toHaveBeenCalledWith("add logging", {
      projectName: "demo",
      targetPath: "src/app.py",
      projectFiles: { "src/app.py": "def main():\n    pass\n" }
    });
  });

  it("refuses to write an empty generated file", async () => {
    await manager.createFile("demo", "src/app.py", "keep\n");
    generate.mockResolvedValue("  \n");

    expect(await manager.editFile("demo", "app.py", { type: "prompt", prompt: "clear it" })).toEqual({
      status: "failed",
      reason: "GenerationFailed",
      message: "The code generator returned an empty file for src/app.py."
    });
    expect((await store.getProject("demo"))?.files["src/app.py"]).toBe("keep\n");
  });

  it("lets generator failures propagate to the caller", async () => {
    await manager.createFile("demo", "src/app.py", "keep\n");
    generate.mockRejectedValue(new RateLimitedError("codex is rate limited; try again later."));

    await expect(manager.editFile("demo", "app.py", { type: "prompt", prompt: "x" })).rejects.toBeInstanceOf(
      RateLimitedError
    );
  });

  it("shows files and rejects ambiguous names", async () => {
    await manager.createFile("demo", "src/helpers.py", "a = 1\n");
    await manager.createFile("demo", "tests/helpers.py", "");

    expect(await manager.showFile("demo", "src/helpers.py")).toEqual({
      status: "ok",
      message: "src/helpers.py (1 line(s)).",
      payload: { type: "file", path: "src/helpers.py", content: "a = 1\n", lines: 1 }
    });
    expect(await manager.showFile("demo", "helpers.py")).toEqual({
      status: "rejected",
      reason: "InvalidArgument",
      message: '"helpers.py" matches several files: src/helpers.py, tests/helpers.py. Use the full path.'
    });
    expect(await manager.showFile("demo", "nope.py")).toEqual({
      status: "failed",
      reason: "NotFound",
      message: 'No file named "nope.py" in "demo".'
    });
  });
});
