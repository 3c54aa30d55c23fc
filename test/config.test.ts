import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CONFIG_FILE_NAME, loadConfig } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";

describe("loadConfig", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "voxdev-config-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function writeConfig(value: unknown): void {
    writeFileSync(join(root, CONFIG_FILE_NAME), JSON.stringify(value), "utf8");
  }

  it("falls back to defaults", () => {
    expect(loadConfig({ root }, {})).toEqual({
      root,
      wakePhrase: "hey assistant",
      historyLimit: 1000,
      ai: { provider: "auto", model: undefined, timeoutMs: 300_000 },
      tests: { command: undefined, timeoutMs: 300_000 },
      speech: { recordCommand: undefined, transcribeCommand: undefined, speakCommand: undefined, timeoutMs: 60_000 },
      deployments: {
        development: { commands: [], timeoutMs: 600_000 },
        staging: { commands: [], timeoutMs: 600_000 },
        production: { commands: [], timeoutMs: 600_000 }
      }
    });
  });

  it("reads the workspace config file", () => {
    writeConfig({
      wakePhrase: "computer",
      historyLimit: 50,
      ai: { provider: "claude", timeoutSec: 30 },
      tests: { command: "make test" },
      deployments: { preview: { commands: ["./publish.sh preview"], timeoutSec: 5 } }
    });

    const config = loadConfig({ root }, {});
    expect(config.wakePhrase).toBe("computer");
    expect(config.historyLimit).toBe(50);
    expect(config.ai).toEqual({ provider: "claude", model: undefined, timeoutMs: 30_000 });
    expect(config.tests.command).toBe("make test");
    expect(config.deployments.preview).toEqual({ commands: ["./publish.sh preview"], timeoutMs: 5_000 });
    expect(Object.keys(config.deployments).sort()).toEqual(["development", "preview", "production", "staging"]);
  });

  it("lets environment variables and flags override the file", () => {
    writeConfig({ wakePhrase: "computer", ai: { provider: "claude", model: "from-file" } });
    const env = { VOXDEV_AI_PROVIDER: "codex", VOXDEV_AI_MODEL: "from-env", VOXDEV_WAKE_PHRASE: " jarvis " };

    expect(loadConfig({ root }, env)).toMatchObject({
      wakePhrase: "jarvis",
      ai: { provider: "codex", model: "from-env" }
    });
    expect(loadConfig({ root, provider: "Claude", model: "from-flag", wakePhrase: "ok voxdev" }, env)).toMatchObject({
      wakePhrase: "ok voxdev",
      ai: { provider: "claude", model: "from-flag" }
    });
  });

  it("takes the root from VOXDEV_ROOT", () => {
    expect(loadConfig({}, { VOXDEV_ROOT: root }).root).toBe(root);
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({ root, provider: "gpt" }, {})).toThrow(
      'Invalid AI provider "gpt" from --provider. Expected one of: auto, codex, claude.'
    );
  });

  it("reports invalid files with the offending keys", () => {
    writeConfig({ ai: { provider: "other" }, extra: true });

    let caught: unknown;
    try {
      loadConfig({ root }, {});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ exitCode: 2, message: `Invalid configuration in ${join(root, CONFIG_FILE_NAME)}.` });
  });

  it("reports malformed JSON", () => {
    writeFileSync(join(root, CONFIG_FILE_NAME), "{ not json", "utf8");
    expect(() => loadConfig({ root }, {})).toThrow(ConfigError);
  });
});
