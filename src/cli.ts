import { log } from "@clack/prompts";
import { Command } from "commander";

import { runExec } from "./commands/exec.js";
import type { ExecCommandOptions } from "./commands/exec.js";
import { runSession } from "./commands/session.js";
import type { SessionCommandOptions } from "./commands/session.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;

program
  .name("voxdev")
  .description("Drive a local development workspace with spoken or typed commands.")
  .version(CLI_VERSION);

program
  .command("session", { isDefault: true })
  .description("Start an interactive session. Commands are read one at a time until you say or type quit.")
  .option("--input <mode>", "text | voice", "text")
  .option("--root <path>", "Workspace root (defaults to $VOXDEV_ROOT or ./workspace)")
  .option("--wake-phrase <phrase>", "Phrase that must precede voice commands")
  .option("--provider <provider>", "auto | codex | claude")
  .option("--model <model>", "Model id to use when provider is codex or claude")
  .action(async (rawOptions: SessionCommandOptions) => {
    await runSession(rawOptions);
  });

program
  .command("exec")
  .description("Run a single command and exit. Exit code is 0 when it succeeds, 2 when rejected, 1 when it fails.")
  .argument("<utterance...>", "Command text, e.g. create project demo \"First try\"")
  .option("--project <name>", "Load this project before running the command")
  .option("--format <format>", "text | json", "text")
  .option("--root <path>", "Workspace root (defaults to $VOXDEV_ROOT or ./workspace)")
  .option("--wake-phrase <phrase>", "Optional leading phrase stripped from the utterance")
  .option("--provider <provider>", "auto | codex | claude")
  .option("--model <model>", "Model id to use when provider is codex or claude")
  .action(async (words: string[], rawOptions: ExecCommandOptions) => {
    await runExec(words, rawOptions);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      console.log(JSON.stringify(toJsonErrorPayload(normalized), null, 2));
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
