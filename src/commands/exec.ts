import type { AssistantReply } from "../core/assistant.js";
import { loadConfig } from "../core/config.js";
import { normalizeOutputFormat, UserInputError } from "../core/errors.js";
import { renderResult } from "../core/render.js";
import { isOk } from "../core/result.js";
import { createRuntime } from "../core/runtime.js";
import type { RuntimeOverrides } from "../core/runtime.js";
import { appendHistoryLog } from "../core/session/history-log.js";
import type { Command, Result, ResultPayload } from "../core/types.js";
import { reportReply } from "./session.js";

export interface ExecCommandOptions {
  root?: string;
  project?: string;
  format?: string;
  provider?: string;
  model?: string;
  wakePhrase?: string;
}

const EXIT_CODE_FAILED = 1;
const EXIT_CODE_REJECTED = 2;

export function exitCodeForReply(reply: AssistantReply): number {
  if (reply.type === "parse-error") return EXIT_CODE_REJECTED;
  if (reply.type !== "result") return 0;
  if (reply.result.status === "rejected") return EXIT_CODE_REJECTED;
  if (reply.result.status === "failed") return EXIT_CODE_FAILED;
  return 0;
}

export function toJsonReply(reply: AssistantReply): Record<string, unknown> {
  switch (reply.type) {
    case "result":
      return { type: reply.type, command: reply.command, result: reply.result };
    case "parse-error":
      return { type: reply.type, error: reply.error, message: reply.text };
    default:
      return { type: reply.type, message: reply.text };
  }
}

function loadReply(command: Command, result: Result<ResultPayload>): AssistantReply {
  return { type: "result", command, result, text: renderResult(result) };
}

/** One utterance, one reply. `--project` loads a project first so project-scoped commands work. */
export async function runExec(
  words: string[],
  rawOptions: ExecCommandOptions,
  overrides: RuntimeOverrides = {}
): Promise<AssistantReply> {
  const format = normalizeOutputFormat(rawOptions.format);
  const utterance = words.join(" ").trim();
  if (!utterance) {
    throw new UserInputError("Nothing to run. Pass an utterance, e.g. voxdev exec list projects");
  }

  const config = loadConfig({
    root: rawOptions.root,
    wakePhrase: rawOptions.wakePhrase,
    provider: rawOptions.provider,
    model: rawOptions.model
  });
  const runtime = createRuntime(config, overrides);

  let reply: AssistantReply;
  const preload: Command | null = rawOptions.project
    ? Object.freeze({ kind: "LoadProject", name: rawOptions.project, rawText: `load project ${rawOptions.project}` })
    : null;
  const loaded = preload ? await runtime.router.dispatch(preload, runtime.context) : null;
  if (preload && loaded && !isOk(loaded)) {
    reply = loadReply(preload, loaded);
  } else {
    reply = await runtime.assistant.handle(utterance, "text");
  }

  await appendHistoryLog(config.root, runtime.context.getHistory(), runtime.context.startedAt, config.historyLimit);

  if (format === "json") {
    console.log(JSON.stringify(toJsonReply(reply), null, 2));
  } else {
    reportReply(reply);
  }
  const exitCode = exitCodeForReply(reply);
  if (exitCode !== 0) process.exitCode = exitCode;
  return reply;
}
