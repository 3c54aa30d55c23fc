import { describeParseError, parse } from "./intent/parser.js";
import { stripWakePhrase } from "./intent/wake-phrase.js";
import type { InputMode } from "./intent/wake-phrase.js";
import { renderResult } from "./render.js";
import { describeOutcome } from "./result.js";
import type { CommandRouter } from "./router.js";
import type { SessionContext } from "./session/context.js";
import type { Command, ParseError, Result, ResultPayload } from "./types.js";

export const META_COMMANDS = ["help", "quit", "exit", "history", "context", "projects"] as const;

export type MetaCommand = (typeof META_COMMANDS)[number];

export const HELP_LINES = [
  "create project <name> [description]",
  "load project <name> | open project <name>",
  "list projects",
  "delete project <name>",
  "backup project [name]",
  "restore project <name> [from <timestamp>]",
  "list backups [name]",
  "show project files [name]",
  "create file <name> in <src|tests|docs> [with <content>]",
  "edit file <name> replace with <content>",
  "edit file <name> <instruction>",
  "add <instruction> to <file>",
  "show file <name>",
  "run tests [for current project] [matching <pattern>]",
  "generate tests for <file>",
  "deploy [project] [to <environment>]",
  "rollback deployment [to <environment>] [version <id>]",
  "deployment status [for <environment>]",
  "help | history | context | projects | quit"
] as const;

const DEFAULT_HISTORY_PREVIEW = 10;

export type AssistantReply =
  | { type: "result"; command: Command; result: Result<ResultPayload>; text: string }
  | { type: "parse-error"; error: ParseError; text: string }
  | { type: "meta"; meta: MetaCommand; text: string }
  | { type: "ignored"; text: string }
  | { type: "quit"; text: string };

export interface AssistantOptions {
  wakePhrase: string;
  historyPreview?: number | undefined;
}

function asMetaCommand(text: string): MetaCommand | null {
  const normalized = text.replace(/[\s.!?]+$/, "").trim().toLowerCase();
  return META_COMMANDS.find((meta) => meta === normalized) ?? null;
}

/**
 * Serial front end of a session: one utterance at a time through the parser
 * and router. Calls made while another is in flight wait their turn.
 */
export class Assistant {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly router: CommandRouter,
    readonly context: SessionContext,
    private readonly options: AssistantOptions
  ) {}

  handle(utterance: string, mode: InputMode): Promise<AssistantReply> {
    const next = this.queue.then(() => this.process(utterance, mode));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async process(utterance: string, mode: InputMode): Promise<AssistantReply> {
    const wake = stripWakePhrase(utterance.trim(), this.options.wakePhrase, mode);
    if (mode === "voice" && !wake.found) {
      return { type: "ignored", text: "" };
    }

    const meta = asMetaCommand(wake.remainder);
    if (meta) return this.runMeta(meta);

    const outcome = parse(utterance, { mode, wakePhrase: this.options.wakePhrase });
    if (outcome.status === "ignored") {
      return { type: "ignored", text: "" };
    }
    if (outcome.status === "error") {
      return { type: "parse-error", error: outcome.error, text: describeParseError(outcome.error) };
    }

    const result = await this.router.dispatch(outcome.command, this.context);
    return { type: "result", command: outcome.command, result, text: renderResult(result) };
  }

  private async runMeta(meta: MetaCommand): Promise<AssistantReply> {
    switch (meta) {
      case "help":
        return { type: "meta", meta, text: ["Commands:", ...HELP_LINES.map((line) => `  ${line}`)].join("\n") };
      case "quit":
      case "exit":
        return { type: "quit", text: "Goodbye." };
      case "history":
        return { type: "meta", meta, text: this.renderHistory() };
      case "context": {
        const current = this.context.getCurrent();
        const lines = [
          `Current project: ${current ?? "(none)"}`,
          `Session started: ${this.context.startedAt}`,
          `Commands this session: ${this.context.getHistory().length}`
        ];
        return { type: "meta", meta, text: lines.join("\n") };
      }
      case "projects": {
        const command: Command = Object.freeze({ kind: "ListProjects", rawText: "projects" });
        const result = await this.router.dispatch(command, this.context);
        return { type: "result", command, result, text: renderResult(result) };
      }
    }
  }

  private renderHistory(): string {
    const history = this.context.getHistory();
    if (history.length === 0) return "No commands yet.";
    const limit = this.options.historyPreview ?? DEFAULT_HISTORY_PREVIEW;
    const recent = history.slice(-limit);
    return recent
      .map((entry, index) => {
        const position = history.length - recent.length + index + 1;
        return `${position}. ${entry.command.rawText} -> ${describeOutcome(entry.result)}`;
      })
      .join("\n");
  }
}
