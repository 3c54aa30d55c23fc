import { intro, isCancel, log, outro, spinner, text } from "@clack/prompts";

import type { AssistantReply } from "../core/assistant.js";
import { CommandTranscriber, speak, transcribeRecording } from "../core/collaborators/speech.js";
import { loadConfig } from "../core/config.js";
import { ConfigError, UserInputError, VoxdevError } from "../core/errors.js";
import type { InputMode } from "../core/intent/wake-phrase.js";
import { summarizeForSpeech } from "../core/render.js";
import { createRuntime } from "../core/runtime.js";
import { appendHistoryLog } from "../core/session/history-log.js";
import type { VoxdevConfig } from "../core/types.js";

export interface SessionCommandOptions {
  input?: string;
  root?: string;
  wakePhrase?: string;
  provider?: string;
  model?: string;
}

type Spinner = ReturnType<typeof spinner>;

export function normalizeInputMode(value: string | undefined): InputMode {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "voice") return normalized;
  throw new UserInputError(`Invalid --input value "${String(value)}". Expected "text" or "voice".`);
}

export function reportReply(reply: AssistantReply): void {
  switch (reply.type) {
    case "ignored":
    case "quit":
      return;
    case "parse-error":
      log.warn(reply.text);
      return;
    case "meta":
      log.info(reply.text);
      return;
    case "result":
      if (reply.result.status === "ok") log.success(reply.text);
      else if (reply.result.status === "rejected") log.warn(reply.text);
      else log.error(reply.text);
  }
}

function stopLabel(reply: AssistantReply): string {
  if (reply.type === "result") return `${reply.command.kind}: ${reply.result.status}`;
  if (reply.type === "parse-error") return "Not understood";
  return "Ready";
}

async function readTypedUtterance(): Promise<string | null> {
  const value = await text({
    message: "Command",
    placeholder: "create project demo \"My first project\""
  });
  if (isCancel(value)) return null;
  return value;
}

function requireSpeechCommands(config: VoxdevConfig): { recordCommand: string; transcriber: CommandTranscriber } {
  const { recordCommand, transcribeCommand, timeoutMs } = config.speech;
  if (!recordCommand || !transcribeCommand) {
    throw new ConfigError(
      "Voice input needs speech.recordCommand and speech.transcribeCommand in voxdev.config.json."
    );
  }
  return { recordCommand, transcriber: new CommandTranscriber(transcribeCommand, timeoutMs) };
}

async function readSpokenUtterance(recordCommand: string, transcriber: CommandTranscriber): Promise<string> {
  const listening = spinner({ indicator: "dots" });
  listening.start("Listening...");
  try {
    const transcript = await transcribeRecording(transcriber, recordCommand);
    listening.stop(`Heard: "${transcript}"`);
    return transcript;
  } catch (error) {
    listening.stop("Did not catch that.");
    if (error instanceof VoxdevError && error.code === "COLLABORATOR") {
      log.warn(error.message);
      return "";
    }
    throw error;
  }
}

export async function runSession(rawOptions: SessionCommandOptions): Promise<void> {
  const mode = normalizeInputMode(rawOptions.input);
  const config = loadConfig({
    root: rawOptions.root,
    wakePhrase: rawOptions.wakePhrase,
    provider: rawOptions.provider,
    model: rawOptions.model
  });
  const speech = mode === "voice" ? requireSpeechCommands(config) : null;

  let activeSpinner: Spinner | null = null;
  const runtime = createRuntime(config, {
    onStatus: (message) => {
      if (activeSpinner) activeSpinner.message(message);
      else log.info(message);
    }
  });

  let stopRequested = false;
  const onInterrupt = (): void => {
    stopRequested = true;
    log.warn("Stopping after the current command...");
  };
  if (mode === "voice") process.once("SIGINT", onInterrupt);

  intro("voxdev session");
  log.info(`Workspace: ${config.root}`);
  log.info(
    mode === "voice"
      ? `Say "${config.wakePhrase}" before each command. Say "quit" to stop.`
      : "Type 'help' for the command list, 'quit' to leave."
  );

  try {
    while (!stopRequested) {
      const utterance = speech ? await readSpokenUtterance(speech.recordCommand, speech.transcriber) : await readTypedUtterance();
      if (utterance === null) break;
      if (!utterance.trim()) continue;

      const working = spinner({ indicator: "dots" });
      working.start("Working...");
      activeSpinner = working;
      let reply: AssistantReply;
      try {
        reply = await runtime.assistant.handle(utterance, mode);
      } catch (error) {
        working.stop("Failed", 1);
        throw error;
      } finally {
        activeSpinner = null;
      }
      working.stop(stopLabel(reply));
      reportReply(reply);

      if (config.speech.speakCommand && reply.type === "result") {
        await speak(config.speech.speakCommand, summarizeForSpeech(reply.result), config.speech.timeoutMs).catch(
          (error: unknown) => log.warn(error instanceof Error ? error.message : String(error))
        );
      }
      if (reply.type === "quit") break;
    }
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    const saved = await appendHistoryLog(
      config.root,
      runtime.context.getHistory(),
      runtime.context.startedAt,
      config.historyLimit
    );
    outro(saved > 0 ? `Session ended. ${saved} command(s) saved to history.` : "Session ended.");
  }
}
