import { spawn } from "node:child_process";
import { Readable } from "node:stream";

import { CollaboratorFailure, CollaboratorTimeoutError, TranscriptionError } from "../errors.js";
import { runCommand, summarizeFailure } from "../process-runner.js";
import { splitCommandLine } from "../text.js";
import type { Transcriber } from "../types.js";

function parseCommandLine(commandLine: string, label: string): { command: string; args: string[] } {
  const [command, ...args] = splitCommandLine(commandLine);
  if (!command) {
    throw new CollaboratorFailure(`The ${label} command is empty.`);
  }
  return { command, args };
}

/**
 * Speech-to-text through an external command: audio goes to its stdin, the
 * transcript is read from its stdout.
 */
export class CommandTranscriber implements Transcriber {
  constructor(
    private readonly commandLine: string,
    private readonly timeoutMs: number
  ) {}

  async transcribe(audio: Readable): Promise<string> {
    const { command, args } = parseCommandLine(this.commandLine, "transcribe");
    const result = await runCommand(command, args, { input: audio, timeoutMs: this.timeoutMs });
    if (result.timedOut) {
      throw new CollaboratorTimeoutError(`Transcription did not finish (${summarizeFailure(result)}).`);
    }
    if (!result.ok) {
      throw new TranscriptionError(`Transcription failed (${summarizeFailure(result)}).`);
    }
    const transcript = result.stdout.replace(/\s+/g, " ").trim();
    if (!transcript) {
      throw new TranscriptionError("Transcription returned no text.");
    }
    return transcript;
  }
}

export interface Recording {
  audio: Readable;
  /** Kills the recorder if it is still running. */
  stop(): void;
}

/**
 * Starts the configured recorder. The recorder decides when the utterance
 * ends (a fixed duration or silence detection); a non-zero exit surfaces as
 * an error on `audio`.
 */
export function openRecording(commandLine: string): Recording {
  const { command, args } = parseCommandLine(commandLine, "record");
  const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
  const audio = child.stdout;
  let stderr = "";
  child.stderr.setEncoding("utf8");
  child.stderr.on("data", (chunk: string) => {
    stderr = `${stderr}${chunk}`.slice(-2048);
  });
  child.on("error", (error) => {
    audio.destroy(new TranscriptionError(`Could not start recorder: ${error.message}`, { cause: error }));
  });
  child.on("close", (code) => {
    if (code !== 0 && code !== null) {
      audio.destroy(new TranscriptionError(`Recorder exited with code ${code}: ${stderr.trim()}`));
    }
  });

  return {
    audio,
    stop: () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill("SIGTERM");
      }
    }
  };
}

/** Records one utterance and transcribes it; the recorder never outlives the call. */
export async function transcribeRecording(transcriber: Transcriber, recordCommand: string): Promise<string> {
  const recording = openRecording(recordCommand);
  try {
    return await transcriber.transcribe(recording.audio);
  } finally {
    recording.stop();
  }
}

/** Reads `text` aloud through the configured speak command (text on stdin). */
export async function speak(commandLine: string, text: string, timeoutMs: number): Promise<void> {
  const { command, args } = parseCommandLine(commandLine, "speak");
  const result = await runCommand(command, args, { input: Readable.from([text]), timeoutMs });
  if (!result.ok) {
    throw new CollaboratorFailure(`Speech output failed (${summarizeFailure(result)}).`);
  }
}
