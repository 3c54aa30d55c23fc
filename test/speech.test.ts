import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CommandTranscriber, openRecording, speak, transcribeRecording } from "../src/core/collaborators/speech.js";
import { CollaboratorFailure, TranscriptionError } from "../src/core/errors.js";

const node = `"${process.execPath}"`;
const echoStdin = `${node} -e "process.stdin.pipe(process.stdout)"`;

describe("CommandTranscriber", () => {
  it("returns the collapsed transcript", async () => {
    const transcriber = new CommandTranscriber(echoStdin, 10_000);
    expect(await transcriber.transcribe(Readable.from(["  open   project\n demo "]))).toBe("open project demo");
  });

  it("transcribes audio from the recorder", async () => {
    const transcriber = new CommandTranscriber(echoStdin, 10_000);
    const recording = openRecording(`${node} -e "process.stdout.write('hey assistant list projects')"`);
    expect(await transcriber.transcribe(recording.audio)).toBe("hey assistant list projects");
  });

  it("fails on silence", async () => {
    const transcriber = new CommandTranscriber(`${node} -e "process.stdin.resume()"`, 10_000);
    await expect(transcriber.transcribe(Readable.from(["noise"]))).rejects.toThrow("Transcription returned no text.");
  });

  it("fails when the transcriber exits non-zero", async () => {
    const transcriber = new CommandTranscriber(`${node} -e "process.exit(4)"`, 10_000);
    const failure = transcriber.transcribe(Readable.from(["noise"]));
    await expect(failure).rejects.toBeInstanceOf(TranscriptionError);
    await expect(failure).rejects.toMatchObject({ reason: "TranscriptionError" });
  });

  it("refuses an empty command", async () => {
    await expect(new CommandTranscriber("  ", 1_000).transcribe(Readable.from([""]))).rejects.toBeInstanceOf(
      CollaboratorFailure
    );
  });
});

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe("transcribeRecording", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "voxdev-speech-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("stops the recorder when transcription fails", async () => {
    const pidFile = join(dir, "recorder.pid");
    const recorder = `${node} -e "require('fs').writeFileSync(process.argv[1], String(process.pid)); setInterval(() => process.stdout.write('audio'), 10)" "${pidFile}"`;
    const transcriber = new CommandTranscriber(`${node} -e "process.stdin.once('data', () => process.exit(4))"`, 10_000);

    await expect(transcribeRecording(transcriber, recorder)).rejects.toBeInstanceOf(TranscriptionError);

    const pid = Number(readFileSync(pidFile, "utf8"));
    await vi.waitFor(() => expect(isRunning(pid)).toBe(false), { timeout: 5_000, interval: 50 });
  });

  it("returns the transcript of a finished recording", async () => {
    const transcriber = new CommandTranscriber(echoStdin, 10_000);
    await expect(
      transcribeRecording(transcriber, `${node} -e "process.stdout.write('hey assistant run tests')"`)
    ).resolves.toBe("hey assistant run tests");
  });
});

describe("speak", () => {
  it("sends the text to the speak command", async () => {
    await expect(speak(`${node} -e "process.stdin.resume()"`, "Created project demo.", 10_000)).resolves.toBeUndefined();
  });

  it("reports a failing speak command", async () => {
    await expect(speak(`${node} -e "process.exit(1)"`, "hello", 10_000)).rejects.toThrow("Speech output failed");
  });
});
