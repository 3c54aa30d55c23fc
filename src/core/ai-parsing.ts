import { z } from "zod";

export const fileContentReplySchema = z.object({
  content: z.string(),
  summary: z.string().optional()
});

export type FileContentReply = z.infer<typeof fileContentReplySchema>;

const FENCED_JSON = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i;
const MAX_ENVELOPE_DEPTH = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Finds the JSON value in a CLI reply: the whole text, a fenced ```json block,
 * or the last line that holds an object (codex prints its final message after
 * the transcript and before the token count).
 */
function readReplyJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  const whole = tryJson(trimmed);
  if (whole !== undefined) return whole;

  const fenced = FENCED_JSON.exec(trimmed)?.[1];
  if (fenced) {
    const parsed = tryJson(fenced.trim());
    if (parsed !== undefined) return parsed;
  }

  const lines = trimmed.split(/\r?\n/).map((line) => line.trim());
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const line = lines[index] ?? "";
    if (!line.startsWith("{") || !line.endsWith("}")) continue;
    const parsed = tryJson(line);
    if (isRecord(parsed)) return parsed;
  }
  return undefined;
}

// claude wraps the answer in { structured_output } or a { result } string.
function unwrapEnvelope(value: unknown, depth = 0): unknown {
  if (depth > MAX_ENVELOPE_DEPTH) return value;
  if (typeof value === "string") {
    const inner = readReplyJson(value);
    return inner === undefined || inner === value ? value : unwrapEnvelope(inner, depth + 1);
  }
  if (!isRecord(value) || "content" in value) return value;
  if (isRecord(value.structured_output)) return value.structured_output;
  if (typeof value.result === "string") return unwrapEnvelope(value.result, depth + 1);
  return value;
}

/** Extracts `{ content, summary? }` from codex or claude stdout; null when absent. */
export function extractFileContent(raw: string): FileContentReply | null {
  const found = readReplyJson(raw);
  if (found === undefined) return null;
  const validated = fileContentReplySchema.safeParse(unwrapEnvelope(found));
  return validated.success ? validated.data : null;
}
