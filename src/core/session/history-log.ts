import { join } from "node:path";

import { z } from "zod";

import { readJsonIfExists, writeJsonAtomic } from "../write.js";
import type { HistoryEntry } from "./context.js";

export const HISTORY_FILE = join("logs", "command-history.json");

const persistedEntrySchema = z.object({
  at: z.string(),
  sessionStartedAt: z.string(),
  kind: z.string(),
  rawText: z.string(),
  status: z.enum(["ok", "rejected", "failed"]),
  reason: z.string().optional(),
  message: z.string()
});

export type PersistedHistoryEntry = z.infer<typeof persistedEntrySchema>;

const historyFileSchema = z.array(persistedEntrySchema);

export function toPersistedEntry(entry: HistoryEntry, sessionStartedAt: string): PersistedHistoryEntry {
  const { result } = entry;
  return {
    at: entry.at,
    sessionStartedAt,
    kind: entry.command.kind,
    rawText: entry.command.rawText,
    status: result.status,
    ...(result.status === "ok" ? {} : { reason: result.reason }),
    message: result.message
  };
}

export async function readHistoryLog(root: string): Promise<PersistedHistoryEntry[]> {
  const parsed = historyFileSchema.safeParse((await readJsonIfExists(join(root, HISTORY_FILE))) ?? []);
  return parsed.success ? parsed.data : [];
}

/** Appends a session's history, keeping only the newest `limit` entries on disk. */
export async function appendHistoryLog(
  root: string,
  entries: readonly HistoryEntry[],
  sessionStartedAt: string,
  limit: number
): Promise<number> {
  if (entries.length === 0) return 0;
  const existing = await readHistoryLog(root);
  const combined = [...existing, ...entries.map((entry) => toPersistedEntry(entry, sessionStartedAt))].slice(-limit);

  await writeJsonAtomic(join(root, HISTORY_FILE), combined);
  return entries.length;
}
