import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

export function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export function isMissingFileError(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

/** Name prefix of in-flight temp files; project paths may not use it. */
export const PENDING_WRITE_PREFIX = ".voxdev-tmp-";

/** Writes through a sibling temp file and a rename, so readers never see a partial file. */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = join(dirname(path), `${PENDING_WRITE_PREFIX}${randomUUID().slice(0, 8)}-${basename(path)}`);
  await writeFile(tmpPath, content, "utf8");
  await rename(tmpPath, path);
}

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeFileAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

/** Parsed JSON, or null when the file does not exist. Malformed JSON throws. */
export async function readJsonIfExists(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
  return JSON.parse(raw);
}
