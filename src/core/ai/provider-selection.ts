import { spawnSync } from "node:child_process";

import type { AiProvider } from "../types.js";

export type ResolvedAiProvider = Exclude<AiProvider, "auto">;

const PROVIDER_PREFERENCE: readonly ResolvedAiProvider[] = ["codex", "claude"];

function hasBinary(command: string): boolean {
  const locator = process.platform === "win32" ? "where" : "which";
  const lookup = spawnSync(locator, [command], { encoding: "utf8" });
  return lookup.status === 0;
}

export function chooseProvider(requested: AiProvider, isInstalled: (command: string) => boolean = hasBinary): ResolvedAiProvider | null {
  if (requested !== "auto") return isInstalled(requested) ? requested : null;

  for (const candidate of PROVIDER_PREFERENCE) {
    if (isInstalled(candidate)) return candidate;
  }

  return null;
}
