import type { StatusCallback } from "../types.js";
import type { ResolvedAiProvider } from "./provider-selection.js";

export function startLiveStatus(provider: ResolvedAiProvider, onStatus?: StatusCallback): () => void {
  if (!onStatus) return () => {};

  const cycle = [
    `Waiting for ${provider} to accept the request...`,
    `${provider} is writing the file...`,
    `${provider} is still working on the edit...`
  ];

  const startedAt = Date.now();
  let index = 0;
  const timer = setInterval(() => {
    const elapsedSeconds = Math.floor((Date.now() - startedAt) / 1000);
    onStatus(`${cycle[index % cycle.length]} (${elapsedSeconds}s)`);
    index += 1;
  }, 1400);

  return () => clearInterval(timer);
}
