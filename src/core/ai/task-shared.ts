import type { AiProvider, StatusCallback } from "../types.js";
import { chooseProvider } from "./provider-selection.js";
import type { ResolvedAiProvider } from "./provider-selection.js";
import { startLiveStatus } from "./status.js";

type ProviderResolution =
  | {
      provider: ResolvedAiProvider;
    }
  | {
      provider: null;
      warning: string;
    };

export function resolveProviderForTask(options: {
  provider: AiProvider;
  onStatus: StatusCallback | undefined;
  warningMessage: string;
  hasBinary?: ((command: string) => boolean) | undefined;
}): ProviderResolution {
  options.onStatus?.("Checking available AI CLIs...");
  const provider = chooseProvider(options.provider, options.hasBinary);
  if (!provider) {
    return {
      provider: null,
      warning: options.warningMessage
    };
  }
  return { provider };
}

export async function runWithLiveStatus<T>(
  provider: ResolvedAiProvider,
  onStatus: StatusCallback | undefined,
  runTask: () => Promise<T>
): Promise<T> {
  const stopLiveStatus = startLiveStatus(provider, onStatus);
  try {
    return await runTask();
  } finally {
    stopLiveStatus();
  }
}
