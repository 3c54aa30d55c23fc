import { extractFileContent } from "../ai-parsing.js";
import { CollaboratorTimeoutError, GenerationError, RateLimitedError } from "../errors.js";
import { summarizeFailure } from "../process-runner.js";
import type { AiProvider, CodeGenerator, GenerationContext, StatusCallback } from "../types.js";
import { buildFileEditPrompt } from "./prompts.js";
import { runStructuredTask } from "./providers.js";
import { fileContentOutputSchema } from "./schemas.js";
import { resolveProviderForTask, runWithLiveStatus } from "./task-shared.js";

const RATE_LIMIT_MARKERS = [
  "rate limit",
  "rate_limit",
  "ratelimit",
  "too many requests",
  "status 429",
  "error 429",
  "usage limit",
  "quota exceeded"
] as const;

export function hasRateLimitSignal(output: string): boolean {
  const lower = output.toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => lower.includes(marker));
}

export interface CliCodeGeneratorOptions {
  provider: AiProvider;
  model?: string | undefined;
  timeoutMs?: number | undefined;
  onStatus?: StatusCallback | undefined;
  /** Checks for a provider binary on PATH; defaults to `which`. */
  hasBinary?: ((command: string) => boolean) | undefined;
}

/** Generates whole-file content through the codex or claude CLI in structured-output mode. */
export class CliCodeGenerator implements CodeGenerator {
  constructor(private readonly options: CliCodeGeneratorOptions) {}

  async generate(prompt: string, context: GenerationContext): Promise<string> {
    const onStatus = this.options.onStatus;
    const resolved = resolveProviderForTask({
      provider: this.options.provider,
      onStatus,
      hasBinary: this.options.hasBinary,
      warningMessage: "No compatible `codex` or `claude` binary was found on PATH."
    });
    if (!resolved.provider) {
      throw new GenerationError(resolved.warning);
    }

    const provider = resolved.provider;
    onStatus?.(`Using ${provider}${this.options.model ? ` (${this.options.model})` : ""} to edit ${context.targetPath}...`);

    const result = await runWithLiveStatus(provider, onStatus, () =>
      runStructuredTask(provider, buildFileEditPrompt(prompt, context), fileContentOutputSchema, {
        onStatus,
        model: this.options.model,
        timeoutMs: this.options.timeoutMs
      })
    );

    if (result.timedOut) {
      throw new CollaboratorTimeoutError(`${provider} did not answer in time (${summarizeFailure(result)}).`);
    }
    if (!result.ok) {
      const failure = summarizeFailure(result);
      // Only a failed run can be rate limited; generated code may mention 429 freely.
      if (hasRateLimitSignal(`${result.stderr}\n${failure}`)) {
        throw new RateLimitedError(`${provider} is rate limited; try again later.`, { details: { reason: failure } });
      }
      throw new GenerationError(`Could not get usable output from ${provider} (${failure}).`);
    }
    if (!result.stdout.trim()) {
      throw new GenerationError(`${provider} finished without output.`);
    }

    onStatus?.("AI response received. Validating JSON...");
    const parsed = extractFileContent(result.stdout);
    if (!parsed) {
      throw new GenerationError(`${provider} responded, but the output was not valid file-content JSON.`);
    }
    return parsed.content;
  }
}
