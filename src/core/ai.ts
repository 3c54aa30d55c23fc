export { CliCodeGenerator, hasRateLimitSignal } from "./ai/generation-task.js";
export type { CliCodeGeneratorOptions } from "./ai/generation-task.js";
export { chooseProvider } from "./ai/provider-selection.js";
export type { ResolvedAiProvider } from "./ai/provider-selection.js";
