export const AI_PROVIDERS = ["auto", "codex", "claude"] as const;

export type AiProvider = (typeof AI_PROVIDERS)[number];

export interface AiConfig {
  provider: AiProvider;
  model?: string | undefined;
  timeoutMs: number;
}

export interface TestsConfig {
  /** Shell-style command line; auto-detected from the project files when absent. */
  command?: string | undefined;
  timeoutMs: number;
}

export interface SpeechConfig {
  recordCommand?: string | undefined;
  transcribeCommand?: string | undefined;
  speakCommand?: string | undefined;
  timeoutMs: number;
}

export interface DeploymentEnvironmentConfig {
  commands: string[];
  timeoutMs: number;
}

export interface VoxdevConfig {
  root: string;
  wakePhrase: string;
  historyLimit: number;
  ai: AiConfig;
  tests: TestsConfig;
  speech: SpeechConfig;
  deployments: Record<string, DeploymentEnvironmentConfig>;
}
