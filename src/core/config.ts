import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import { AI_PROVIDERS } from "./types.js";
import type { AiProvider, DeploymentEnvironmentConfig, VoxdevConfig } from "./types.js";

export const CONFIG_FILE_NAME = "voxdev.config.json";
export const DEFAULT_ROOT = "workspace";
export const DEFAULT_WAKE_PHRASE = "hey assistant";
export const DEFAULT_HISTORY_LIMIT = 1000;

const DEFAULT_AI_TIMEOUT_SEC = 300;
const DEFAULT_TESTS_TIMEOUT_SEC = 300;
const DEFAULT_SPEECH_TIMEOUT_SEC = 60;
const DEFAULT_DEPLOY_TIMEOUT_SEC = 600;
const DEFAULT_ENVIRONMENTS = ["development", "staging", "production"] as const;

const timeoutSec = z.number().int().positive().max(24 * 60 * 60);
const commandLine = z.string().trim().min(1);

const configFileSchema = z
  .object({
    wakePhrase: z.string().optional(),
    historyLimit: z.number().int().positive().optional(),
    ai: z
      .object({
        provider: z.enum(AI_PROVIDERS).optional(),
        model: z.string().trim().min(1).optional(),
        timeoutSec: timeoutSec.optional()
      })
      .strict()
      .optional(),
    tests: z
      .object({
        command: commandLine.optional(),
        timeoutSec: timeoutSec.optional()
      })
      .strict()
      .optional(),
    speech: z
      .object({
        recordCommand: commandLine.optional(),
        transcribeCommand: commandLine.optional(),
        speakCommand: commandLine.optional(),
        timeoutSec: timeoutSec.optional()
      })
      .strict()
      .optional(),
    deployments: z
      .record(
        z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "environment names are letters, digits, - and _"),
        z
          .object({
            commands: z.array(commandLine).optional(),
            timeoutSec: timeoutSec.optional()
          })
          .strict()
      )
      .optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface ConfigOverrides {
  root?: string | undefined;
  wakePhrase?: string | undefined;
  provider?: string | undefined;
  model?: string | undefined;
}

function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error
    });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${path}.`, { details: { issues } });
  }
  return parsed.data;
}

export function normalizeAiProvider(value: string | undefined, source: string): AiProvider | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  const match = AI_PROVIDERS.find((provider) => provider === normalized);
  if (!match) {
    throw new ConfigError(`Invalid AI provider "${value}" from ${source}. Expected one of: ${AI_PROVIDERS.join(", ")}.`);
  }
  return match;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function resolveDeployments(file: ConfigFile["deployments"]): Record<string, DeploymentEnvironmentConfig> {
  const deployments: Record<string, DeploymentEnvironmentConfig> = {};
  for (const environment of DEFAULT_ENVIRONMENTS) {
    deployments[environment] = { commands: [], timeoutMs: DEFAULT_DEPLOY_TIMEOUT_SEC * 1000 };
  }
  for (const [environment, settings] of Object.entries(file ?? {})) {
    deployments[environment] = {
      commands: settings.commands ?? [],
      timeoutMs: (settings.timeoutSec ?? DEFAULT_DEPLOY_TIMEOUT_SEC) * 1000
    };
  }
  return deployments;
}

/**
 * Resolves configuration from, in increasing precedence: defaults,
 * `<root>/voxdev.config.json`, `VOXDEV_*` environment variables, CLI flags.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): VoxdevConfig {
  const root = resolve(nonEmpty(overrides.root) ?? nonEmpty(env.VOXDEV_ROOT) ?? DEFAULT_ROOT);
  const file = readConfigFile(join(root, CONFIG_FILE_NAME));

  const provider =
    normalizeAiProvider(nonEmpty(overrides.provider), "--provider") ??
    normalizeAiProvider(nonEmpty(env.VOXDEV_AI_PROVIDER), "VOXDEV_AI_PROVIDER") ??
    file.ai?.provider ??
    "auto";
  const model = nonEmpty(overrides.model) ?? nonEmpty(env.VOXDEV_AI_MODEL) ?? file.ai?.model;
  const wakePhrase = (overrides.wakePhrase ?? env.VOXDEV_WAKE_PHRASE ?? file.wakePhrase ?? DEFAULT_WAKE_PHRASE).trim();

  return {
    root,
    wakePhrase,
    historyLimit: file.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    ai: {
      provider,
      model,
      timeoutMs: (file.ai?.timeoutSec ?? DEFAULT_AI_TIMEOUT_SEC) * 1000
    },
    tests: {
      command: file.tests?.command,
      timeoutMs: (file.tests?.timeoutSec ?? DEFAULT_TESTS_TIMEOUT_SEC) * 1000
    },
    speech: {
      recordCommand: file.speech?.recordCommand,
      transcribeCommand: file.speech?.transcribeCommand,
      speakCommand: file.speech?.speakCommand,
      timeoutMs: (file.speech?.timeoutSec ?? DEFAULT_SPEECH_TIMEOUT_SEC) * 1000
    },
    deployments: resolveDeployments(file.deployments)
  };
}
