import type { Readable } from "node:stream";

import type { ProjectFiles } from "./project.js";

export type StatusCallback = (message: string) => void;

export interface Transcriber {
  transcribe(audio: Readable): Promise<string>;
}

export interface GenerationContext {
  projectName: string;
  targetPath: string;
  projectFiles: ProjectFiles;
}

export interface CodeGenerator {
  generate(prompt: string, context: GenerationContext): Promise<string>;
}

export interface TestRunOptions {
  pattern?: string;
}

export interface TestRunReport {
  passed: number;
  failed: number;
  log: string;
}

export interface TestRunner {
  runTests(projectFiles: ProjectFiles, options?: TestRunOptions): Promise<TestRunReport>;
}

export interface DeploymentTarget {
  projectName: string;
  environment: string;
  commands: string[];
  timeoutMs: number;
}

export interface DeploymentReport {
  success: boolean;
  log: string;
  location?: string;
  /** Timestamp id of the deployment directory. */
  version?: string;
}

/** One line of the deployment history, oldest first. */
export interface DeploymentRecord {
  project: string;
  environment: string;
  version: string;
  deployedAt: string;
  location: string;
  success: boolean;
  rollback?: boolean | undefined;
}

export interface Deployer {
  deploy(projectFiles: ProjectFiles, target: DeploymentTarget): Promise<DeploymentReport>;
  /** Runs the target's commands again in an earlier deployment's directory. */
  redeploy(record: DeploymentRecord, target: DeploymentTarget): Promise<DeploymentReport>;
  history(projectName: string): Promise<DeploymentRecord[]>;
}
