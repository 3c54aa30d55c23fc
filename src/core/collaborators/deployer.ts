import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { z } from "zod";

import { CollaboratorTimeoutError } from "../errors.js";
import { runCommand, summarizeFailure } from "../process-runner.js";
import { splitCommandLine, toTimestampId } from "../text.js";
import { isMissingFileError, readJsonIfExists, writeJsonAtomic } from "../write.js";
import type {
  Deployer,
  DeploymentRecord,
  DeploymentReport,
  DeploymentTarget,
  ProjectFiles,
  StatusCallback
} from "../types.js";

const deploymentRecordSchema = z.object({
  project: z.string(),
  environment: z.string(),
  version: z.string(),
  deployedAt: z.string(),
  location: z.string(),
  success: z.boolean(),
  rollback: z.boolean().optional()
});

const statusFileSchema = z.array(deploymentRecordSchema);

type StepsOutcome = { status: "passed" } | { status: "failed" } | { status: "timeout"; message: string };

export interface DirectoryDeployerOptions {
  now?: () => Date;
  onStatus?: StatusCallback | undefined;
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}

/**
 * Copies a project's files into `<root>/deployments/<project>/<environment>/<version>/`
 * and runs the environment's commands there, in order, stopping at the first failure.
 * Every attempt is appended to `<root>/deployments/status.json`.
 */
export class DirectoryDeployer implements Deployer {
  private readonly now: () => Date;

  constructor(
    readonly root: string,
    private readonly options: DirectoryDeployerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  statusFile(): string {
    return join(this.root, "deployments", "status.json");
  }

  async readStatus(): Promise<DeploymentRecord[]> {
    const parsed = statusFileSchema.safeParse((await readJsonIfExists(this.statusFile())) ?? []);
    return parsed.success ? parsed.data : [];
  }

  async history(projectName: string): Promise<DeploymentRecord[]> {
    return (await this.readStatus()).filter((record) => record.project === projectName);
  }

  private async appendStatus(record: DeploymentRecord): Promise<void> {
    await writeJsonAtomic(this.statusFile(), [...(await this.readStatus()), record]);
  }

  private async runSteps(location: string, target: DeploymentTarget, log: string[]): Promise<StepsOutcome> {
    for (const commandLine of target.commands) {
      const [command, ...args] = splitCommandLine(commandLine);
      if (!command) continue;
      this.options.onStatus?.(`Running ${commandLine}...`);
      const result = await runCommand(command, args, { cwd: location, timeoutMs: target.timeoutMs });
      log.push(`$ ${commandLine}`, `${result.stdout}${result.stderr}`.trim());
      if (result.timedOut) {
        return {
          status: "timeout",
          message: `Deployment step "${commandLine}" did not finish (${summarizeFailure(result)}).`
        };
      }
      if (!result.ok) {
        log.push(`Step failed: ${result.reason ?? "unknown error"}`);
        return { status: "failed" };
      }
    }
    return { status: "passed" };
  }

  private async finish(
    record: Omit<DeploymentRecord, "success">,
    outcome: StepsOutcome,
    log: string[]
  ): Promise<DeploymentReport> {
    const success = outcome.status === "passed";
    await this.appendStatus({ ...record, success });
    if (outcome.status === "timeout") {
      throw new CollaboratorTimeoutError(outcome.message);
    }
    return {
      success,
      log: log.filter((line) => line.length > 0).join("\n"),
      location: record.location,
      version: record.version
    };
  }

  async deploy(files: ProjectFiles, target: DeploymentTarget): Promise<DeploymentReport> {
    const deployedAt = this.now();
    const version = toTimestampId(deployedAt);
    const location = join(this.root, "deployments", target.projectName, target.environment, version);
    const log: string[] = [];

    this.options.onStatus?.(`Copying ${Object.keys(files).length} file(s) to ${location}...`);
    for (const [path, content] of Object.entries(files)) {
      const destination = join(location, path);
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, content, "utf8");
    }
    await mkdir(location, { recursive: true });
    log.push(`Copied ${Object.keys(files).length} file(s) to ${location}`);

    const outcome = await this.runSteps(location, target, log);
    return this.finish(
      {
        project: target.projectName,
        environment: target.environment,
        version,
        deployedAt: deployedAt.toISOString(),
        location
      },
      outcome,
      log
    );
  }

  async redeploy(record: DeploymentRecord, target: DeploymentTarget): Promise<DeploymentReport> {
    const rollback = {
      project: target.projectName,
      environment: target.environment,
      version: record.version,
      deployedAt: this.now().toISOString(),
      location: record.location,
      rollback: true
    };
    const log = [`Rolling back to ${record.version} in ${record.location}`];

    if (!(await directoryExists(record.location))) {
      log.push(`Deployment directory ${record.location} no longer exists.`);
      return this.finish(rollback, { status: "failed" }, log);
    }
    return this.finish(rollback, await this.runSteps(record.location, target, log), log);
  }
}
