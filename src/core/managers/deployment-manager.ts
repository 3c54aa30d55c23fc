import { failed, ok } from "../result.js";
import type {
  Deployer,
  DeploymentEnvironmentConfig,
  DeploymentRecord,
  DeploymentTarget,
  FailedResult,
  PayloadOf,
  Result
} from "../types.js";
import type { WorkspaceStore } from "../workspace/workspace-store.js";

type DeploymentResult = Result<PayloadOf<"deployment">>;

export class DeploymentManager {
  constructor(
    private readonly store: WorkspaceStore,
    private readonly deployer: Deployer,
    private readonly environments: Readonly<Record<string, DeploymentEnvironmentConfig>>
  ) {}

  knownEnvironments(): string[] {
    return Object.keys(this.environments).sort();
  }

  private targetFor(projectName: string, environment: string): DeploymentTarget | FailedResult<never> {
    const settings = Object.hasOwn(this.environments, environment) ? this.environments[environment] : undefined;
    if (!settings) {
      return failed(
        "NotFound",
        `Unknown deployment environment "${environment}". Known: ${this.knownEnvironments().join(", ") || "none"}.`
      );
    }
    return { projectName, environment, commands: settings.commands, timeoutMs: settings.timeoutMs };
  }

  async deploy(projectName: string, environment: string): Promise<DeploymentResult> {
    const target = this.targetFor(projectName, environment);
    if ("status" in target) return target;

    const project = await this.store.getProject(projectName);
    if (!project) return failed("NotFound", `Project "${projectName}" not found.`);

    const report = await this.deployer.deploy(project.files, target);
    const payload: PayloadOf<"deployment"> = { type: "deployment", project: projectName, environment, report };
    if (!report.success) {
      return failed("CollaboratorError", `Deployment of "${projectName}" to ${environment} failed.`, payload);
    }
    return ok(`Deployed "${projectName}" to ${environment}.`, payload);
  }

  /**
   * Re-activates an earlier successful deployment. Without a version, picks the
   * newest successful one whose version differs from the active deployment.
   */
  async rollback(projectName: string, environment: string, version?: string | undefined): Promise<DeploymentResult> {
    const target = this.targetFor(projectName, environment);
    if ("status" in target) return target;

    const successful = (await this.deployer.history(projectName)).filter(
      (record) => record.environment === environment && record.success
    );
    const active = successful[successful.length - 1];
    if (!active) {
      return failed("NotFound", `"${projectName}" has no successful deployment to ${environment}.`);
    }

    let chosen: DeploymentRecord | undefined;
    if (version === undefined) {
      chosen = [...successful].reverse().find((record) => record.version !== active.version);
      if (!chosen) {
        return failed("NotFound", `No earlier deployment of "${projectName}" to ${environment} to roll back to.`);
      }
    } else {
      chosen = successful.find((record) => record.version === version);
      if (!chosen) {
        return failed("NotFound", `No successful deployment ${version} of "${projectName}" to ${environment}.`);
      }
    }

    const report = await this.deployer.redeploy(chosen, target);
    const payload: PayloadOf<"deployment"> = { type: "deployment", project: projectName, environment, report };
    if (!report.success) {
      return failed("CollaboratorError", `Rollback of "${projectName}" in ${environment} to ${chosen.version} failed.`, payload);
    }
    return ok(`Rolled "${projectName}" in ${environment} back to ${chosen.version}.`, payload);
  }

  async status(projectName: string, environment?: string | undefined): Promise<Result<PayloadOf<"deployment-status">>> {
    if (environment !== undefined) {
      const target = this.targetFor(projectName, environment);
      if ("status" in target) return target;
    }

    const deployments = (await this.deployer.history(projectName)).filter(
      (record) => environment === undefined || record.environment === environment
    );
    const scope = environment === undefined ? "" : ` to ${environment}`;
    const message =
      deployments.length === 0
        ? `No deployments of "${projectName}"${scope} yet.`
        : `${deployments.length} deployment(s) of "${projectName}"${scope}.`;
    return ok(message, { type: "deployment-status", project: projectName, deployments });
  }
}
