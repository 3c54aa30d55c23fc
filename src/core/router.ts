import { ExecutionError, failureReasonOf, normalizeError } from "./errors.js";
import type { CodeManager } from "./managers/code-manager.js";
import type { DeploymentManager } from "./managers/deployment-manager.js";
import type { ProjectManager } from "./managers/project-manager.js";
import type { TestManager } from "./managers/test-manager.js";
import { failed, rejected } from "./result.js";
import type { SessionContext } from "./session/context.js";
import { isValidProjectName } from "./text.js";
import type { Command, CommandKind, CreateFileCommand, RejectedResult, Result, ResultPayload } from "./types.js";
import { isTargetDirectory, normalizeProjectPath, normalizeRelativePath } from "./workspace/paths.js";

export type ManagerName = "project" | "code" | "test" | "deployment";

export const ROUTING_TABLE = {
  CreateProject: "project",
  LoadProject: "project",
  ListProjects: "project",
  DeleteProject: "project",
  BackupProject: "project",
  RestoreProject: "project",
  ListBackups: "project",
  ShowProjectFiles: "project",
  CreateFile: "code",
  EditFile: "code",
  ShowFile: "code",
  RunTests: "test",
  GenerateTests: "test",
  Deploy: "deployment",
  RollbackDeployment: "deployment",
  DeploymentStatus: "deployment"
} as const satisfies Record<CommandKind, ManagerName>;

const WITHOUT_ACTIVE_PROJECT: ReadonlySet<CommandKind> = new Set<CommandKind>([
  "CreateProject",
  "LoadProject",
  "ListProjects",
  "RestoreProject",
  "ListBackups"
]);

const ENVIRONMENT_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;
const BACKUP_TIMESTAMP = /^[A-Za-z0-9][A-Za-z0-9-]{0,63}$/;
const DEPLOYMENT_VERSION = /^\d{8}T\d{9}Z$/;

export function requiresActiveProject(kind: CommandKind): boolean {
  return !WITHOUT_ACTIVE_PROJECT.has(kind);
}

export interface RouterManagers {
  project: ProjectManager;
  code: CodeManager;
  test: TestManager;
  deployment: DeploymentManager;
}

function invalid(message: string): RejectedResult {
  return rejected("InvalidArgument", message);
}

function checkProjectName(name: string | undefined): RejectedResult | null {
  if (name === undefined || isValidProjectName(name)) return null;
  return invalid(
    `"${name}" is not a valid project name (letters, digits, ".", "_" and "-", starting with a letter or digit, at most 64 characters).`
  );
}

function checkFileName(fileName: string): RejectedResult | null {
  return normalizeRelativePath(fileName) ? null : invalid(`"${fileName}" is not a safe relative file name.`);
}

function checkEnvironment(environment: string | undefined): RejectedResult | null {
  if (environment === undefined || ENVIRONMENT_NAME.test(environment)) return null;
  return invalid(`"${environment}" is not a valid environment name.`);
}

function checkNonEmpty(value: string, slot: string): RejectedResult | null {
  return value.trim() ? null : invalid(`The ${slot} must not be empty.`);
}

function createFilePath(command: CreateFileCommand): string {
  const fileName = normalizeRelativePath(command.fileName) ?? command.fileName;
  return `${command.targetDirectory.toLowerCase()}/${fileName}`;
}

/** Argument shape checks that need no workspace access. */
export function validateCommand(command: Command): RejectedResult | null {
  switch (command.kind) {
    case "CreateProject":
    case "LoadProject":
    case "DeleteProject":
    case "BackupProject":
    case "ListBackups":
    case "ShowProjectFiles":
      return checkProjectName(command.name);
    case "RestoreProject":
      if (command.timestamp !== undefined && !BACKUP_TIMESTAMP.test(command.timestamp)) {
        return invalid(`"${command.timestamp}" is not a backup timestamp.`);
      }
      return checkProjectName(command.name);
    case "ListProjects":
      return null;
    case "CreateFile": {
      if (!isTargetDirectory(command.targetDirectory.toLowerCase())) {
        return invalid(`Files live in src, tests or docs, not "${command.targetDirectory}".`);
      }
      const path = createFilePath(command);
      return checkFileName(command.fileName) ?? (normalizeProjectPath(path) ? null : invalid(`"${path}" is not a valid path.`));
    }
    case "EditFile":
      // Literal content may be empty: "replace with" clears the file.
      return (
        checkFileName(command.fileName) ??
        (command.edit.type === "prompt" ? checkNonEmpty(command.edit.prompt, "edit instruction") : null)
      );
    case "ShowFile":
      return checkFileName(command.fileName);
    case "RunTests":
      return command.pattern === undefined ? null : checkNonEmpty(command.pattern, "test pattern");
    case "GenerateTests":
      return checkFileName(command.fileName);
    case "Deploy":
      return checkEnvironment(command.environment);
    case "RollbackDeployment":
      if (command.version !== undefined && !DEPLOYMENT_VERSION.test(command.version)) {
        return invalid(`"${command.version}" is not a deployment version (e.g. 20261018T150812345Z).`);
      }
      return checkEnvironment(command.environment);
    case "DeploymentStatus":
      return checkEnvironment(command.environment);
  }
}

/**
 * Single entry point from a parsed Command to a Result. Checks the active
 * project and argument shape, calls the owning manager, applies the session
 * effects of a success and records every dispatch in the session history.
 * Never throws.
 */
export class CommandRouter {
  constructor(private readonly managers: RouterManagers) {}

  async dispatch(command: Command, ctx: SessionContext): Promise<Result<ResultPayload>> {
    const result = await this.execute(command, ctx);
    ctx.appendHistory(command, result);
    return result;
  }

  private async execute(command: Command, ctx: SessionContext): Promise<Result<ResultPayload>> {
    if (requiresActiveProject(command.kind) && ctx.getCurrent() === null) {
      return rejected("NoActiveProject", "No project is loaded. Create or load a project first.");
    }

    const invalidArgument = validateCommand(command);
    if (invalidArgument) return invalidArgument;

    let result: Result<ResultPayload>;
    try {
      result = await this.route(command, ctx);
    } catch (error) {
      const normalized = normalizeError(error);
      return failed(failureReasonOf(error), `${ROUTING_TABLE[command.kind]} manager: ${normalized.message}`);
    }

    if (result.status === "ok") {
      this.applyEffects(command, result.payload, ctx);
    }
    return result;
  }

  private active(ctx: SessionContext): string {
    const current = ctx.getCurrent();
    if (current === null) {
      throw new ExecutionError("No project is loaded.");
    }
    return current;
  }

  private async route(command: Command, ctx: SessionContext): Promise<Result<ResultPayload>> {
    const { project, code, test, deployment } = this.managers;
    switch (command.kind) {
      case "CreateProject":
        return project.create(command.name, command.description);
      case "LoadProject":
        return project.load(command.name);
      case "ListProjects":
        return project.list();
      case "DeleteProject":
        return project.delete(command.name);
      case "BackupProject":
        return project.backup(command.name ?? this.active(ctx));
      case "RestoreProject":
        return project.restore(command.name, command.timestamp);
      case "ListBackups":
        return project.listBackups(command.name);
      case "ShowProjectFiles":
        return project.showFiles(command.name ?? this.active(ctx));
      case "CreateFile":
        return code.createFile(this.active(ctx), createFilePath(command), command.content);
      case "EditFile":
        return code.editFile(this.active(ctx), command.fileName, command.edit);
      case "ShowFile":
        return code.showFile(this.active(ctx), command.fileName);
      case "RunTests":
        return test.run(this.active(ctx), command.pattern);
      case "GenerateTests":
        return test.generate(this.active(ctx), command.fileName);
      case "Deploy":
        return deployment.deploy(this.active(ctx), command.environment);
      case "RollbackDeployment":
        return deployment.rollback(this.active(ctx), command.environment, command.version);
      case "DeploymentStatus":
        return deployment.status(this.active(ctx), command.environment);
    }
  }

  private applyEffects(command: Command, payload: ResultPayload, ctx: SessionContext): void {
    if (payload.type === "project" && (command.kind === "CreateProject" || command.kind === "LoadProject")) {
      ctx.setCurrent(payload.project.name);
      return;
    }
    if (payload.type === "restored") {
      ctx.setCurrent(payload.project.name);
      return;
    }
    if (payload.type === "deleted" && ctx.getCurrent() === payload.project) {
      ctx.clearCurrent();
    }
  }
}
