export const COMMAND_KINDS = [
  "CreateProject",
  "LoadProject",
  "ListProjects",
  "DeleteProject",
  "BackupProject",
  "RestoreProject",
  "ListBackups",
  "ShowProjectFiles",
  "CreateFile",
  "EditFile",
  "ShowFile",
  "RunTests",
  "GenerateTests",
  "Deploy",
  "RollbackDeployment",
  "DeploymentStatus"
] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

export const TARGET_DIRECTORIES = ["src", "tests", "docs"] as const;

export type TargetDirectory = (typeof TARGET_DIRECTORIES)[number];

interface CommandBase {
  readonly rawText: string;
}

export interface CreateProjectCommand extends CommandBase {
  readonly kind: "CreateProject";
  readonly name: string;
  readonly description: string;
}

export interface LoadProjectCommand extends CommandBase {
  readonly kind: "LoadProject";
  readonly name: string;
}

export interface ListProjectsCommand extends CommandBase {
  readonly kind: "ListProjects";
}

export interface DeleteProjectCommand extends CommandBase {
  readonly kind: "DeleteProject";
  readonly name: string;
}

export interface BackupProjectCommand extends CommandBase {
  readonly kind: "BackupProject";
  readonly name?: string;
}

export interface RestoreProjectCommand extends CommandBase {
  readonly kind: "RestoreProject";
  readonly name: string;
  readonly timestamp?: string;
}

export interface ListBackupsCommand extends CommandBase {
  readonly kind: "ListBackups";
  readonly name?: string;
}

export interface ShowProjectFilesCommand extends CommandBase {
  readonly kind: "ShowProjectFiles";
  readonly name?: string;
}

export interface CreateFileCommand extends CommandBase {
  readonly kind: "CreateFile";
  /** Raw directory slot; the router narrows it to a {@link TargetDirectory}. */
  readonly targetDirectory: string;
  readonly fileName: string;
  readonly content: string;
}

export type FileEdit =
  | {
      readonly type: "content";
      readonly content: string;
    }
  | {
      readonly type: "prompt";
      readonly prompt: string;
    };

export interface EditFileCommand extends CommandBase {
  readonly kind: "EditFile";
  readonly fileName: string;
  readonly edit: FileEdit;
}

export interface ShowFileCommand extends CommandBase {
  readonly kind: "ShowFile";
  readonly fileName: string;
}

export interface RunTestsCommand extends CommandBase {
  readonly kind: "RunTests";
  readonly pattern?: string;
}

export interface GenerateTestsCommand extends CommandBase {
  readonly kind: "GenerateTests";
  /** Source file the tests are written for. */
  readonly fileName: string;
}

export interface DeployCommand extends CommandBase {
  readonly kind: "Deploy";
  readonly environment: string;
}

export interface RollbackDeploymentCommand extends CommandBase {
  readonly kind: "RollbackDeployment";
  readonly environment: string;
  /** Deployment version to return to; the one before the active deployment when absent. */
  readonly version?: string;
}

export interface DeploymentStatusCommand extends CommandBase {
  readonly kind: "DeploymentStatus";
  readonly environment?: string;
}

export type Command =
  | CreateProjectCommand
  | LoadProjectCommand
  | ListProjectsCommand
  | DeleteProjectCommand
  | BackupProjectCommand
  | RestoreProjectCommand
  | ListBackupsCommand
  | ShowProjectFilesCommand
  | CreateFileCommand
  | EditFileCommand
  | ShowFileCommand
  | RunTestsCommand
  | GenerateTestsCommand
  | DeployCommand
  | RollbackDeploymentCommand
  | DeploymentStatusCommand;
