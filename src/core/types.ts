export { COMMAND_KINDS, TARGET_DIRECTORIES } from "./types/command.js";
export { AI_PROVIDERS } from "./types/config.js";
export type {
  BackupProjectCommand,
  Command,
  CommandKind,
  CreateFileCommand,
  CreateProjectCommand,
  DeleteProjectCommand,
  DeployCommand,
  DeploymentStatusCommand,
  EditFileCommand,
  FileEdit,
  GenerateTestsCommand,
  ListBackupsCommand,
  ListProjectsCommand,
  LoadProjectCommand,
  RestoreProjectCommand,
  RollbackDeploymentCommand,
  RunTestsCommand,
  ShowFileCommand,
  ShowProjectFilesCommand,
  TargetDirectory
} from "./types/command.js";
export type {
  BackupReason,
  BackupRecord,
  BackupSummary,
  Project,
  ProjectFiles,
  ProjectSummary
} from "./types/project.js";
export type {
  FailedResult,
  FailureReason,
  OkResult,
  ParseError,
  RejectedResult,
  RejectionReason,
  Result
} from "./types/result.js";
export type {
  CodeGenerator,
  Deployer,
  DeploymentRecord,
  DeploymentReport,
  DeploymentTarget,
  GenerationContext,
  StatusCallback,
  TestRunner,
  TestRunOptions,
  TestRunReport,
  Transcriber
} from "./types/collaborators.js";
export type { PayloadOf, ResultPayload } from "./types/payload.js";
export type {
  AiConfig,
  AiProvider,
  DeploymentEnvironmentConfig,
  SpeechConfig,
  TestsConfig,
  VoxdevConfig
} from "./types/config.js";
