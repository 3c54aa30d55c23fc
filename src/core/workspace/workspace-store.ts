import type { BackupReason, BackupRecord, BackupSummary, Project, ProjectSummary } from "../types.js";

export interface NewProject {
  name: string;
  description: string;
}

/**
 * Durable home of every project and backup. Implementations throw
 * `CollaboratorFailure` with reason `AlreadyExists` / `NotFound` when asked to
 * overwrite or read something that is not there; they never half-apply a call.
 */
export interface WorkspaceStore {
  listProjects(): Promise<ProjectSummary[]>;
  getProject(name: string): Promise<Project | null>;
  createProject(input: NewProject): Promise<Project>;
  touchProject(name: string): Promise<ProjectSummary>;
  writeFile(name: string, path: string, content: string): Promise<Project>;
  removeProject(name: string): Promise<void>;
  createBackup(name: string, reason: BackupReason): Promise<BackupRecord>;
  listBackups(name?: string): Promise<BackupSummary[]>;
  getBackup(name: string, timestamp: string): Promise<BackupRecord | null>;
  restoreBackup(record: BackupRecord): Promise<Project>;
}
