import { failed, ok } from "../result.js";
import type { BackupRecord, BackupSummary, PayloadOf, ProjectSummary, Result } from "../types.js";
import type { WorkspaceStore } from "../workspace/workspace-store.js";

function toBackupSummary(record: BackupSummary): BackupSummary {
  return {
    sourceProjectName: record.sourceProjectName,
    timestamp: record.timestamp,
    reason: record.reason,
    fileCount: record.fileCount
  };
}

function toProjectSummary(project: ProjectSummary): ProjectSummary {
  return {
    name: project.name,
    description: project.description,
    createdAt: project.createdAt,
    lastModifiedAt: project.lastModifiedAt,
    lastAccessedAt: project.lastAccessedAt
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Project lifecycle on top of a {@link WorkspaceStore}; every operation answers with a Result. */
export class ProjectManager {
  constructor(private readonly store: WorkspaceStore) {}

  async create(name: string, description: string): Promise<Result<PayloadOf<"project">>> {
    if (await this.store.getProject(name)) {
      return failed("AlreadyExists", `Project "${name}" already exists.`);
    }
    const project = await this.store.createProject({ name, description });
    return ok(`Created project "${name}".`, { type: "project", project: toProjectSummary(project) });
  }

  async load(name: string): Promise<Result<PayloadOf<"project">>> {
    if (!(await this.store.getProject(name))) {
      return failed("NotFound", `Project "${name}" not found.`);
    }
    const project = await this.store.touchProject(name);
    return ok(`Loaded project "${name}".`, { type: "project", project });
  }

  async list(): Promise<Result<PayloadOf<"projects">>> {
    const projects = await this.store.listProjects();
    const message = projects.length === 0 ? "No projects yet." : `${projects.length} project(s).`;
    return ok(message, { type: "projects", projects });
  }

  /**
   * Two-phase delete: a `pre-delete` backup must be written before the
   * project is removed. If the backup fails the project is left untouched.
   */
  async delete(name: string): Promise<Result<PayloadOf<"deleted">>> {
    if (!(await this.store.getProject(name))) {
      return failed("NotFound", `Project "${name}" not found.`);
    }

    let backup: BackupRecord;
    try {
      backup = await this.store.createBackup(name, "pre-delete");
    } catch (error) {
      return failed("BackupFailed", `Backup of "${name}" failed, nothing was deleted: ${describeError(error)}`);
    }

    await this.store.removeProject(name);
    return ok(`Deleted project "${name}" (backup ${backup.timestamp}).`, {
      type: "deleted",
      project: name,
      backup: toBackupSummary(backup)
    });
  }

  async backup(name: string): Promise<Result<PayloadOf<"backup">>> {
    if (!(await this.store.getProject(name))) {
      return failed("NotFound", `Project "${name}" not found.`);
    }
    const record = await this.store.createBackup(name, "manual");
    return ok(`Backed up "${name}" as ${record.timestamp} (${record.fileCount} file(s)).`, {
      type: "backup",
      backup: toBackupSummary(record)
    });
  }

  /** Recreates a project from its latest backup, or the one at `timestamp`. Never overwrites. */
  async restore(name: string, timestamp?: string): Promise<Result<PayloadOf<"restored">>> {
    if (await this.store.getProject(name)) {
      return failed("AlreadyExists", `Project "${name}" already exists; delete it before restoring.`);
    }

    const backups = await this.store.listBackups(name);
    const chosen = timestamp ? backups.find((backup) => backup.timestamp === timestamp) : backups.at(-1);
    if (!chosen) {
      return failed("NotFound", timestamp ? `No backup ${timestamp} for "${name}".` : `No backups for "${name}".`);
    }

    const record = await this.store.getBackup(name, chosen.timestamp);
    if (!record) {
      return failed("NotFound", `Backup ${chosen.timestamp} for "${name}" disappeared.`);
    }
    const project = await this.store.restoreBackup(record);
    return ok(`Restored "${name}" from backup ${record.timestamp}.`, {
      type: "restored",
      project: toProjectSummary(project),
      backup: toBackupSummary(record)
    });
  }

  async listBackups(name?: string): Promise<Result<PayloadOf<"backups">>> {
    const backups = await this.store.listBackups(name);
    const scope = name ? ` for "${name}"` : "";
    const message = backups.length === 0 ? `No backups${scope}.` : `${backups.length} backup(s)${scope}.`;
    return ok(message, { type: "backups", backups });
  }

  async showFiles(name: string): Promise<Result<PayloadOf<"files">>> {
    const project = await this.store.getProject(name);
    if (!project) {
      return failed("NotFound", `Project "${name}" not found.`);
    }
    const files = Object.keys(project.files).sort();
    const message = files.length === 0 ? `"${name}" has no files yet.` : `"${name}" has ${files.length} file(s).`;
    return ok(message, { type: "files", project: name, files });
  }
}
