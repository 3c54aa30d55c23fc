import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, rename, rm } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { CollaboratorFailure } from "../errors.js";
import { toTimestampId } from "../text.js";
import { TARGET_DIRECTORIES } from "../types.js";
import type { BackupReason, BackupRecord, BackupSummary, Project, ProjectFiles, ProjectSummary } from "../types.js";
import { PENDING_WRITE_PREFIX, errorCode, isMissingFileError, readJsonIfExists, writeFileAtomic } from "../write.js";
import { normalizeProjectPath } from "./paths.js";
import type { NewProject, WorkspaceStore } from "./workspace-store.js";

const METADATA_VERSION = 1;
const PROJECT_FILE = "project.json";
const BACKUP_FILE = "backup.json";
const BACKUP_FILES_DIR = "files";

const projectSummarySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  createdAt: z.string(),
  lastModifiedAt: z.string(),
  lastAccessedAt: z.string()
});

const projectMetadataSchema = z.object({
  version: z.literal(METADATA_VERSION),
  project: projectSummarySchema
});

const backupMetadataSchema = z.object({
  version: z.literal(METADATA_VERSION),
  sourceProjectName: z.string().min(1),
  timestamp: z.string().min(1),
  reason: z.enum(["manual", "pre-delete"]),
  project: projectSummarySchema,
  files: z.array(z.string())
});

export interface FsWorkspaceStoreOptions {
  now?: () => Date;
}

async function listDirectoryNames(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory() && !entry.name.startsWith(".")).map((entry) => entry.name);
  } catch (error) {
    if (isMissingFileError(error)) return [];
    throw error;
  }
}

async function walkFiles(root: string, prefix: string, output: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(join(root, prefix), { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) return;
    throw error;
  }
  for (const entry of entries) {
    const relative = `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      await walkFiles(root, relative, output);
    } else if (entry.isFile() && !entry.name.startsWith(PENDING_WRITE_PREFIX)) {
      output.push(relative);
    }
  }
}

async function writeProjectTree(dir: string, summary: ProjectSummary, files: ProjectFiles): Promise<void> {
  for (const directory of TARGET_DIRECTORIES) {
    await mkdir(join(dir, directory), { recursive: true });
  }
  for (const [path, content] of Object.entries(files)) {
    await writeFileAtomic(join(dir, path), content);
  }
  await writeFileAtomic(join(dir, PROJECT_FILE), JSON.stringify({ version: METADATA_VERSION, project: summary }, null, 2));
}

/**
 * Filesystem layout:
 *   <root>/projects/<name>/project.json, src/, tests/, docs/
 *   <root>/backups/<name>/<timestamp>/backup.json, files/...
 * Multi-step writes are staged under <root>/.staging and moved into place with
 * a single rename.
 */
export class FsWorkspaceStore implements WorkspaceStore {
  private readonly now: () => Date;

  constructor(
    readonly root: string,
    options: FsWorkspaceStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private projectsDir(): string {
    return join(this.root, "projects");
  }

  private projectDir(name: string): string {
    return join(this.projectsDir(), name);
  }

  private backupsDir(name: string): string {
    return join(this.root, "backups", name);
  }

  private async stagingDir(label: string): Promise<string> {
    const dir = join(this.root, ".staging", `${label}-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  private async readSummary(name: string): Promise<ProjectSummary | null> {
    const raw = await readJsonIfExists(join(this.projectDir(name), PROJECT_FILE));
    if (raw === null) return null;
    const parsed = projectMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorFailure(`Project metadata for "${name}" is unreadable.`, "CollaboratorError", {
        details: { issues: parsed.error.issues.map((issue) => issue.message) }
      });
    }
    return parsed.data.project;
  }

  private async requireSummary(name: string): Promise<ProjectSummary> {
    const summary = await this.readSummary(name);
    if (!summary) throw new CollaboratorFailure(`Project "${name}" not found.`, "NotFound");
    return summary;
  }

  private async writeSummary(summary: ProjectSummary): Promise<void> {
    await writeFileAtomic(
      join(this.projectDir(summary.name), PROJECT_FILE),
      JSON.stringify({ version: METADATA_VERSION, project: summary }, null, 2)
    );
  }

  private async readFiles(dir: string): Promise<Record<string, string>> {
    const paths: string[] = [];
    for (const directory of TARGET_DIRECTORIES) {
      await walkFiles(dir, directory, paths);
    }
    const files: Record<string, string> = {};
    for (const path of paths.sort()) {
      files[path] = await readFile(join(dir, path), "utf8");
    }
    return files;
  }

  /** Moves a fully written staging directory to `projects/<name>`, refusing to replace anything. */
  private async publishProject(stagingDir: string, name: string): Promise<void> {
    await mkdir(this.projectsDir(), { recursive: true });
    if (await this.readSummary(name)) {
      throw new CollaboratorFailure(`Project "${name}" already exists.`, "AlreadyExists");
    }
    try {
      await rename(stagingDir, this.projectDir(name));
    } catch (error) {
      const code = errorCode(error);
      if (code === "ENOTEMPTY" || code === "EEXIST") {
        throw new CollaboratorFailure(`Project "${name}" already exists.`, "AlreadyExists", { cause: error });
      }
      throw error;
    }
  }

  async listProjects(): Promise<ProjectSummary[]> {
    const names = await listDirectoryNames(this.projectsDir());
    const summaries: ProjectSummary[] = [];
    for (const name of names) {
      const summary = await this.readSummary(name);
      if (summary) summaries.push(summary);
    }
    return summaries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async getProject(name: string): Promise<Project | null> {
    const summary = await this.readSummary(name);
    if (!summary) return null;
    return { ...summary, files: await this.readFiles(this.projectDir(name)) };
  }

  async createProject(input: NewProject): Promise<Project> {
    const timestamp = this.now().toISOString();
    const summary: ProjectSummary = {
      name: input.name,
      description: input.description,
      createdAt: timestamp,
      lastModifiedAt: timestamp,
      lastAccessedAt: timestamp
    };
    const staging = await this.stagingDir(input.name);
    try {
      await writeProjectTree(staging, summary, {});
      await this.publishProject(staging, input.name);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
    return { ...summary, files: {} };
  }

  async touchProject(name: string): Promise<ProjectSummary> {
    const summary = await this.requireSummary(name);
    const touched = { ...summary, lastAccessedAt: this.now().toISOString() };
    await this.writeSummary(touched);
    return touched;
  }

  async writeFile(name: string, path: string, content: string): Promise<Project> {
    const normalized = normalizeProjectPath(path);
    if (!normalized) {
      throw new CollaboratorFailure(`Refusing to write outside src/, tests/ or docs/: ${path}`, "CollaboratorError");
    }
    const summary = await this.requireSummary(name);
    await writeFileAtomic(join(this.projectDir(name), normalized), content);
    const updated = { ...summary, lastModifiedAt: this.now().toISOString() };
    await this.writeSummary(updated);
    return { ...updated, files: await this.readFiles(this.projectDir(name)) };
  }

  async removeProject(name: string): Promise<void> {
    await this.requireSummary(name);
    const trashDir = join(this.root, ".trash");
    await mkdir(trashDir, { recursive: true });
    const discarded = join(trashDir, `${name}-${randomUUID()}`);
    await rename(this.projectDir(name), discarded);
    await rm(discarded, { recursive: true, force: true });
  }

  async createBackup(name: string, reason: BackupReason): Promise<BackupRecord> {
    const project = await this.getProject(name);
    if (!project) throw new CollaboratorFailure(`Project "${name}" not found.`, "NotFound");

    const { files, ...summary } = project;
    const staging = await this.stagingDir(`backup-${name}`);
    try {
      for (const [path, content] of Object.entries(files)) {
        await writeFileAtomic(join(staging, BACKUP_FILES_DIR, path), content);
      }

      const baseTimestamp = toTimestampId(this.now());
      await mkdir(this.backupsDir(name), { recursive: true });
      for (let attempt = 0; ; attempt += 1) {
        const timestamp = attempt === 0 ? baseTimestamp : `${baseTimestamp}-${attempt}`;
        const metadata = {
          version: METADATA_VERSION,
          sourceProjectName: name,
          timestamp,
          reason,
          project: summary,
          files: Object.keys(files)
        };
        await writeFileAtomic(join(staging, BACKUP_FILE), JSON.stringify(metadata, null, 2));
        try {
          await mkdir(join(this.backupsDir(name), timestamp));
        } catch (error) {
          if (errorCode(error) === "EEXIST") continue;
          throw error;
        }
        await rm(join(this.backupsDir(name), timestamp), { recursive: true, force: true });
        await rename(staging, join(this.backupsDir(name), timestamp));
        return {
          sourceProjectName: name,
          timestamp,
          reason,
          fileCount: metadata.files.length,
          project: summary,
          files
        };
      }
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
  }

  async listBackups(name?: string): Promise<BackupSummary[]> {
    const projectNames = name ? [name] : await listDirectoryNames(join(this.root, "backups"));
    const summaries: BackupSummary[] = [];
    for (const projectName of projectNames) {
      for (const timestamp of await listDirectoryNames(this.backupsDir(projectName))) {
        const raw = await readJsonIfExists(join(this.backupsDir(projectName), timestamp, BACKUP_FILE));
        const parsed = backupMetadataSchema.safeParse(raw);
        if (!parsed.success) continue;
        summaries.push({
          sourceProjectName: parsed.data.sourceProjectName,
          timestamp: parsed.data.timestamp,
          reason: parsed.data.reason,
          fileCount: parsed.data.files.length
        });
      }
    }
    return summaries.sort(
      (a, b) => a.sourceProjectName.localeCompare(b.sourceProjectName) || a.timestamp.localeCompare(b.timestamp)
    );
  }

  async getBackup(name: string, timestamp: string): Promise<BackupRecord | null> {
    const dir = join(this.backupsDir(name), timestamp);
    const raw = await readJsonIfExists(join(dir, BACKUP_FILE));
    if (raw === null) return null;
    const parsed = backupMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorFailure(`Backup ${name}@${timestamp} is unreadable.`, "CollaboratorError");
    }
    const files: Record<string, string> = {};
    for (const path of parsed.data.files) {
      files[path] = await readFile(join(dir, BACKUP_FILES_DIR, path), "utf8");
    }
    return {
      sourceProjectName: parsed.data.sourceProjectName,
      timestamp: parsed.data.timestamp,
      reason: parsed.data.reason,
      fileCount: parsed.data.files.length,
      project: parsed.data.project,
      files
    };
  }

  async restoreBackup(record: BackupRecord): Promise<Project> {
    const timestamp = this.now().toISOString();
    const summary: ProjectSummary = {
      ...record.project,
      name: record.sourceProjectName,
      lastModifiedAt: timestamp,
      lastAccessedAt: timestamp
    };
    const staging = await this.stagingDir(`restore-${record.sourceProjectName}`);
    try {
      await writeProjectTree(staging, summary, record.files);
      await this.publishProject(staging, record.sourceProjectName);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
    return { ...summary, files: { ...record.files } };
  }
}
