/** Relative path (always `/`-separated, first segment src|tests|docs) to file content. */
export type ProjectFiles = Readonly<Record<string, string>>;

export interface ProjectSummary {
  name: string;
  description: string;
  createdAt: string;
  lastModifiedAt: string;
  lastAccessedAt: string;
}

export interface Project extends ProjectSummary {
  files: ProjectFiles;
}

export type BackupReason = "manual" | "pre-delete";

export interface BackupSummary {
  sourceProjectName: string;
  timestamp: string;
  reason: BackupReason;
  fileCount: number;
}

export interface BackupRecord extends BackupSummary {
  /** Project metadata at the moment the snapshot was taken. */
  project: ProjectSummary;
  files: ProjectFiles;
}
