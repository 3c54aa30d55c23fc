import type { BackupSummary, ProjectSummary } from "./project.js";
import type { DeploymentRecord, DeploymentReport, TestRunReport } from "./collaborators.js";

export type ResultPayload =
  | { type: "project"; project: ProjectSummary }
  | { type: "projects"; projects: ProjectSummary[] }
  | { type: "deleted"; project: string; backup: BackupSummary }
  | { type: "backup"; backup: BackupSummary }
  | { type: "restored"; project: ProjectSummary; backup: BackupSummary }
  | { type: "backups"; backups: BackupSummary[] }
  | { type: "files"; project: string; files: string[] }
  | { type: "file"; path: string; content: string; lines: number }
  | { type: "test-run"; project: string; report: TestRunReport }
  | { type: "deployment"; project: string; environment: string; report: DeploymentReport }
  | { type: "deployment-status"; project: string; deployments: DeploymentRecord[] };

export type PayloadOf<T extends ResultPayload["type"]> = Extract<ResultPayload, { type: T }>;
