import { truncate } from "./text.js";
import type { BackupSummary, DeploymentRecord, ProjectSummary, Result, ResultPayload } from "./types.js";

const MAX_LOG_CHARS = 4_000;

function formatProject(project: ProjectSummary): string {
  const description = project.description ? `: ${project.description}` : "";
  return `- ${project.name}${description} (last opened ${project.lastAccessedAt})`;
}

function formatBackup(backup: BackupSummary): string {
  return `- ${backup.sourceProjectName} @ ${backup.timestamp} (${backup.reason}, ${backup.fileCount} file(s))`;
}

/** Newest first; the last successful deployment of each environment is marked active. */
function formatDeployments(deployments: DeploymentRecord[]): string[] {
  const active = new Map<string, DeploymentRecord>();
  for (const record of deployments) {
    if (record.success) active.set(record.environment, record);
  }
  return [...deployments].reverse().map((record) => {
    const outcome = record.success ? "ok" : "failed";
    const flags = [record.rollback ? "rollback" : "", active.get(record.environment) === record ? "active" : ""]
      .filter((flag) => flag.length > 0)
      .map((flag) => ` [${flag}]`)
      .join("");
    return `- ${record.environment} ${record.version} ${outcome}${flags} (${record.deployedAt})`;
  });
}

function tail(log: string): string {
  return log.length <= MAX_LOG_CHARS ? log : `...${log.slice(log.length - MAX_LOG_CHARS)}`;
}

function numbered(content: string): string[] {
  const lines = content.endsWith("\n") ? content.slice(0, -1).split("\n") : content.split("\n");
  const width = String(lines.length).length;
  return lines.map((line, index) => `${String(index + 1).padStart(width, " ")} | ${line}`);
}

export function renderPayload(payload: ResultPayload): string[] {
  switch (payload.type) {
    case "project":
      return [formatProject(payload.project)];
    case "projects":
      return payload.projects.map(formatProject);
    case "deleted":
      return [`Restore with: restore project ${payload.project} from ${payload.backup.timestamp}`];
    case "backup":
      return [formatBackup(payload.backup)];
    case "restored":
      return [formatProject(payload.project)];
    case "backups":
      return payload.backups.map(formatBackup);
    case "files":
      return payload.files.map((path) => `- ${path}`);
    case "file":
      return payload.content ? numbered(payload.content) : ["(empty file)"];
    case "test-run":
      return payload.report.log ? [tail(payload.report.log)] : [];
    case "deployment":
      return [
        ...(payload.report.location ? [`Location: ${payload.report.location}`] : []),
        ...(payload.report.log ? [tail(payload.report.log)] : [])
      ];
    case "deployment-status":
      return formatDeployments(payload.deployments);
  }
}

/** Plain-text rendering of a Result for terminals and speech. */
export function renderResult(result: Result<ResultPayload>): string {
  if (result.status === "rejected") return `${result.message} [${result.reason}]`;
  if (result.status === "failed") {
    const details = result.payload ? renderPayload(result.payload) : [];
    return [`${result.message} [${result.reason}]`, ...details].join("\n");
  }
  return [result.message, ...renderPayload(result.payload)].join("\n");
}

/** One short line suitable for text-to-speech. */
export function summarizeForSpeech(result: Result<ResultPayload>): string {
  return truncate(result.message, 200);
}
