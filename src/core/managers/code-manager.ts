import { failed, ok, rejected } from "../result.js";
import { countLines } from "../text.js";
import type {
  CodeGenerator,
  FileEdit,
  PayloadOf,
  Project,
  ProjectFiles,
  RejectedResult,
  Result
} from "../types.js";
import { baseName, normalizeRelativePath } from "../workspace/paths.js";
import type { WorkspaceStore } from "../workspace/workspace-store.js";

export type FileResolution =
  | { status: "found"; path: string }
  | { status: "missing" }
  | { status: "ambiguous"; matches: string[] };

/**
 * Resolves a spoken file name against a project's files: an exact relative
 * path wins, otherwise the single file whose base name (or path suffix) matches.
 */
export function resolveFileName(files: ProjectFiles, fileName: string): FileResolution {
  const normalized = normalizeRelativePath(fileName);
  if (!normalized) return { status: "missing" };
  if (Object.hasOwn(files, normalized)) return { status: "found", path: normalized };

  const matches = Object.keys(files)
    .filter((path) =>
      normalized.includes("/") ? path.endsWith(`/${normalized}`) : baseName(path) === normalized
    )
    .sort();
  const [only] = matches;
  if (only === undefined) return { status: "missing" };
  if (matches.length > 1) return { status: "ambiguous", matches };
  return { status: "found", path: only };
}

type FileResult = Result<PayloadOf<"file">>;

export function filePayload(path: string, content: string): PayloadOf<"file"> {
  return { type: "file", path, content, lines: countLines(content) };
}

export class CodeManager {
  constructor(
    private readonly store: WorkspaceStore,
    private readonly generator: CodeGenerator
  ) {}

  private async locate(
    projectName: string,
    fileName: string
  ): Promise<{ project: Project; path: string } | Exclude<FileResult, { status: "ok" }>> {
    const project = await this.store.getProject(projectName);
    if (!project) return failed("NotFound", `Project "${projectName}" not found.`);

    const resolution = resolveFileName(project.files, fileName);
    if (resolution.status === "missing") {
      return failed("NotFound", `No file named "${fileName}" in "${projectName}".`);
    }
    if (resolution.status === "ambiguous") {
      return ambiguous(fileName, resolution.matches);
    }
    return { project, path: resolution.path };
  }

  /** `path` is a project path such as `src/app.py`. */
  async createFile(projectName: string, path: string, content: string): Promise<FileResult> {
    const project = await this.store.getProject(projectName);
    if (!project) return failed("NotFound", `Project "${projectName}" not found.`);

    if (Object.hasOwn(project.files, path)) {
      return failed("AlreadyExists", `${path} already exists in "${projectName}".`);
    }
    await this.store.writeFile(projectName, path, content);
    return ok(`Created ${path}.`, filePayload(path, content));
  }

  /** Literal edits replace the file; prompt edits ask the code generator for the new content. */
  async editFile(projectName: string, fileName: string, edit: FileEdit): Promise<FileResult> {
    const located = await this.locate(projectName, fileName);
    if ("status" in located) return located;
    const { project, path } = located;

    let content: string;
    if (edit.type === "content") {
      content = edit.content;
    } else {
      content = await this.generator.generate(edit.prompt, {
        projectName,
        targetPath: path,
        projectFiles: project.files
      });
      if (!content.trim()) {
        return failed("GenerationFailed", `The code generator returned an empty file for ${path}.`);
      }
    }

    await this.store.writeFile(projectName, path, content);
    return ok(`Updated ${path}.`, filePayload(path, content));
  }

  async showFile(projectName: string, fileName: string): Promise<FileResult> {
    const located = await this.locate(projectName, fileName);
    if ("status" in located) return located;
    const content = located.project.files[located.path] ?? "";
    return ok(`${located.path} (${countLines(content)} line(s)).`, filePayload(located.path, content));
  }
}

export function ambiguous(fileName: string, matches: string[]): RejectedResult {
  return rejected("InvalidArgument", `"${fileName}" matches several files: ${matches.join(", ")}. Use the full path.`);
}
