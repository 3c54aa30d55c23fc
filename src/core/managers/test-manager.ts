import { buildTestGenerationInstruction } from "../ai/prompts.js";
import { failed, ok, rejected } from "../result.js";
import type { CodeGenerator, PayloadOf, Result, TestRunner } from "../types.js";
import { baseName } from "../workspace/paths.js";
import type { WorkspaceStore } from "../workspace/workspace-store.js";
import { ambiguous, filePayload, resolveFileName } from "./code-manager.js";

const NODE_TEST_EXTENSIONS = new Set([".js", ".mjs", ".cjs", ".ts"]);

/**
 * Where generated tests for a source file go, following the names the test
 * runner picks up: `tests/test_calc.py`, `tests/util.test.js`.
 */
export function testPathFor(sourcePath: string): string {
  const name = baseName(sourcePath);
  const dot = name.lastIndexOf(".");
  const extension = dot > 0 ? name.slice(dot) : "";
  if (NODE_TEST_EXTENSIONS.has(extension)) {
    return `tests/${name.slice(0, dot)}.test${extension}`;
  }
  return `tests/test_${name}`;
}

export class TestManager {
  constructor(
    private readonly store: WorkspaceStore,
    private readonly runner: TestRunner,
    private readonly generator: CodeGenerator
  ) {}

  async run(projectName: string, pattern?: string): Promise<Result<PayloadOf<"test-run">>> {
    const project = await this.store.getProject(projectName);
    if (!project) return failed("NotFound", `Project "${projectName}" not found.`);

    const report = await this.runner.runTests(project.files, pattern ? { pattern } : {});
    const payload: PayloadOf<"test-run"> = { type: "test-run", project: projectName, report };
    const summary = `${report.passed} passed, ${report.failed} failed`;
    if (report.failed > 0) {
      return failed("CollaboratorError", `Tests failed: ${summary}.`, payload);
    }
    return ok(`Tests passed: ${summary}.`, payload);
  }

  /** Asks the code generator for a new test file covering `fileName`; never overwrites one. */
  async generate(projectName: string, fileName: string): Promise<Result<PayloadOf<"file">>> {
    const project = await this.store.getProject(projectName);
    if (!project) return failed("NotFound", `Project "${projectName}" not found.`);

    const resolution = resolveFileName(project.files, fileName);
    if (resolution.status === "missing") {
      return failed("NotFound", `No file named "${fileName}" in "${projectName}".`);
    }
    if (resolution.status === "ambiguous") return ambiguous(fileName, resolution.matches);

    const sourcePath = resolution.path;
    if (sourcePath.startsWith("tests/")) {
      return rejected("InvalidArgument", `${sourcePath} is already a test file.`);
    }
    const testPath = testPathFor(sourcePath);
    if (Object.hasOwn(project.files, testPath)) {
      return failed("AlreadyExists", `${testPath} already exists in "${projectName}".`);
    }

    const content = await this.generator.generate(buildTestGenerationInstruction(sourcePath, testPath), {
      projectName,
      targetPath: testPath,
      projectFiles: project.files
    });
    if (!content.trim()) {
      return failed("GenerationFailed", `The code generator returned an empty file for ${testPath}.`);
    }

    await this.store.writeFile(projectName, testPath, content);
    return ok(`Generated ${testPath} for ${sourcePath}.`, filePayload(testPath, content));
  }
}
