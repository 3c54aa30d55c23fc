import { truncate } from "../text.js";
import type { GenerationContext } from "../types.js";

const MAX_CONTEXT_FILE_CHARS = 6_000;
const MAX_CONTEXT_FILES = 20;

export function buildFileEditPrompt(instruction: string, context: GenerationContext): string {
  const current = context.projectFiles[context.targetPath];
  const others = Object.keys(context.projectFiles)
    .filter((path) => path !== context.targetPath)
    .sort()
    .slice(0, MAX_CONTEXT_FILES);

  const lines = [
    "You are editing a single file inside a small software project.",
    "Return ONLY JSON. No markdown.",
    "",
    "Project context:",
    `- Name: ${context.projectName}`,
    `- Target file: ${context.targetPath}`,
    "",
    "Instruction:",
    instruction,
    "",
    "Rules:",
    "- Return the complete new content of the target file, not a diff.",
    "- Keep existing behaviour that the instruction does not ask to change.",
    "- Do not touch any other file.",
    "",
    "Output JSON schema keys:",
    "- content: string (full file content)",
    "- summary?: string (one line)"
  ];

  if (current === undefined) {
    lines.push("", `${context.targetPath} does not exist yet; write it from scratch.`);
  } else {
    lines.push("", `Current content of ${context.targetPath}:`, "<<<", truncate(current, MAX_CONTEXT_FILE_CHARS), ">>>");
  }

  if (others.length > 0) {
    lines.push("", "Other project files (read-only):");
    for (const path of others) {
      lines.push("", `${path}:`, "<<<", truncate(context.projectFiles[path] ?? "", MAX_CONTEXT_FILE_CHARS), ">>>");
    }
  }

  return lines.join("\n");
}

/** Instruction for writing a new test file next to `sourcePath`. */
export function buildTestGenerationInstruction(sourcePath: string, testPath: string): string {
  const runner = testPath.endsWith(".py")
    ? "pytest (plain test_ functions and assert statements)"
    : "node:test with node:assert/strict";
  return [
    `Write a new test file ${testPath} for ${sourcePath}.`,
    `Use ${runner}.`,
    "Cover the public functions of the source file, including edge cases visible in the code.",
    "Import the code under test from its place in the project; do not copy it into the test."
  ].join("\n");
}
