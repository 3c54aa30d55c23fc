import type { Token } from "../text.js";
import type { Command, CommandKind } from "../types.js";

export type SlotExtraction =
  | { status: "matched"; command: Command }
  | { status: "missing"; slotName: string }
  | { status: "unrecognized" };

export interface CommandPattern {
  /** Unquoted leading words, compared case-insensitively. */
  keywords: readonly string[];
  kind: CommandKind;
  extract(rest: Token[], rawText: string): SlotExtraction;
}

const PROJECT_REFERENCES = new Set(["current", "this", "the"]);

function isWord(token: Token | undefined, ...words: string[]): boolean {
  if (!token || token.quoted) return false;
  return words.includes(token.value.toLowerCase());
}

function joinTokens(tokens: Token[]): string {
  return tokens
    .map((token) => token.value)
    .join(" ")
    .trim();
}

function indexOfWord(tokens: Token[], word: string, fromEnd = false): number {
  if (fromEnd) {
    for (let index = tokens.length - 1; index >= 0; index -= 1) {
      if (isWord(tokens[index], word)) return index;
    }
    return -1;
  }
  return tokens.findIndex((token) => isWord(token, word));
}

/** Drops a leading "for"/"of" so "show project files for Foo" names Foo. */
function skipLeadingPreposition(tokens: Token[]): Token[] {
  return isWord(tokens[0], "for", "of") ? tokens.slice(1) : tokens;
}

/** Removes a "for the/this/current project" tail used in spoken test commands. */
function withoutProjectReference(tokens: Token[]): Token[] {
  const forIndex = indexOfWord(tokens, "for");
  if (forIndex === -1) return tokens;
  const phrase = tokens.slice(forIndex + 1);
  const projectIndex = indexOfWord(phrase, "project");
  if (projectIndex === -1) return tokens;
  const filler = phrase.slice(0, projectIndex);
  if (!filler.every((token) => isWord(token, ...PROJECT_REFERENCES))) return tokens;
  return [...tokens.slice(0, forIndex), ...phrase.slice(projectIndex + 1)];
}

function matched(command: Command): SlotExtraction {
  return { status: "matched", command };
}

function missing(slotName: string): SlotExtraction {
  return { status: "missing", slotName };
}

function requiredName(
  rest: Token[],
  build: (name: string) => Command
): SlotExtraction {
  const name = joinTokens(rest);
  return name ? matched(build(name)) : missing("name");
}

function optionalName(rest: Token[]): { name?: string } {
  const name = joinTokens(skipLeadingPreposition(rest));
  return name ? { name } : {};
}

function extractCreateFile(rest: Token[], rawText: string): SlotExtraction {
  const inIndex = indexOfWord(rest, "in");
  const nameTokens = inIndex === -1 ? rest : rest.slice(0, inIndex);
  const fileName = joinTokens(nameTokens);
  if (!fileName) return missing("fileName");
  if (inIndex === -1) return missing("targetDirectory");

  let cursor = inIndex + 1;
  const directoryToken = rest[cursor];
  if (!directoryToken) return missing("targetDirectory");
  cursor += 1;
  if (isWord(rest[cursor], "directory", "folder")) {
    cursor += 1;
  }

  let content = "";
  if (cursor < rest.length) {
    if (!isWord(rest[cursor], "with", "containing")) return { status: "unrecognized" };
    content = joinTokens(rest.slice(cursor + 1));
  }

  return matched({
    kind: "CreateFile",
    rawText,
    fileName,
    targetDirectory: directoryToken.value,
    content
  });
}

function extractEditFile(rest: Token[], rawText: string): SlotExtraction {
  const [fileToken, ...tail] = rest;
  if (!fileToken) return missing("fileName");

  if (isWord(tail[0], "replace") && isWord(tail[1], "with")) {
    return matched({
      kind: "EditFile",
      rawText,
      fileName: fileToken.value,
      edit: { type: "content", content: joinTokens(tail.slice(2)) }
    });
  }

  const prompt = joinTokens(tail);
  if (!prompt) return missing("instruction");
  return matched({
    kind: "EditFile",
    rawText,
    fileName: fileToken.value,
    edit: { type: "prompt", prompt }
  });
}

function extractAddToFile(rest: Token[], rawText: string): SlotExtraction {
  const toIndex = indexOfWord(rest, "to", true);
  if (toIndex === -1) return missing("fileName");
  const instruction = joinTokens(rest.slice(0, toIndex));
  const fileName = joinTokens(rest.slice(toIndex + 1));
  if (!instruction) return missing("instruction");
  if (!fileName) return missing("fileName");
  return matched({
    kind: "EditFile",
    rawText,
    fileName,
    edit: { type: "prompt", prompt: `add ${instruction}` }
  });
}

function extractRunTests(rest: Token[], rawText: string): SlotExtraction {
  const tokens = withoutProjectReference(rest);
  const matchingIndex = indexOfWord(tokens, "matching");
  if (matchingIndex === -1) {
    return matched({ kind: "RunTests", rawText });
  }
  const pattern = joinTokens(tokens.slice(matchingIndex + 1));
  if (!pattern) return missing("pattern");
  return matched({ kind: "RunTests", rawText, pattern });
}

function extractDeploy(rest: Token[], rawText: string, defaultEnvironment: string): SlotExtraction {
  const toIndex = indexOfWord(rest, "to");
  if (toIndex === -1) {
    return matched({ kind: "Deploy", rawText, environment: defaultEnvironment });
  }
  const environment = joinTokens(rest.slice(toIndex + 1).filter((token) => !isWord(token, "the")));
  if (!environment) return missing("environment");
  return matched({ kind: "Deploy", rawText, environment });
}

function extractGenerateTests(rest: Token[], rawText: string): SlotExtraction {
  const fileName = joinTokens(skipLeadingPreposition(rest));
  return fileName ? matched({ kind: "GenerateTests", rawText, fileName }) : missing("fileName");
}

/** "rollback [the] deployment [to <environment>] [version <id>]" */
function extractRollback(rest: Token[], rawText: string, defaultEnvironment: string): SlotExtraction {
  let tokens = rest.filter((token) => !isWord(token, "the"));
  if (isWord(tokens[0], "deployment", "deploy")) tokens = tokens.slice(1);

  const versionIndex = indexOfWord(tokens, "version");
  const head = versionIndex === -1 ? tokens : tokens.slice(0, versionIndex);
  let environment = defaultEnvironment;
  if (head.length > 0) {
    if (!isWord(head[0], "to", "in", "on", "of")) return { status: "unrecognized" };
    environment = joinTokens(head.slice(1));
    if (!environment) return missing("environment");
  }

  if (versionIndex === -1) {
    return matched({ kind: "RollbackDeployment", rawText, environment });
  }
  const version = joinTokens(tokens.slice(versionIndex + 1));
  if (!version) return missing("version");
  return matched({ kind: "RollbackDeployment", rawText, environment, version });
}

function extractDeploymentStatus(rest: Token[], rawText: string): SlotExtraction {
  const tokens = rest.filter((token) => !isWord(token, "the"));
  if (tokens.length === 0) return matched({ kind: "DeploymentStatus", rawText });
  if (!isWord(tokens[0], "for", "of", "in", "on")) return { status: "unrecognized" };
  const environment = joinTokens(tokens.slice(1));
  return environment ? matched({ kind: "DeploymentStatus", rawText, environment }) : missing("environment");
}

function extractRestore(rest: Token[], rawText: string): SlotExtraction {
  const fromIndex = indexOfWord(rest, "from");
  const name = joinTokens(fromIndex === -1 ? rest : rest.slice(0, fromIndex));
  if (!name) return missing("name");
  if (fromIndex === -1) {
    return matched({ kind: "RestoreProject", rawText, name });
  }
  const timestamp = joinTokens(rest.slice(fromIndex + 1).filter((token) => !isWord(token, "backup")));
  if (!timestamp) return missing("timestamp");
  return matched({ kind: "RestoreProject", rawText, name, timestamp });
}

export const DEFAULT_DEPLOY_ENVIRONMENT = "development";

/**
 * Evaluated top to bottom; the first entry whose keywords prefix the utterance
 * wins. Keyword prefixes must stay mutually exclusive (see
 * {@link findPrefixConflicts}).
 */
export const COMMAND_PATTERNS: readonly CommandPattern[] = [
  {
    keywords: ["create", "project"],
    kind: "CreateProject",
    extract(rest, rawText) {
      const [nameToken, ...descriptionTokens] = rest;
      if (!nameToken) return missing("name");
      return matched({
        kind: "CreateProject",
        rawText,
        name: nameToken.value,
        description: joinTokens(descriptionTokens)
      });
    }
  },
  {
    keywords: ["load", "project"],
    kind: "LoadProject",
    extract: (rest, rawText) => requiredName(rest, (name) => ({ kind: "LoadProject", rawText, name }))
  },
  {
    keywords: ["open", "project"],
    kind: "LoadProject",
    extract: (rest, rawText) => requiredName(rest, (name) => ({ kind: "LoadProject", rawText, name }))
  },
  {
    keywords: ["list", "projects"],
    kind: "ListProjects",
    extract: (_rest, rawText) => matched({ kind: "ListProjects", rawText })
  },
  {
    keywords: ["delete", "project"],
    kind: "DeleteProject",
    extract: (rest, rawText) => requiredName(rest, (name) => ({ kind: "DeleteProject", rawText, name }))
  },
  {
    keywords: ["backup", "project"],
    kind: "BackupProject",
    extract: (rest, rawText) => matched({ kind: "BackupProject", rawText, ...optionalName(rest) })
  },
  {
    keywords: ["restore", "project"],
    kind: "RestoreProject",
    extract: extractRestore
  },
  {
    keywords: ["list", "backups"],
    kind: "ListBackups",
    extract: (rest, rawText) => matched({ kind: "ListBackups", rawText, ...optionalName(rest) })
  },
  {
    keywords: ["show", "project", "files"],
    kind: "ShowProjectFiles",
    extract: (rest, rawText) => matched({ kind: "ShowProjectFiles", rawText, ...optionalName(rest) })
  },
  {
    keywords: ["create", "file"],
    kind: "CreateFile",
    extract: extractCreateFile
  },
  {
    keywords: ["edit", "file"],
    kind: "EditFile",
    extract: extractEditFile
  },
  {
    keywords: ["add"],
    kind: "EditFile",
    extract: extractAddToFile
  },
  {
    keywords: ["show", "file"],
    kind: "ShowFile",
    extract: (rest, rawText) => {
      const fileName = joinTokens(rest);
      return fileName ? matched({ kind: "ShowFile", rawText, fileName }) : missing("fileName");
    }
  },
  {
    keywords: ["run", "tests"],
    kind: "RunTests",
    extract: extractRunTests
  },
  {
    keywords: ["run", "test"],
    kind: "RunTests",
    extract: extractRunTests
  },
  {
    keywords: ["generate", "tests"],
    kind: "GenerateTests",
    extract: extractGenerateTests
  },
  {
    keywords: ["generate", "test"],
    kind: "GenerateTests",
    extract: extractGenerateTests
  },
  {
    keywords: ["deploy"],
    kind: "Deploy",
    extract: (rest, rawText) => extractDeploy(rest, rawText, DEFAULT_DEPLOY_ENVIRONMENT)
  },
  {
    keywords: ["rollback"],
    kind: "RollbackDeployment",
    extract: (rest, rawText) => extractRollback(rest, rawText, DEFAULT_DEPLOY_ENVIRONMENT)
  },
  {
    keywords: ["roll", "back"],
    kind: "RollbackDeployment",
    extract: (rest, rawText) => extractRollback(rest, rawText, DEFAULT_DEPLOY_ENVIRONMENT)
  },
  {
    keywords: ["deployment", "status"],
    kind: "DeploymentStatus",
    extract: extractDeploymentStatus
  },
  {
    keywords: ["show", "deployments"],
    kind: "DeploymentStatus",
    extract: extractDeploymentStatus
  }
];

export function matchesKeywords(tokens: Token[], keywords: readonly string[]): boolean {
  if (tokens.length < keywords.length) return false;
  return keywords.every((keyword, index) => isWord(tokens[index], keyword));
}

/** Pairs of patterns where one keyword list is a prefix of (or equal to) the other. */
export function findPrefixConflicts(patterns: readonly CommandPattern[]): Array<[string, string]> {
  const conflicts: Array<[string, string]> = [];
  for (let left = 0; left < patterns.length; left += 1) {
    for (let right = left + 1; right < patterns.length; right += 1) {
      const a = patterns[left]?.keywords ?? [];
      const b = patterns[right]?.keywords ?? [];
      const shorter = a.length <= b.length ? a : b;
      const longer = shorter === a ? b : a;
      if (shorter.every((keyword, index) => keyword === longer[index])) {
        conflicts.push([a.join(" "), b.join(" ")]);
      }
    }
  }
  return conflicts;
}
