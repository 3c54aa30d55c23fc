export const PROJECT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export function isValidProjectName(value: string): boolean {
  return PROJECT_NAME_PATTERN.test(value) && value !== "." && value !== "..";
}

export interface Token {
  value: string;
  quoted: boolean;
}

/**
 * Splits a line on whitespace. Single or double quotes group words; an
 * unterminated quote runs to the end of the line.
 */
export function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let current = "";
  let quote: "'" | "\"" | null = null;
  let inToken = false;
  let quoted = false;

  for (const char of line) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (char === "'" || char === "\"") {
      quote = char;
      inToken = true;
      quoted = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push({ value: current, quoted });
        current = "";
        inToken = false;
        quoted = false;
      }
      continue;
    }
    current += char;
    inToken = true;
  }

  if (inToken) {
    tokens.push({ value: current, quoted });
  }
  return tokens;
}

export function splitCommandLine(line: string): string[] {
  return tokenize(line).map((token) => token.value);
}

/** Filesystem-safe, lexically sortable timestamp: `20261018T150812345Z`. */
export function toTimestampId(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "");
}

export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const trimmed = content.endsWith("\n") ? content.slice(0, -1) : content;
  return trimmed.split("\n").length;
}

export function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, Math.max(0, maxChars - 3))}...`;
}
