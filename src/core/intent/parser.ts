import { tokenize } from "../text.js";
import type { Command, ParseError } from "../types.js";
import { COMMAND_PATTERNS, matchesKeywords, type CommandPattern } from "./patterns.js";
import { stripWakePhrase, type InputMode } from "./wake-phrase.js";

export interface ParseOptions {
  mode: InputMode;
  wakePhrase: string;
  patterns?: readonly CommandPattern[];
}

export type ParseOutcome =
  | { status: "parsed"; command: Command }
  | { status: "error"; error: ParseError }
  | { status: "ignored"; rawText: string };

const TRAILING_PUNCTUATION = /[\s.!?]+$/;

function freezeCommand(command: Command): Command {
  if (command.kind === "EditFile") {
    Object.freeze(command.edit);
  }
  return Object.freeze(command);
}

/**
 * Turns one utterance into a Command. Pure: no I/O and no session state, so
 * the same input always yields the same outcome.
 */
export function parse(utterance: string, options: ParseOptions): ParseOutcome {
  const rawText = utterance.trim();
  const wake = stripWakePhrase(rawText, options.wakePhrase, options.mode);
  if (options.mode === "voice" && !wake.found) {
    return { status: "ignored", rawText };
  }

  const tokens = tokenize(wake.remainder.replace(TRAILING_PUNCTUATION, ""));
  const patterns = options.patterns ?? COMMAND_PATTERNS;

  for (const pattern of patterns) {
    if (!matchesKeywords(tokens, pattern.keywords)) continue;

    const extraction = pattern.extract(tokens.slice(pattern.keywords.length), rawText);
    if (extraction.status === "matched") {
      return { status: "parsed", command: freezeCommand(extraction.command) };
    }
    if (extraction.status === "missing") {
      return {
        status: "error",
        error: { reason: "MissingArgument", slotName: extraction.slotName, rawText }
      };
    }
    break;
  }

  return { status: "error", error: { reason: "Unrecognized", rawText } };
}

export function describeParseError(error: ParseError): string {
  if (error.reason === "MissingArgument") {
    return `Missing ${error.slotName} in "${error.rawText}".`;
  }
  return error.rawText ? `Did not recognize "${error.rawText}". Type 'help' for the command list.` : "Nothing to do.";
}
