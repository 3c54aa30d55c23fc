export type InputMode = "text" | "voice";

export interface WakePhraseMatch {
  found: boolean;
  remainder: string;
}

const SEPARATORS_AFTER_PHRASE = /^[\s,.:;!?-]+/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildWakePattern(wakePhrase: string, anchored: boolean): RegExp | null {
  const words = wakePhrase
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map(escapeRegExp);
  if (!words.length) return null;
  const body = words.join("[\\s,]+");
  const leading = anchored ? "^\\s*" : "(?:^|[^\\p{L}\\p{N}])";
  return new RegExp(`${leading}(${body})(?=$|[^\\p{L}\\p{N}])`, "iu");
}

/**
 * Text mode: a wake phrase may lead the utterance and is dropped.
 * Voice mode: the phrase may appear anywhere; only what follows it counts.
 */
export function stripWakePhrase(utterance: string, wakePhrase: string, mode: InputMode): WakePhraseMatch {
  const pattern = buildWakePattern(wakePhrase, mode === "text");
  if (!pattern) {
    return { found: true, remainder: utterance.trim() };
  }

  const match = pattern.exec(utterance);
  if (!match) {
    return { found: false, remainder: utterance.trim() };
  }

  const end = match.index + match[0].length;
  return {
    found: true,
    remainder: utterance.slice(end).replace(SEPARATORS_AFTER_PHRASE, "").trim()
  };
}
