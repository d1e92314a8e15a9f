import type { OverrideEntry, OverrideSet, ParseOverridesOptions } from "./types.js";

/**
 * Raised for a non-blank, non-comment line without `=`.
 * The message carries the line number only: override values are secrets.
 */
export class OverrideFormatError extends Error {
  readonly line: number;
  constructor(line: number) {
    super(`Override file line ${line} is not a key=value pair`);
    this.name = "OverrideFormatError";
    this.line = line;
  }
}

export function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith("#");
}

/**
 * Parse override text into an ordered set of `key=value` entries.
 *
 * A leading byte-order mark is dropped. Blank lines and `#` comments are skipped. The key is everything before the
 * first `=`; the value keeps any further `=`. A repeated key keeps its first
 * position and takes the last value.
 */
export function parseOverrides(text: string, options: ParseOverridesOptions = {}): OverrideSet {
  const entries: OverrideEntry[] = [];
  const seen = new Map<string, { index: number; line: number }>();

  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const lineNo = i + 1;
    if (!raw.trim() || isCommentLine(raw)) continue;

    const eq = raw.indexOf("=");
    if (eq < 0) throw new OverrideFormatError(lineNo);

    const key = raw.slice(0, eq);
    const value = raw.slice(eq + 1);

    const prior = seen.get(key);
    if (prior) {
      options.onDuplicate?.(key, lineNo, prior.line);
      entries[prior.index] = { key, value };
      continue;
    }
    seen.set(key, { index: entries.length, line: lineNo });
    entries.push({ key, value });
  }
  return entries;
}

export function renderOverrides(set: OverrideSet): string {
  if (!set.length) return "";
  return set.map((e) => `${e.key}=${e.value}`).join("\n") + "\n";
}

/** Own properties only, so a `__proto__` key survives as data. */
export function overridesToRecord(set: OverrideSet): Record<string, string> {
  return Object.fromEntries(set.map((e): [string, string] => [e.key, e.value]));
}
