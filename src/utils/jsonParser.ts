import JSON5 from "json5";
import { jsonrepair } from "jsonrepair";

export function stripCodeFences(text: string): string {
  return text
    .replace(/```[a-zA-Z0-9_-]*[ \t]*\r?\n?/g, "")
    .replace(/```/g, "")
    .trim();
}

/**
 * Strict, then lenient, then repaired parse of a single candidate.
 * Throws the last parser error when every strategy fails.
 */
function parseCandidate(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    /* fall through */
  }
  try {
    return JSON5.parse(candidate);
  } catch {
    /* fall through */
  }
  return JSON.parse(jsonrepair(candidate));
}

/**
 * Top-level balanced `{...}` / `[...]` spans of `text`, in order of appearance.
 * Brackets inside double-quoted strings are ignored; an unbalanced tail is dropped.
 */
export function findBalancedBlocks(text: string, open: "{" | "[" = "{"): string[] {
  const close = open === "{" ? "}" : "]";
  const blocks: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (depth > 0 && ch === '"') {
      inString = true;
    } else if (ch === open) {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === close && depth > 0) {
      depth--;
      if (depth === 0 && start >= 0) {
        blocks.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  return blocks;
}

/**
 * Aggressive JSON parser for model output: tries the whole text, then the
 * greedy first-`{`-to-last-`}` slice, then the first-`[`-to-last-`]` slice.
 */
export function tryParseJson(text: string): unknown {
  const cleaned = stripCodeFences(text);
  try {
    return parseCandidate(cleaned);
  } catch (err) {
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");
    if (start !== -1 && end > start) {
      return parseCandidate(cleaned.slice(start, end + 1));
    }
    const sArr = cleaned.indexOf("[");
    const eArr = cleaned.lastIndexOf("]");
    if (sArr !== -1 && eArr > sArr) {
      return parseCandidate(cleaned.slice(sArr, eArr + 1));
    }
    throw err;
  }
}

/**
 * Pulls the outermost well-formed object out of `text` that `accept` takes.
 * Candidates are tried in this order: each top-level balanced block, the
 * whole (fence-stripped) text, then the repair-friendly greedy slice.
 * Returns null when nothing acceptable can be extracted.
 */
export function extractStructuredBlock<T>(text: string, accept: (value: unknown) => T | null): T | null {
  const cleaned = stripCodeFences(text);
  const candidates = [...findBalancedBlocks(cleaned, "{"), cleaned];

  const seen = new Set<string>();
  for (const candidate of candidates) {
    if (!candidate || seen.has(candidate)) continue;
    seen.add(candidate);
    let value: unknown;
    try {
      value = parseCandidate(candidate);
    } catch {
      continue;
    }
    const accepted = accept(value);
    if (accepted !== null) return accepted;
  }

  try {
    return accept(tryParseJson(cleaned));
  } catch {
    return null;
  }
}
