/**
 * Low-level readers for model text: code fences, embedded JSON, partial objects and
 * labelled prose. Every reader returns `undefined` (or an empty list) instead of throwing.
 */

export type ObjectFragment = {
  text: string;
  complete: boolean;
};

export type LabelAliases<K extends string> = ReadonlyArray<readonly [K, readonly string[]]>;

export function stripCodeFences(text: string) {
  const trimmed = text.trim();
  const fenced = trimmed.match(/```[a-z]*[ \t]*\r?\n?([\s\S]*?)\s*```/i);
  if (fenced) {
    return fenced[1].trim();
  }
  // An opening fence with no closing one means the reply was cut off.
  if (trimmed.startsWith("```")) {
    return trimmed.replace(/^```[a-z]*[ \t]*\r?\n?/i, "").trim();
  }
  return trimmed;
}

export function extractBalancedJson(text: string) {
  const input = stripCodeFences(text);
  const firstBrace = input.indexOf("{");
  const firstBracket = input.indexOf("[");

  let start = -1;
  let opening = "{";
  let closing = "}";

  if (firstBrace !== -1 && (firstBracket === -1 || firstBrace < firstBracket)) {
    start = firstBrace;
  } else if (firstBracket !== -1) {
    start = firstBracket;
    opening = "[";
    closing = "]";
  }

  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < input.length; index += 1) {
    const char = input[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
      continue;
    }

    if (char === opening) {
      depth += 1;
    } else if (char === closing) {
      depth -= 1;
      if (depth === 0) {
        return input.slice(start, index + 1);
      }
    }
  }

  return undefined;
}

export function tryParseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    // Trailing commas are the most common hand-written JSON slip.
    try {
      return JSON.parse(candidate.replace(/,\s*([}\]])/g, "$1"));
    } catch {
      return undefined;
    }
  }
}

/** First complete JSON value in the text, parsed; `undefined` when there is none. */
export function parseJsonPayload(text: string): unknown {
  const candidate = extractBalancedJson(text);
  return candidate === undefined ? undefined : tryParseJson(candidate);
}

/**
 * Collects flat `{...}` objects (no nested objects) in order of appearance, plus the
 * innermost unterminated object when the text ends mid-value.
 */
export function scanObjectFragments(text: string): ObjectFragment[] {
  const input = stripCodeFences(text);
  const fragments: ObjectFragment[] = [];
  const stack: Array<{ start: number; nested: boolean }> = [];
  let inString = false;
  let escaped = false;

  for (let index = 0; index < input.length; index += 1) {
    const char = input[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    // Quotes only open strings inside an object; prose around the JSON is ignored.
    if (char === "\"" && stack.length > 0) {
      inString = true;
    } else if (char === "{") {
      const parent = stack[stack.length - 1];
      if (parent) {
        parent.nested = true;
      }
      stack.push({ start: index, nested: false });
    } else if (char === "}") {
      const frame = stack.pop();
      if (frame && !frame.nested) {
        fragments.push({ text: input.slice(frame.start, index + 1), complete: true });
      }
    }
  }

  const unterminated = stack[stack.length - 1];
  if (unterminated && !unterminated.nested) {
    fragments.push({ text: input.slice(unterminated.start), complete: false });
  }

  return fragments;
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function unescapeJsonString(raw: string) {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === "string" ? decoded : raw;
  } catch {
    // A string cut off mid-escape; undo the common escapes by hand.
    return raw.replace(/\\n/g, "\n").replace(/\\"/g, "\"").replace(/\\\\/g, "\\").replace(/\\$/, "");
  }
}

/**
 * Reads `"key": value` from JSON-ish text that may not parse as a whole.
 * Strings may be unterminated (the value runs to the end of the text).
 */
export function readLooseField(text: string, keys: readonly string[]): unknown {
  for (const key of keys) {
    const pattern = new RegExp(
      `"${escapeRegExp(key)}"\\s*:\\s*(?:"((?:[^"\\\\]|\\\\.)*)"?|(-?\\d+(?:\\.\\d+)?)|(true|false))`,
      "i"
    );
    const match = text.match(pattern);
    if (!match) {
      continue;
    }
    if (match[1] !== undefined) {
      return unescapeJsonString(match[1]);
    }
    if (match[2] !== undefined) {
      return Number(match[2]);
    }
    if (match[3] !== undefined) {
      return match[3].toLowerCase() === "true";
    }
  }
  return undefined;
}

/** Case-insensitive property lookup over a list of aliases. */
export function readAliasedProperty(record: Record<string, unknown>, keys: readonly string[]): unknown {
  const lowered = new Map(Object.entries(record).map(([key, value]) => [key.toLowerCase(), value]));
  for (const key of keys) {
    const value = lowered.get(key.toLowerCase());
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Unwraps a top-level array, or the first array found under one of the container keys. */
export function listEntries(payload: unknown, containerKeys: readonly string[]): unknown[] | undefined {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (!isRecord(payload)) {
    return undefined;
  }
  const contained = readAliasedProperty(payload, containerKeys);
  if (Array.isArray(contained)) {
    return contained;
  }
  return undefined;
}

export type ProseBlock = {
  number?: number;
  text: string;
};

const QUESTION_MARKER = /^[ \t]*(?:#{1,6}[ \t]*)?(?:\*\*)?(?:Q(?:uestion)?[ \t]*)?(\d+)[ \t]*(?:\*\*[ \t]*[.):]?|[.):])/gim;

/** Splits prose on numbered question markers (`1.`, `Question 2:`, `**Q3)**`). */
export function splitProseBlocks(text: string): ProseBlock[] {
  const input = stripCodeFences(text);
  const markers = [...input.matchAll(QUESTION_MARKER)];
  if (markers.length === 0) {
    return input ? [{ text: input }] : [];
  }

  return markers.map((marker, index) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const next = markers[index + 1];
    const end = next?.index ?? input.length;
    return {
      number: Number(marker[1]),
      text: input.slice(start, end).trim(),
    };
  });
}

function cleanSection(value: string) {
  return value
    .trim()
    .replace(/^[*_\s:]+/, "")
    .replace(/[*_\s]+$/, "")
    .trim();
}

export type LabelledSections<K extends string> = {
  sections: Partial<Record<K, string>>;
  preamble: string;
};

/**
 * Splits text on labelled headings (`Score: 7/10`, `**Strengths**`, `## Threats`).
 * A label counts as a heading only at the start of a line and when followed by a
 * separator or the end of the line. The first occurrence of each label wins.
 */
export function extractLabelledSections<K extends string>(
  text: string,
  aliases: LabelAliases<K>
): LabelledSections<K> {
  const lookup = new Map<string, K>();
  const alternation: string[] = [];
  for (const [canonical, names] of aliases) {
    for (const alias of names) {
      const normalized = alias.toLowerCase().replace(/\s+/g, " ");
      lookup.set(normalized, canonical);
      alternation.push(escapeRegExp(normalized).replace(/ /g, "\\s+"));
    }
  }
  // Longest aliases first so "expected answer" wins over "answer".
  alternation.sort((left, right) => right.length - left.length);

  const heading = new RegExp(
    `^[ \\t>*#_-]*(${alternation.join("|")})[*_]*[ \\t]*(?:[:=\\u2013-]|\\r?$)`,
    "gim"
  );
  const matches = [...text.matchAll(heading)];
  const sections: Partial<Record<K, string>> = {};

  matches.forEach((match, index) => {
    const label = lookup.get(match[1].toLowerCase().replace(/\s+/g, " "));
    if (!label || sections[label] !== undefined) {
      return;
    }
    const start = (match.index ?? 0) + match[0].length;
    const end = matches[index + 1]?.index ?? text.length;
    sections[label] = cleanSection(text.slice(start, end));
  });

  const firstHeading = matches[0]?.index ?? text.length;
  return { sections, preamble: cleanSection(text.slice(0, firstHeading)) };
}
