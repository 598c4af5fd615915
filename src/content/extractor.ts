// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Locates and repairs JSON embedded in free-form model output.
 * Scanning is string-aware: delimiters inside double-quoted strings
 * (including escaped quotes) never affect nesting.
 */

const OPENERS: Readonly<Record<string, string>> = { "{": "}", "[": "]" };
const CLOSERS = new Set(["}", "]"]);

/** Upper bound on top-level candidates returned for one response. */
const MAX_CANDIDATES = 32;

export interface JsonSegment {
  /** Offset of the opening delimiter in the source text. */
  start: number;
  text: string;
  /** True when the text ran out before the opening delimiter was closed. */
  unterminated: boolean;
}

interface ScanState {
  stack: string[];
  inString: boolean;
}

/**
 * Scans from an opening delimiter to its matching closer.
 * Returns null when a closer does not match the innermost open delimiter.
 */
export function scanSegment(text: string, start: number): JsonSegment | null {
  const state: ScanState = { stack: [], inString: false };
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i);

    if (state.inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        state.inString = false;
      }
      continue;
    }

    if (ch === '"') {
      state.inString = true;
    } else if (ch in OPENERS) {
      state.stack.push(OPENERS[ch] ?? "");
    } else if (CLOSERS.has(ch)) {
      if (state.stack.pop() !== ch) return null;
      if (state.stack.length === 0) {
        return { start, text: text.slice(start, i + 1), unterminated: false };
      }
    }
  }

  return { start, text: text.slice(start), unterminated: true };
}

/**
 * Returns the top-level candidate segments in source order. Scanning resumes
 * after the end of each balanced segment, so openers nested inside a candidate
 * are never candidates themselves. An opener whose closers do not match is
 * skipped, and an unterminated segment runs to the end of the text.
 */
export function locateJsonSegments(text: string): JsonSegment[] {
  const segments: JsonSegment[] = [];
  let i = 0;
  while (i < text.length && segments.length < MAX_CANDIDATES) {
    if (!(text.charAt(i) in OPENERS)) {
      i++;
      continue;
    }
    const segment = scanSegment(text, i);
    if (segment) {
      segments.push(segment);
      i += segment.text.length;
    } else {
      i++;
    }
  }
  return segments;
}

/**
 * Removes commas that directly precede a closing delimiter (or the end of text),
 * leaving string contents untouched.
 */
export function stripTrailingCommas(json: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < json.length; i++) {
    const ch = json.charAt(i);

    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }

    if (ch === ",") {
      const rest = json.slice(i + 1).trimStart();
      if (rest === "" || rest.startsWith("}") || rest.startsWith("]")) continue;
    }

    out += ch;
  }

  return out;
}

/**
 * One repair pass over a JSON candidate: strip trailing commas, close an
 * unterminated string, fill a dangling key separator, and close open
 * brackets in nesting order.
 */
export function repairJson(json: string): string {
  let repaired = stripTrailingCommas(json);

  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  for (let i = 0; i < repaired.length; i++) {
    const ch = repaired.charAt(i);
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch in OPENERS) stack.push(OPENERS[ch] ?? "");
    else if (CLOSERS.has(ch) && stack[stack.length - 1] === ch) stack.pop();
  }

  if (inString) {
    // A trailing lone backslash would escape the closing quote.
    if (escaped) repaired = repaired.slice(0, -1);
    repaired += '"';
  }

  const tail = repaired.trimEnd();
  if (tail.endsWith(":")) {
    repaired = `${tail} null`;
  } else if (tail.endsWith(",")) {
    repaired = tail.slice(0, -1);
  }

  return repaired + stack.reverse().join("");
}
