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
 * Text sanitizers for untrusted input and model output.
 * Primary injection defense is prompt boundaries and schema constraint, not input filtering.
 * These helpers strip HTML and normalize whitespace as a defense-in-depth measure.
 *
 * @warning Output is NOT safe for `innerHTML` or `dangerouslySetInnerHTML`.
 * Always use `textContent` or framework text interpolation when rendering.
 */

/** Profile fields longer than this are truncated before being placed in a prompt. */
export const MAX_PROMPT_INPUT_LENGTH = 500;

const DANGEROUS_BLOCKS = /<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const LINE_BREAK_TAGS = /<\s*(br|\/p|\/div|\/li|\/h[1-6]|\/tr)\b[^>]*>/gi;
const ANY_TAG = /<[^>]*>/g;

function decodeEntities(text: string): string {
  return text
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, " ");
}

/**
 * Remove markup while keeping the line structure implied by block-level tags.
 */
export function stripMarkup(raw: string): string {
  let text = raw.replace(DANGEROUS_BLOCKS, "");
  text = text.replace(LINE_BREAK_TAGS, "\n");
  text = text.replace(ANY_TAG, "");
  text = decodeEntities(text);
  // Entity-encoded tags only become tags after decoding; strip them again.
  text = text.replace(DANGEROUS_BLOCKS, "");
  return text.replace(ANY_TAG, "");
}

/**
 * Single-line, length-capped text for interpolation into prompts.
 */
export function sanitizePromptInput(raw: string, maxLength = MAX_PROMPT_INPUT_LENGTH): string {
  const flattened = stripMarkup(raw).replace(/\s+/g, " ").trim();
  return flattened.length > maxLength ? flattened.slice(0, maxLength).trimEnd() : flattened;
}

/**
 * Plain display text: markup removed, runs of spaces collapsed, at most one blank line
 * between paragraphs.
 */
export function normalizeDisplayText(raw: string): string {
  return stripMarkup(raw)
    .split("\n")
    .map((line) => line.replace(/[ \t\r]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
