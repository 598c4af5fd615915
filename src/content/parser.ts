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
 * Structured content extraction for untrusted model output.
 * Finds the embedded JSON value, decodes it (with one repair pass), and
 * validates it against a Zod schema. Never returns a partially-populated value.
 */

import type { z } from "zod";
import { type JsonSegment, locateJsonSegments, repairJson } from "./extractor";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export type ParseError =
  | { kind: "malformed"; message: string }
  | { kind: "schema_violation"; field: string; message: string };

export type ParseResult<T> =
  | { ok: true; value: T; repaired: boolean }
  | { ok: false; error: ParseError };

type DecodeResult = { ok: true; value: unknown; repaired: boolean } | { ok: false; message: string };

const ROOT_FIELD = "(root)";

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Decode one candidate: a clean parse first, then a single retry after repair.
 * Unterminated candidates go straight to repair.
 */
function decodeSegment(segment: JsonSegment): DecodeResult {
  if (!segment.unterminated) {
    const parsed = tryParse(segment.text);
    if (parsed.ok) return { ok: true, value: parsed.value, repaired: false };
  }
  const repaired = tryParse(repairJson(segment.text));
  return repaired.ok ? { ok: true, value: repaired.value, repaired: true } : repaired;
}

function toSchemaViolation(issue: z.ZodIssue | undefined): ParseError {
  return {
    kind: "schema_violation",
    field: issue && issue.path.length > 0 ? issue.path.join(".") : ROOT_FIELD,
    message: issue?.message ?? "Schema validation failed",
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract one JSON object or array from free-form text and validate it.
 * Top-level candidates are tried in order; the first one that decodes and
 * satisfies the schema wins. Otherwise the first schema violation is reported,
 * or the first decode failure when nothing decoded.
 * Pure function: no logging, no I/O.
 */
export function extractStructuredContent<S extends z.ZodTypeAny>(
  rawText: string,
  schema: S,
): ParseResult<z.output<S>> {
  const segments = locateJsonSegments(rawText);
  if (segments.length === 0) {
    return {
      ok: false,
      error: { kind: "malformed", message: "No JSON object or array found in response" },
    };
  }

  let violation: ParseError | undefined;
  let decodeFailure: string | undefined;

  for (const segment of segments) {
    const decoded = decodeSegment(segment);
    if (!decoded.ok) {
      decodeFailure ??= decoded.message;
      continue;
    }
    const validated = schema.safeParse(decoded.value);
    if (validated.success) {
      return { ok: true, value: validated.data, repaired: decoded.repaired };
    }
    violation ??= toSchemaViolation(validated.error.issues[0]);
  }

  return {
    ok: false,
    error: violation ?? {
      kind: "malformed",
      message: `Unable to decode JSON: ${decodeFailure ?? "no JSON value could be decoded"}`,
    },
  };
}

/**
 * Human-readable one-line description of a ParseError, for logs.
 */
export function describeParseError(error: ParseError): string {
  return error.kind === "schema_violation"
    ? `schema violation at '${error.field}': ${error.message}`
    : `malformed: ${error.message}`;
}
