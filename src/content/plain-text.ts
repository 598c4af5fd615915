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
 * Free-text extraction for feedback and learning-moment responses.
 */

import { z } from "zod";
import { normalizeDisplayText } from "../guardrails/sanitizer";
import { extractStructuredContent } from "./parser";

const FENCE_LINE = /^[ \t]*```[\w-]*[ \t]*$/gm;

// Models occasionally answer a prose request with a JSON envelope.
const TextEnvelopeSchema = z.object({ text: z.string().min(1) });

/**
 * Returns display-ready text from a model response. An empty string means the
 * response carried no usable text and the caller should use fallback content.
 */
export function extractPlainText(rawText: string): string {
  const unfenced = rawText.replace(FENCE_LINE, "");
  const trimmed = unfenced.trim();

  if (trimmed.startsWith("{")) {
    const envelope = extractStructuredContent(trimmed, TextEnvelopeSchema);
    if (envelope.ok) return normalizeDisplayText(envelope.value.text);
  }

  return normalizeDisplayText(unfenced);
}
