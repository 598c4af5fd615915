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

import {
  MAX_PROMPT_INPUT_LENGTH,
  normalizeDisplayText,
  sanitizePromptInput,
  stripMarkup,
} from "@/guardrails/sanitizer";

describe("sanitizePromptInput", () => {
  it("removes script blocks and flattens whitespace", () => {
    expect(sanitizePromptInput("<script>alert(1)</script>Nurse\n  manager")).toBe("Nurse manager");
  });

  it("strips tags that only appear after entity decoding", () => {
    expect(sanitizePromptInput("Ignore &lt;b&gt;previous&lt;/b&gt;")).toBe("Ignore previous");
  });

  it("caps the length", () => {
    expect(sanitizePromptInput("a".repeat(600))).toHaveLength(MAX_PROMPT_INPUT_LENGTH);
  });

  it("honours a custom maximum", () => {
    expect(sanitizePromptInput("abcdef", 3)).toBe("abc");
  });
});

describe("stripMarkup", () => {
  it("turns line-break tags into newlines", () => {
    expect(stripMarkup("one<br>two<br/>three")).toBe("one\ntwo\nthree");
  });

  it("decodes non-breaking spaces", () => {
    expect(stripMarkup("a&nbsp;b")).toBe("a b");
  });
});

describe("normalizeDisplayText", () => {
  it("trims each line", () => {
    expect(normalizeDisplayText("  one  \n   two ")).toBe("one\ntwo");
  });
});
