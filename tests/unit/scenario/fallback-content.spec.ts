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
  AssessmentQuestionContentSchema,
  DecisionPointContentSchema,
  NarrativeContentSchema,
  toDecisionPoints,
} from "@/scenario/content-schemas";
import {
  fallbackAssessment,
  fallbackDecisionPoints,
  fallbackFeedback,
  fallbackLearningMoment,
  fallbackNarrative,
  formatDomain,
} from "@/scenario/fallback-content";
import { SECURITY_DOMAINS } from "@/scenario/schemas";

describe("formatDomain", () => {
  it("replaces underscores with spaces", () => {
    expect(formatDomain("social_engineering")).toBe("social engineering");
  });

  it("labels the catch-all domain generically", () => {
    expect(formatDomain("other")).toBe("security");
  });
});

describe("fallbackNarrative", () => {
  it.each(SECURITY_DOMAINS)("has valid content for %s", (domain) => {
    expect(NarrativeContentSchema.safeParse(fallbackNarrative(domain)).success).toBe(true);
  });

  it("returns a fresh copy on each call", () => {
    const first = fallbackNarrative("phishing");
    first.title = "changed";
    expect(fallbackNarrative("phishing").title).toBe("The Suspicious Email");
  });
});

describe("fallbackDecisionPoints", () => {
  it("returns exactly the requested number of valid items", () => {
    const items = fallbackDecisionPoints("ransomware", 5);
    expect(items).toHaveLength(5);
    for (const item of items) {
      expect(DecisionPointContentSchema.safeParse(item).success).toBe(true);
    }
  });

  it("mentions the domain in the question", () => {
    const [first] = fallbackDecisionPoints("network_security", 1);
    expect(first?.question).toBe("What do you do first in this network security situation?");
  });

  it("numbers the questions that repeat a template", () => {
    const items = fallbackDecisionPoints("phishing", 4);
    expect(items[3]?.question).toBe("(4) What do you do first in this phishing situation?");
  });

  it("returns nothing for a zero count", () => {
    expect(fallbackDecisionPoints("phishing", 0)).toEqual([]);
  });

  it("maps to fallback-sourced decision points", () => {
    const [point] = toDecisionPoints(fallbackDecisionPoints("phishing", 1), "fallback");
    expect(point?.contentSource).toBe("fallback");
    expect(point?.userSelectedIndex).toBeNull();
    expect(point?.options[1]?.label).toBe("Follow security protocols and report the incident");
  });
});

describe("fallbackAssessment", () => {
  it("returns exactly the requested number of valid questions", () => {
    const items = fallbackAssessment("data_protection", 4);
    expect(items).toHaveLength(4);
    for (const item of items) {
      expect(AssessmentQuestionContentSchema.safeParse(item).success).toBe(true);
    }
    expect(items[3]?.question).toBe(
      "(4) What is the most important first step when dealing with a data protection threat?",
    );
  });
});

describe("fallbackLearningMoment", () => {
  it.each(SECURITY_DOMAINS)("has text for %s", (domain) => {
    expect(fallbackLearningMoment(domain).length).toBeGreaterThan(0);
  });
});

describe("fallbackFeedback", () => {
  it("prefers the option's own feedback", () => {
    expect(fallbackFeedback("Reporting gets help fast.", false)).toBe("Reporting gets help fast.");
  });

  it("uses generic text when the option has none", () => {
    expect(fallbackFeedback(" ", true)).toBe("Good choice. This response follows established security practice.");
    expect(fallbackFeedback("", false)).toBe(
      "This choice carries risk. Review the recommended response and the reasoning behind it.",
    );
  });
});
