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
 * Schemas for model-generated scenario content and the mapping from
 * validated content to scenario entities.
 * Field names here are the ones the prompts ask the model to produce.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { AssessmentQuestion, ContentSource, DecisionPoint } from "./schemas";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accept either a bare array or an object wrapping it under `key`. */
function unwrapList(key: string) {
  return (value: unknown): unknown => {
    if (isRecord(value) && Array.isArray(value[key])) return value[key];
    return value;
  };
}

function correctIndexInBounds(
  item: { options: unknown[]; correctOptionIndex: number },
  ctx: z.RefinementCtx,
): void {
  if (item.correctOptionIndex >= item.options.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["correctOptionIndex"],
      message: `Correct option index ${item.correctOptionIndex} is out of range for ${item.options.length} options`,
    });
  }
}

// ---------------------------------------------------------------------------
// Narrative
// ---------------------------------------------------------------------------

export const NarrativeContentSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  narrative: z.string().trim().optional(),
});

// ---------------------------------------------------------------------------
// Decision points
// ---------------------------------------------------------------------------

export const DecisionOptionContentSchema = z.object({
  text: z.string().trim().min(1),
  feedback: z.string().trim().default(""),
});

export const DecisionPointContentSchema = z
  .object({
    question: z.string().trim().min(1),
    options: z.array(DecisionOptionContentSchema).min(2),
    correctOptionIndex: z.number().int().min(0),
  })
  .superRefine(correctIndexInBounds);

export const DecisionPointsContentSchema = z.preprocess(
  unwrapList("decisionPoints"),
  z.array(DecisionPointContentSchema).min(1),
);

// ---------------------------------------------------------------------------
// Assessment
// ---------------------------------------------------------------------------

export const AssessmentQuestionContentSchema = z
  .object({
    question: z.string().trim().min(1),
    options: z.array(z.string().trim().min(1)).min(2),
    correctOptionIndex: z.number().int().min(0),
    explanation: z.string().trim().default(""),
  })
  .superRefine(correctIndexInBounds);

export const AssessmentContentSchema = z.preprocess(
  unwrapList("questions"),
  z.array(AssessmentQuestionContentSchema).min(1),
);

export type NarrativeContent = z.output<typeof NarrativeContentSchema>;
export type DecisionPointContent = z.output<typeof DecisionPointContentSchema>;
export type AssessmentQuestionContent = z.output<typeof AssessmentQuestionContentSchema>;

// ---------------------------------------------------------------------------
// Mapping to entities
// ---------------------------------------------------------------------------

export function toDecisionPoints(
  items: DecisionPointContent[],
  contentSource: ContentSource,
): DecisionPoint[] {
  return items.map((item) => ({
    id: randomUUID(),
    promptText: item.question,
    options: item.options.map((o) => ({ label: o.text, feedbackText: o.feedback })),
    correctOptionIndex: item.correctOptionIndex,
    userSelectedIndex: null,
    contentSource,
  }));
}

export function toAssessmentQuestions(items: AssessmentQuestionContent[]): AssessmentQuestion[] {
  return items.map((item) => ({
    id: randomUUID(),
    promptText: item.question,
    options: [...item.options],
    correctOptionIndex: item.correctOptionIndex,
    userAnswerIndex: null,
    explanation: item.explanation,
  }));
}
