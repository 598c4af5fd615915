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
 * Zod schemas for the scenario workflow.
 * Defines validation for scenarios, decision points, learning moments,
 * assessment questions, outcomes, and score reports.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Enum schemas
// ---------------------------------------------------------------------------

export const SECURITY_DOMAINS = [
  "phishing",
  "ransomware",
  "social_engineering",
  "data_protection",
  "network_security",
  "other",
] as const;

export const SecurityDomainSchema = z.enum(SECURITY_DOMAINS);

export const DifficultySchema = z.enum(["beginner", "intermediate", "advanced"]);

export const ScenarioStatusSchema = z.enum(["not_started", "in_progress", "completed"]);

export const ContentSourceSchema = z.enum(["generated", "fallback"]);

// ---------------------------------------------------------------------------
// Entity schemas
// ---------------------------------------------------------------------------

export const DecisionOptionSchema = z.object({
  label: z.string().min(1),
  feedbackText: z.string(),
});

export const DecisionPointSchema = z.object({
  id: z.string().min(1),
  promptText: z.string().min(1),
  options: z.array(DecisionOptionSchema).min(2),
  correctOptionIndex: z.number().int().min(0),
  userSelectedIndex: z.number().int().min(0).nullable(),
  contentSource: ContentSourceSchema,
});

export const LearningMomentSchema = z.object({
  text: z.string().min(1),
  triggeringDecisionId: z.string().min(1),
  contentSource: ContentSourceSchema,
});

export const AssessmentQuestionSchema = z.object({
  id: z.string().min(1),
  promptText: z.string().min(1),
  options: z.array(z.string().min(1)).min(2),
  correctOptionIndex: z.number().int().min(0),
  userAnswerIndex: z.number().int().min(0).nullable(),
  explanation: z.string(),
});

export const ScenarioRequirementsSchema = z.object({
  decisionPoints: z.number().int().min(0),
  assessmentQuestions: z.number().int().min(0),
});

export const ScenarioSchema = z.object({
  id: z.string().uuid(),
  title: z.string().min(1),
  description: z.string(),
  narrative: z.string(),
  domain: SecurityDomainSchema,
  difficulty: DifficultySchema,
  industryContext: z.string(),
  decisionPoints: z.array(DecisionPointSchema),
  learningMoments: z.array(LearningMomentSchema),
  assessmentQuestions: z.array(AssessmentQuestionSchema),
  status: ScenarioStatusSchema,
  requirements: ScenarioRequirementsSchema,
  contentSource: ContentSourceSchema,
  createdAt: z.string().datetime(),
  completedAt: z.string().datetime().nullable(),
});

// ---------------------------------------------------------------------------
// Outcome schemas
// ---------------------------------------------------------------------------

export const DecisionOutcomeSchema = z.object({
  decisionPointId: z.string(),
  selectedIndex: z.number().int(),
  isCorrect: z.boolean(),
  feedbackText: z.string(),
});

export const AssessmentOutcomeSchema = z.object({
  questionId: z.string(),
  selectedIndex: z.number().int(),
  isCorrect: z.boolean(),
  explanation: z.string(),
});

export const ScoreWeightsSchema = z.object({
  decision: z.number().min(0).max(1),
  assessment: z.number().min(0).max(1),
});

export const ScoreReportSchema = z.object({
  scenarioId: z.string(),
  correctDecisions: z.number().int().min(0),
  totalDecisions: z.number().int().min(0),
  decisionAccuracy: z.number().min(0).max(1),
  correctAnswers: z.number().int().min(0),
  totalQuestions: z.number().int().min(0),
  assessmentAccuracy: z.number().min(0).max(1),
  overallScore: z.number().min(0).max(1),
  weights: ScoreWeightsSchema,
  pointsEarned: z.number().int().min(0).max(100),
  passed: z.boolean(),
});

// ---------------------------------------------------------------------------
// Inferred TypeScript types
// ---------------------------------------------------------------------------

export type SecurityDomain = z.infer<typeof SecurityDomainSchema>;
export type Difficulty = z.infer<typeof DifficultySchema>;
export type ScenarioStatus = z.infer<typeof ScenarioStatusSchema>;
export type ContentSource = z.infer<typeof ContentSourceSchema>;
export type DecisionOption = z.infer<typeof DecisionOptionSchema>;
export type DecisionPoint = z.infer<typeof DecisionPointSchema>;
export type LearningMoment = z.infer<typeof LearningMomentSchema>;
export type AssessmentQuestion = z.infer<typeof AssessmentQuestionSchema>;
export type ScenarioRequirements = z.infer<typeof ScenarioRequirementsSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;
export type DecisionOutcome = z.infer<typeof DecisionOutcomeSchema>;
export type AssessmentOutcome = z.infer<typeof AssessmentOutcomeSchema>;
export type ScoreWeights = z.infer<typeof ScoreWeightsSchema>;
export type ScoreReport = z.infer<typeof ScoreReportSchema>;
