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

import { InvalidStateError, ValidationError, type ValidationIssue } from "./errors";
import type { Scenario, ScoreReport, ScoreWeights } from "./schemas";

/**
 * Weighting between in-narrative decisions and the post-scenario assessment.
 * Override through the `scoring` section of the configuration.
 */
export const DEFAULT_SCORE_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
  decision: 0.5,
  assessment: 0.5,
});

export const DEFAULT_PASS_THRESHOLD = 0.7;

const WEIGHT_SUM_TOLERANCE = 1e-9;

export interface ScoreOptions {
  weights?: ScoreWeights;
  passThreshold?: number;
}

/**
 * Fraction of correct answers; 0 when there is nothing to answer.
 */
export function accuracy(correct: number, total: number): number {
  return total === 0 ? 0 : correct / total;
}

export function validateWeights(weights: ScoreWeights): void {
  const issues: ValidationIssue[] = [];
  if (weights.decision < 0) issues.push({ field: "decision", message: "must not be negative" });
  if (weights.assessment < 0) issues.push({ field: "assessment", message: "must not be negative" });
  if (Math.abs(weights.decision + weights.assessment - 1) > WEIGHT_SUM_TOLERANCE) {
    issues.push({ field: "weights", message: "decision and assessment weights must sum to 1" });
  }
  if (issues.length > 0) throw new ValidationError(issues);
}

/**
 * Whole percentage for display and points, truncated. The score is first
 * rounded to four decimal places of a percent so float products such as
 * 0.29 * 100 do not lose a point.
 */
export function toWholePercent(score: number): number {
  return Math.floor(Math.round(score * 1e6) / 1e4);
}

/**
 * Determine pass/fail based on overall score and threshold.
 */
export function isPassing(
  overallScore: number,
  passThreshold: number = DEFAULT_PASS_THRESHOLD,
): boolean {
  return overallScore >= passThreshold;
}

/**
 * Score a completed scenario. Pure: the same completed scenario always
 * yields an identical, frozen report.
 */
export function scoreScenario(scenario: Scenario, options: ScoreOptions = {}): ScoreReport {
  if (scenario.status !== "completed") {
    throw new InvalidStateError(scenario.status, "score the scenario");
  }

  const weights = options.weights ?? DEFAULT_SCORE_WEIGHTS;
  validateWeights(weights);

  const totalDecisions = scenario.decisionPoints.length;
  const correctDecisions = scenario.decisionPoints.filter(
    (dp) => dp.userSelectedIndex === dp.correctOptionIndex,
  ).length;

  const totalQuestions = scenario.assessmentQuestions.length;
  const correctAnswers = scenario.assessmentQuestions.filter(
    (q) => q.userAnswerIndex === q.correctOptionIndex,
  ).length;

  const decisionAccuracy = accuracy(correctDecisions, totalDecisions);
  const assessmentAccuracy = accuracy(correctAnswers, totalQuestions);
  const overallScore =
    decisionAccuracy * weights.decision + assessmentAccuracy * weights.assessment;

  return Object.freeze({
    scenarioId: scenario.id,
    correctDecisions,
    totalDecisions,
    decisionAccuracy,
    correctAnswers,
    totalQuestions,
    assessmentAccuracy,
    overallScore,
    weights: Object.freeze({ decision: weights.decision, assessment: weights.assessment }),
    pointsEarned: toWholePercent(overallScore),
    passed: isPassing(overallScore, options.passThreshold),
  });
}
