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
 * Decision and assessment answer recording.
 * Answers are write-once: a second answer is rejected, never overwritten.
 */

import {
  AlreadyAnsweredError,
  IndexOutOfRangeError,
  NotFoundError,
} from "./errors";
import { advance } from "./scenario-model";
import type {
  AssessmentOutcome,
  AssessmentQuestion,
  DecisionOutcome,
  DecisionPoint,
  Scenario,
} from "./schemas";
import { assertMutable } from "./state-machine";

function assertIndexInRange(selectedIndex: number, optionCount: number): void {
  if (!Number.isInteger(selectedIndex) || selectedIndex < 0 || selectedIndex >= optionCount) {
    throw new IndexOutOfRangeError(selectedIndex, optionCount);
  }
}

function findDecisionPoint(scenario: Scenario, decisionPointId: string): DecisionPoint {
  const point = scenario.decisionPoints.find((dp) => dp.id === decisionPointId);
  if (!point) throw new NotFoundError("DecisionPoint", decisionPointId, scenario.id);
  return point;
}

function findQuestion(scenario: Scenario, questionId: string): AssessmentQuestion {
  const question = scenario.assessmentQuestions.find((q) => q.id === questionId);
  if (!question) throw new NotFoundError("AssessmentQuestion", questionId, scenario.id);
  return question;
}

/**
 * Check a decision without recording it. Throws exactly the errors
 * recordDecision would throw.
 */
export function evaluateDecision(
  scenario: Scenario,
  decisionPointId: string,
  selectedIndex: number,
): DecisionOutcome {
  assertMutable(scenario.status, "record a decision");
  const point = findDecisionPoint(scenario, decisionPointId);
  if (point.userSelectedIndex !== null) {
    throw new AlreadyAnsweredError("DecisionPoint", point.id, point.userSelectedIndex);
  }
  assertIndexInRange(selectedIndex, point.options.length);

  const option = point.options[selectedIndex];
  return {
    decisionPointId: point.id,
    selectedIndex,
    isCorrect: selectedIndex === point.correctOptionIndex,
    feedbackText: option?.feedbackText ?? "",
  };
}

/**
 * Record the user's choice for a decision point and advance the scenario.
 * Feedback is the chosen option's feedback whether or not it was correct.
 */
export function recordDecision(
  scenario: Scenario,
  decisionPointId: string,
  selectedIndex: number,
): DecisionOutcome {
  const outcome = evaluateDecision(scenario, decisionPointId, selectedIndex);
  findDecisionPoint(scenario, decisionPointId).userSelectedIndex = selectedIndex;
  advance(scenario);
  return outcome;
}

/**
 * Record an assessment answer and advance the scenario.
 */
export function recordAssessmentAnswer(
  scenario: Scenario,
  questionId: string,
  selectedIndex: number,
): AssessmentOutcome {
  assertMutable(scenario.status, "record an assessment answer");
  const question = findQuestion(scenario, questionId);
  if (question.userAnswerIndex !== null) {
    throw new AlreadyAnsweredError("AssessmentQuestion", question.id, question.userAnswerIndex);
  }
  assertIndexInRange(selectedIndex, question.options.length);

  question.userAnswerIndex = selectedIndex;
  advance(scenario);

  return {
    questionId: question.id,
    selectedIndex,
    isCorrect: selectedIndex === question.correctOptionIndex,
    explanation: question.explanation,
  };
}
