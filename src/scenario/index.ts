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
 * Scenario module public API.
 */

export {
  AssessmentContentSchema,
  AssessmentQuestionContentSchema,
  DecisionPointContentSchema,
  DecisionPointsContentSchema,
  NarrativeContentSchema,
  toAssessmentQuestions,
  toDecisionPoints,
} from "./content-schemas";
export type {
  AssessmentQuestionContent,
  DecisionPointContent,
  NarrativeContent,
} from "./content-schemas";
export { evaluateDecision, recordAssessmentAnswer, recordDecision } from "./decision-evaluator";
export {
  AlreadyAnsweredError,
  IndexOutOfRangeError,
  InvalidStateError,
  NotFoundError,
  ScenarioError,
  ValidationError,
} from "./errors";
export type { ScenarioErrorCode, ValidationIssue } from "./errors";
export {
  fallbackAssessment,
  fallbackDecisionPoints,
  fallbackFeedback,
  fallbackLearningMoment,
  fallbackNarrative,
  formatDomain,
} from "./fallback-content";
export {
  DEFAULT_REQUIREMENTS,
  addAssessmentQuestions,
  addDecisionPoints,
  addLearningMoment,
  advance,
  createScenario,
  initializeScenario,
  isReadyToComplete,
  toScenarioContext,
} from "./scenario-model";
export type { ScenarioCreation, ScenarioInit, ScenarioRequest } from "./scenario-model";
export * from "./schemas";
export {
  DEFAULT_PASS_THRESHOLD,
  DEFAULT_SCORE_WEIGHTS,
  accuracy,
  isPassing,
  scoreScenario,
  toWholePercent,
  validateWeights,
} from "./score-calculator";
export type { ScoreOptions } from "./score-calculator";
export {
  SCENARIO_TRANSITIONS,
  assertMutable,
  canTransitionScenario,
  isScenarioTerminal,
  transitionScenario,
} from "./state-machine";
export type { ScenarioEvent } from "./state-machine";
