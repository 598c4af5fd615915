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
 * Scenario model: construction, content appends, and lifecycle advancement.
 * A Scenario is a plain record owned by the caller; the functions here mutate it
 * in place and enforce its invariants. Completed scenarios are immutable.
 */

import { randomUUID } from "node:crypto";
import type { ProfileContext, ScenarioAgent, ScenarioBrief, ScenarioContext } from "../agent/contract";
import { GenerationUnavailableError } from "../agent/contract";
import { describeParseError, extractStructuredContent } from "../content/parser";
import { type NarrativeContent, NarrativeContentSchema } from "./content-schemas";
import { NotFoundError, ValidationError, type ValidationIssue } from "./errors";
import { fallbackNarrative } from "./fallback-content";
import {
  AssessmentQuestionSchema,
  type AssessmentQuestion,
  type ContentSource,
  type DecisionPoint,
  DecisionPointSchema,
  type Difficulty,
  type LearningMoment,
  type Scenario,
  type ScenarioRequirements,
  type SecurityDomain,
} from "./schemas";
import { assertMutable, transitionScenario } from "./state-machine";

export const DEFAULT_REQUIREMENTS: Readonly<ScenarioRequirements> = Object.freeze({
  decisionPoints: 3,
  assessmentQuestions: 3,
});

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface ScenarioInit {
  domain: SecurityDomain;
  difficulty: Difficulty;
  industryContext: string;
  content: NarrativeContent;
  contentSource: ContentSource;
  requirements?: Partial<ScenarioRequirements>;
}

/**
 * Build a `not_started` scenario from already-validated narrative content.
 */
export function initializeScenario(init: ScenarioInit): Scenario {
  return {
    id: randomUUID(),
    title: init.content.title,
    description: init.content.description,
    narrative: init.content.narrative ?? init.content.description,
    domain: init.domain,
    difficulty: init.difficulty,
    industryContext: init.industryContext,
    decisionPoints: [],
    learningMoments: [],
    assessmentQuestions: [],
    status: "not_started",
    requirements: { ...DEFAULT_REQUIREMENTS, ...init.requirements },
    contentSource: init.contentSource,
    createdAt: new Date().toISOString(),
    completedAt: null,
  };
}

export interface ScenarioRequest {
  domain: SecurityDomain;
  difficulty: Difficulty;
  industryContext: string;
  roleContext: string;
  experienceLevel: Difficulty;
  requirements?: Partial<ScenarioRequirements>;
}

export interface ScenarioCreation {
  scenario: Scenario;
  /** True when the narrative is fallback content rather than generated. */
  degraded: boolean;
  reason: string | null;
}

/**
 * Request a narrative from the agent and build a scenario from it.
 * Unparseable output or an unavailable backend yields the domain's placeholder
 * scenario with `degraded: true`; any other agent error propagates.
 */
export async function createScenario(
  agent: ScenarioAgent,
  request: ScenarioRequest,
): Promise<ScenarioCreation> {
  const brief: ScenarioBrief = {
    domain: request.domain,
    difficulty: request.difficulty,
    industry: request.industryContext,
    role: request.roleContext,
    experienceLevel: request.experienceLevel,
  };

  const build = (content: NarrativeContent, contentSource: ContentSource): Scenario =>
    initializeScenario({
      domain: request.domain,
      difficulty: request.difficulty,
      industryContext: request.industryContext,
      content,
      contentSource,
      requirements: request.requirements,
    });

  let raw: string;
  try {
    raw = await agent.requestScenarioNarrative(brief);
  } catch (error) {
    if (!(error instanceof GenerationUnavailableError)) throw error;
    console.warn(`[scenario-model] narrative generation unavailable (${request.domain}):`, error.message);
    return {
      scenario: build(fallbackNarrative(request.domain), "fallback"),
      degraded: true,
      reason: error.message,
    };
  }

  const parsed = extractStructuredContent(raw, NarrativeContentSchema);
  if (!parsed.ok) {
    const reason = describeParseError(parsed.error);
    console.warn(`[scenario-model] narrative response rejected (${request.domain}): ${reason}`);
    return {
      scenario: build(fallbackNarrative(request.domain), "fallback"),
      degraded: true,
      reason,
    };
  }

  return { scenario: build(parsed.value, "generated"), degraded: false, reason: null };
}

// ---------------------------------------------------------------------------
// Content appends
// ---------------------------------------------------------------------------

function schemaIssues(
  index: number,
  result: { success: true } | { success: false; error: { issues: { path: (string | number)[]; message: string }[] } },
): ValidationIssue[] {
  if (result.success) return [];
  return result.error.issues.map((issue) => ({
    index,
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

/**
 * Append decision points atomically: every entry is validated first and a
 * single invalid entry rejects the whole batch.
 */
export function addDecisionPoints(scenario: Scenario, points: readonly DecisionPoint[]): void {
  assertMutable(scenario.status, "add decision points");

  const issues: ValidationIssue[] = [];
  const seenIds = new Set(scenario.decisionPoints.map((dp) => dp.id));

  points.forEach((point, index) => {
    issues.push(...schemaIssues(index, DecisionPointSchema.safeParse(point)));
    if (point.correctOptionIndex >= point.options.length) {
      issues.push({
        index,
        field: "correctOptionIndex",
        message: `must be less than ${point.options.length}`,
      });
    }
    if (point.userSelectedIndex !== null) {
      issues.push({ index, field: "userSelectedIndex", message: "must be unanswered when added" });
    }
    if (seenIds.has(point.id)) {
      issues.push({ index, field: "id", message: `duplicate decision point id '${point.id}'` });
    }
    seenIds.add(point.id);
  });

  if (issues.length > 0) throw new ValidationError(issues);

  scenario.decisionPoints.push(...points.map((p) => ({ ...p, options: p.options.map((o) => ({ ...o })) })));
}

/**
 * Append assessment questions atomically, with the same rules as decision points.
 */
export function addAssessmentQuestions(
  scenario: Scenario,
  questions: readonly AssessmentQuestion[],
): void {
  assertMutable(scenario.status, "add assessment questions");

  const issues: ValidationIssue[] = [];
  const seenIds = new Set(scenario.assessmentQuestions.map((q) => q.id));

  questions.forEach((question, index) => {
    issues.push(...schemaIssues(index, AssessmentQuestionSchema.safeParse(question)));
    if (question.correctOptionIndex >= question.options.length) {
      issues.push({
        index,
        field: "correctOptionIndex",
        message: `must be less than ${question.options.length}`,
      });
    }
    if (question.userAnswerIndex !== null) {
      issues.push({ index, field: "userAnswerIndex", message: "must be unanswered when added" });
    }
    if (seenIds.has(question.id)) {
      issues.push({ index, field: "id", message: `duplicate question id '${question.id}'` });
    }
    seenIds.add(question.id);
  });

  if (issues.length > 0) throw new ValidationError(issues);

  scenario.assessmentQuestions.push(...questions.map((q) => ({ ...q, options: [...q.options] })));
}

export function addLearningMoment(scenario: Scenario, moment: LearningMoment): void {
  assertMutable(scenario.status, "add learning moment");

  if (!scenario.decisionPoints.some((dp) => dp.id === moment.triggeringDecisionId)) {
    throw new NotFoundError("DecisionPoint", moment.triggeringDecisionId, scenario.id);
  }
  if (moment.text.trim() === "") {
    throw new ValidationError([{ field: "text", message: "must not be empty" }]);
  }

  scenario.learningMoments.push({ ...moment });
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

function hasAnyAnswer(scenario: Scenario): boolean {
  return (
    scenario.decisionPoints.some((dp) => dp.userSelectedIndex !== null) ||
    scenario.assessmentQuestions.some((q) => q.userAnswerIndex !== null)
  );
}

/**
 * True when the required number of decision points and assessment questions
 * exist and every one of them has been answered.
 */
export function isReadyToComplete(scenario: Scenario): boolean {
  const { decisionPoints, assessmentQuestions, requirements } = scenario;
  if (decisionPoints.length + assessmentQuestions.length === 0) return false;
  return (
    decisionPoints.length >= requirements.decisionPoints &&
    assessmentQuestions.length >= requirements.assessmentQuestions &&
    decisionPoints.every((dp) => dp.userSelectedIndex !== null) &&
    assessmentQuestions.every((q) => q.userAnswerIndex !== null)
  );
}

/**
 * Apply every eligible forward transition. A call with no eligible
 * transition (including on a completed scenario) changes nothing.
 */
export function advance(scenario: Scenario): Scenario {
  if (scenario.status === "not_started" && hasAnyAnswer(scenario)) {
    scenario.status = transitionScenario(scenario.status, "answer-recorded");
  }
  if (scenario.status === "in_progress" && isReadyToComplete(scenario)) {
    scenario.status = transitionScenario(scenario.status, "all-answered");
    scenario.completedAt = new Date().toISOString();
  }
  return scenario;
}

export function toScenarioContext(scenario: Scenario, audience: ProfileContext): ScenarioContext {
  return {
    title: scenario.title,
    description: scenario.description,
    domain: scenario.domain,
    difficulty: scenario.difficulty,
    industryContext: scenario.industryContext,
    audience,
  };
}
