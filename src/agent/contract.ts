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
 * Agent orchestration contract: the provider-independent interface the rest of
 * the application uses to request generated content.
 * Every request is self-contained: all context is passed explicitly and each call
 * resolves to the raw model text, which callers parse themselves.
 */

import type { Difficulty, SecurityDomain } from "../scenario/schemas";

export interface ProfileContext {
  industry: string;
  role: string;
  experienceLevel: Difficulty;
}

/** Everything needed to generate the opening narrative of a new scenario. */
export interface ScenarioBrief extends ProfileContext {
  domain: SecurityDomain;
  difficulty: Difficulty;
}

export interface ScenarioContext {
  title: string;
  description: string;
  domain: SecurityDomain;
  difficulty: Difficulty;
  industryContext: string;
  audience: ProfileContext;
}

export interface DecisionContext {
  promptText: string;
  selectedOption: string;
  correctOption: string;
}

export interface ScenarioAgent {
  requestScenarioNarrative(brief: ScenarioBrief): Promise<string>;
  requestDecisionPoints(scenario: ScenarioContext, count: number): Promise<string>;
  requestDecisionFeedback(
    scenario: ScenarioContext,
    decision: DecisionContext,
    wasCorrect: boolean,
  ): Promise<string>;
  requestLearningMoment(scenario: ScenarioContext, domain: SecurityDomain): Promise<string>;
  requestAssessment(
    scenario: ScenarioContext,
    profile: ProfileContext,
    numQuestions: number,
  ): Promise<string>;
}

export class GenerationUnavailableError extends Error {
  readonly code = "generation_unavailable";

  constructor(
    message: string,
    public readonly request: string,
    public readonly attempts: number,
  ) {
    super(message);
    this.name = "GenerationUnavailableError";
  }
}
