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
 * ScenarioAgent backed by the Vercel AI SDK.
 * Each request is a single self-contained generateText() call with a timeout.
 * A failed call is retried after a backoff delay; when every attempt fails the
 * request rejects with GenerationUnavailableError. Partial output is never returned.
 * Prompt injection mitigation: sanitised inputs, XML boundaries, untrusted-data labelling.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { LanguageModel } from "ai";
import { generateText } from "ai";
import type { AIConfig } from "../config/schema";
import { sanitizePromptInput } from "../guardrails/sanitizer";
import type { SecurityDomain } from "../scenario/schemas";
import {
  type DecisionContext,
  GenerationUnavailableError,
  type ProfileContext,
  type ScenarioAgent,
  type ScenarioBrief,
  type ScenarioContext,
} from "./contract";
import {
  type LearnerFields,
  SYSTEM_PROMPT,
  type ScenarioFields,
  buildAssessmentPrompt,
  buildDecisionPointsPrompt,
  buildFeedbackPrompt,
  buildLearningMomentPrompt,
  buildNarrativePrompt,
} from "./prompts";

/** Generated scenario text is longer than profile fields but still bounded in prompts. */
const MAX_SCENARIO_FIELD_LENGTH = 2000;

export type AgentGenerationSettings = Pick<
  AIConfig,
  "temperature" | "timeoutMs" | "maxRetries" | "retryBackoffMs"
>;

export interface LlmScenarioAgentOptions {
  model: LanguageModel;
  settings: AgentGenerationSettings;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function learnerFields(profile: ProfileContext): LearnerFields {
  return {
    industry: sanitizePromptInput(profile.industry),
    role: sanitizePromptInput(profile.role),
    experienceLevel: profile.experienceLevel,
  };
}

function scenarioFields(scenario: ScenarioContext): ScenarioFields {
  return {
    title: sanitizePromptInput(scenario.title),
    description: sanitizePromptInput(scenario.description, MAX_SCENARIO_FIELD_LENGTH),
    domain: scenario.domain,
    difficulty: scenario.difficulty,
    industryContext: sanitizePromptInput(scenario.industryContext),
  };
}

export class LlmScenarioAgent implements ScenarioAgent {
  private readonly model: LanguageModel;
  private readonly settings: AgentGenerationSettings;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: LlmScenarioAgentOptions) {
    this.model = options.model;
    this.settings = options.settings;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  requestScenarioNarrative(brief: ScenarioBrief): Promise<string> {
    return this.generate(
      "narrative",
      buildNarrativePrompt(brief.domain, brief.difficulty, learnerFields(brief)),
    );
  }

  requestDecisionPoints(scenario: ScenarioContext, count: number): Promise<string> {
    return this.generate(
      "decision-points",
      buildDecisionPointsPrompt(scenarioFields(scenario), learnerFields(scenario.audience), count),
    );
  }

  requestDecisionFeedback(
    scenario: ScenarioContext,
    decision: DecisionContext,
    wasCorrect: boolean,
  ): Promise<string> {
    return this.generate(
      "feedback",
      buildFeedbackPrompt(
        scenarioFields(scenario),
        {
          promptText: sanitizePromptInput(decision.promptText, MAX_SCENARIO_FIELD_LENGTH),
          selectedOption: sanitizePromptInput(decision.selectedOption),
          correctOption: sanitizePromptInput(decision.correctOption),
        },
        wasCorrect,
      ),
    );
  }

  requestLearningMoment(scenario: ScenarioContext, domain: SecurityDomain): Promise<string> {
    return this.generate("learning-moment", buildLearningMomentPrompt(scenarioFields(scenario), domain));
  }

  requestAssessment(
    scenario: ScenarioContext,
    profile: ProfileContext,
    numQuestions: number,
  ): Promise<string> {
    return this.generate(
      "assessment",
      buildAssessmentPrompt(scenarioFields(scenario), learnerFields(profile), numQuestions),
    );
  }

  private async generate(request: string, prompt: string): Promise<string> {
    const attempts = this.settings.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const { text } = await generateText({
          model: this.model,
          system: SYSTEM_PROMPT,
          prompt,
          temperature: this.settings.temperature,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(this.settings.timeoutMs),
        });
        if (text.trim() === "") {
          throw new Error("AI provider returned an empty response");
        }
        return text;
      } catch (error) {
        lastError = error;
        console.warn(
          `[llm-agent] ${request} attempt ${attempt}/${attempts} failed: ${errorMessage(error)}`,
        );
      }

      if (attempt < attempts) {
        await this.sleep(this.settings.retryBackoffMs * attempt);
      }
    }

    throw new GenerationUnavailableError(
      `AI provider error: ${errorMessage(lastError)}`,
      request,
      attempts,
    );
  }
}
