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
 * Scenario session flow: start → decisions → assessment → completion.
 * Generation failures fall back to deterministic content and mark the session
 * degraded; usage errors from the scenario model always propagate.
 */

import type { z } from "zod";
import { GenerationUnavailableError, type ProfileContext, type ScenarioAgent } from "../agent/contract";
import type { AuditLogger } from "../audit/audit-logger";
import type { AuditEventType } from "../audit/audit-types";
import { issueCertificate } from "../certificate/certificate";
import type { AppConfig } from "../config/schema";
import { describeParseError, extractStructuredContent } from "../content/parser";
import { extractPlainText } from "../content/plain-text";
import type { ProfileStore } from "../profile/profile-store";
import { recordScenarioCompletion, recordScenarioStart } from "../profile/progress";
import type { UserProfile } from "../profile/schemas";
import {
  AssessmentContentSchema,
  type AssessmentQuestionContent,
  type DecisionPointContent,
  DecisionPointsContentSchema,
  toAssessmentQuestions,
  toDecisionPoints,
} from "../scenario/content-schemas";
import { evaluateDecision, recordAssessmentAnswer, recordDecision } from "../scenario/decision-evaluator";
import { NotFoundError } from "../scenario/errors";
import {
  fallbackAssessment,
  fallbackDecisionPoints,
  fallbackFeedback,
  fallbackLearningMoment,
} from "../scenario/fallback-content";
import {
  addAssessmentQuestions,
  addDecisionPoints,
  addLearningMoment,
  createScenario,
  toScenarioContext,
} from "../scenario/scenario-model";
import type { AssessmentOutcome, LearningMoment, Scenario } from "../scenario/schemas";
import { scoreScenario } from "../scenario/score-calculator";
import type {
  AssessmentPreparation,
  CompletionResult,
  ContentRequest,
  DecisionResult,
  ScenarioSelection,
  ScenarioSession,
} from "./types";

export interface ScenarioSessionServiceOptions {
  agent: ScenarioAgent;
  config: Pick<AppConfig, "scenario" | "scoring">;
  audit?: AuditLogger;
  profileStore?: ProfileStore;
  now?: () => Date;
}

type Generated<T> = { ok: true; value: T } | { ok: false; reason: string };

function audienceOf(profile: UserProfile): ProfileContext {
  return {
    industry: profile.industry,
    role: profile.role,
    experienceLevel: profile.experienceLevel,
  };
}

export class ScenarioSessionService {
  private readonly agent: ScenarioAgent;
  private readonly config: Pick<AppConfig, "scenario" | "scoring">;
  private readonly audit?: AuditLogger;
  private readonly profileStore?: ProfileStore;
  private readonly now: () => Date;

  constructor(options: ScenarioSessionServiceOptions) {
    this.agent = options.agent;
    this.config = options.config;
    this.audit = options.audit;
    this.profileStore = options.profileStore;
    this.now = options.now ?? (() => new Date());
  }

  async startScenario(profile: UserProfile, selection: ScenarioSelection): Promise<ScenarioSession> {
    const startedProfile = recordScenarioStart(profile, this.now());

    const creation = await createScenario(this.agent, {
      domain: selection.domain,
      difficulty: selection.difficulty ?? profile.experienceLevel,
      industryContext: selection.industryContext ?? profile.industry,
      roleContext: profile.role,
      experienceLevel: profile.experienceLevel,
      requirements: this.config.scenario,
    });

    const session: ScenarioSession = {
      profile: startedProfile,
      scenario: creation.scenario,
      degraded: creation.degraded,
      decisionHistory: [],
    };

    await this.record("scenario-started", session, {
      domain: selection.domain,
      difficulty: creation.scenario.difficulty,
    });
    if (creation.degraded) {
      await this.recordDegraded(session, "narrative", creation.reason ?? "unknown");
    }

    await this.populateDecisionPoints(session);
    await this.profileStore?.save(session.profile);
    return session;
  }

  /**
   * Record a decision, then attach generated feedback and (for correct
   * choices) a learning moment. Usage errors are thrown before any
   * generation request is made, and again before the scenario is changed.
   */
  async answerDecision(
    session: ScenarioSession,
    decisionPointId: string,
    selectedIndex: number,
  ): Promise<DecisionResult> {
    const { scenario } = session;
    const preview = evaluateDecision(scenario, decisionPointId, selectedIndex);
    const point = scenario.decisionPoints.find((dp) => dp.id === decisionPointId);
    if (!point) throw new NotFoundError("DecisionPoint", decisionPointId, scenario.id);

    const context = toScenarioContext(scenario, audienceOf(session.profile));
    const selected = point.options[selectedIndex]?.label ?? "";
    const correct = point.options[point.correctOptionIndex]?.label ?? "";

    const feedbackResult = await this.generate<string>(
      session,
      "feedback",
      () =>
        this.agent.requestDecisionFeedback(
          context,
          { promptText: point.promptText, selectedOption: selected, correctOption: correct },
          preview.isCorrect,
        ),
      (raw) => {
        const text = extractPlainText(raw);
        return text ? { ok: true, value: text } : { ok: false, reason: "empty feedback text" };
      },
    );
    const feedback = feedbackResult.ok
      ? feedbackResult.value
      : fallbackFeedback(preview.feedbackText, preview.isCorrect);

    let learningMoment: LearningMoment | null = null;
    if (preview.isCorrect) {
      const momentResult = await this.generate<string>(
        session,
        "learning-moment",
        () => this.agent.requestLearningMoment(context, scenario.domain),
        (raw) => {
          const text = extractPlainText(raw);
          return text ? { ok: true, value: text } : { ok: false, reason: "empty learning moment text" };
        },
      );
      learningMoment = {
        text: momentResult.ok ? momentResult.value : fallbackLearningMoment(scenario.domain),
        triggeringDecisionId: point.id,
        contentSource: momentResult.ok ? "generated" : "fallback",
      };
    }

    // Another call may have answered this point while generation was pending.
    evaluateDecision(scenario, decisionPointId, selectedIndex);
    if (learningMoment) addLearningMoment(scenario, learningMoment);
    const outcome = recordDecision(scenario, decisionPointId, selectedIndex);
    session.decisionHistory.push({
      decisionPointId,
      selectedIndex,
      isCorrect: outcome.isCorrect,
      feedback,
      learningMoment: learningMoment?.text ?? null,
      recordedAt: this.now().toISOString(),
    });

    await this.record("decision-recorded", session, {
      decisionPointId,
      selectedIndex,
      isCorrect: outcome.isCorrect,
    });

    return { outcome, feedback, learningMoment, status: scenario.status };
  }

  /**
   * Generate the assessment for the scenario. Calling it again after the
   * questions exist returns them unchanged.
   */
  async prepareAssessment(session: ScenarioSession): Promise<AssessmentPreparation> {
    const { scenario } = session;
    if (scenario.assessmentQuestions.length > 0) {
      return { questions: scenario.assessmentQuestions, degraded: false };
    }

    const count = scenario.requirements.assessmentQuestions;
    const result = await this.generate(
      session,
      "assessment",
      () =>
        this.agent.requestAssessment(
          toScenarioContext(scenario, audienceOf(session.profile)),
          audienceOf(session.profile),
          count,
        ),
      (raw) => this.parseStructured(raw, AssessmentContentSchema),
    );

    const generated: AssessmentQuestionContent[] = result.ok ? result.value.slice(0, count) : [];
    const shortfall = count - generated.length;
    if (result.ok && shortfall > 0) {
      await this.recordDegraded(
        session,
        "assessment",
        `only ${generated.length} of ${count} questions generated`,
      );
    }

    const items = [...generated, ...fallbackAssessment(scenario.domain, count).slice(generated.length)];
    addAssessmentQuestions(scenario, toAssessmentQuestions(items));
    return { questions: scenario.assessmentQuestions, degraded: shortfall > 0 };
  }

  async answerAssessment(
    session: ScenarioSession,
    questionId: string,
    selectedIndex: number,
  ): Promise<AssessmentOutcome> {
    const outcome = recordAssessmentAnswer(session.scenario, questionId, selectedIndex);
    await this.record("assessment-answered", session, {
      questionId,
      selectedIndex,
      isCorrect: outcome.isCorrect,
    });
    return outcome;
  }

  /**
   * Score the completed scenario, update the profile, and issue a
   * certificate when the score passes.
   */
  async completeScenario(session: ScenarioSession): Promise<CompletionResult> {
    const { scenario } = session;
    const report = scoreScenario(scenario, {
      weights: {
        decision: this.config.scoring.decisionWeight,
        assessment: this.config.scoring.assessmentWeight,
      },
      passThreshold: this.config.scoring.passThreshold,
    });

    const now = this.now();
    const profile = recordScenarioCompletion(session.profile, scenario, report, now);
    session.profile = profile;

    await this.record("scenario-completed", session, {
      overallScore: report.overallScore,
      pointsEarned: report.pointsEarned,
      passed: report.passed,
    });

    const certificate = report.passed ? issueCertificate(profile, scenario, report, now) : null;
    if (certificate) {
      await this.record("certificate-issued", session, {
        certificateId: certificate.certificateId,
        contentHash: certificate.contentHash,
      });
    }

    await this.profileStore?.save(profile);
    return { report, profile, certificate };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async populateDecisionPoints(session: ScenarioSession): Promise<void> {
    const { scenario } = session;
    const count = scenario.requirements.decisionPoints;

    const result = await this.generate(
      session,
      "decision-points",
      () =>
        this.agent.requestDecisionPoints(toScenarioContext(scenario, audienceOf(session.profile)), count),
      (raw) => this.parseStructured(raw, DecisionPointsContentSchema),
    );

    const generated: DecisionPointContent[] = result.ok ? result.value : [];
    const fallback = fallbackDecisionPoints(scenario.domain, count);
    const kept = generated.slice(0, count);
    const toAdd = [
      ...toDecisionPoints(kept, "generated"),
      ...toDecisionPoints(fallback.slice(kept.length), "fallback"),
    ];
    if (result.ok && kept.length < count) {
      await this.recordDegraded(
        session,
        "decision-points",
        `only ${kept.length} of ${count} decision points generated`,
      );
    }

    addDecisionPoints(scenario, toAdd);
  }

  private parseStructured<S extends z.ZodTypeAny>(raw: string, schema: S): Generated<z.output<S>> {
    const parsed = extractStructuredContent(raw, schema);
    return parsed.ok
      ? { ok: true, value: parsed.value }
      : { ok: false, reason: describeParseError(parsed.error) };
  }

  /**
   * Run one generation request and parse its output. An unavailable backend
   * or unusable output is logged, audited, and reported as `ok: false`;
   * any other error propagates.
   */
  private async generate<T>(
    session: ScenarioSession,
    request: ContentRequest,
    call: () => Promise<string>,
    parse: (raw: string) => Generated<T>,
  ): Promise<Generated<T>> {
    let result: Generated<T>;
    try {
      result = parse(await call());
    } catch (error) {
      if (!(error instanceof GenerationUnavailableError)) throw error;
      result = { ok: false, reason: error.message };
    }

    if (!result.ok) {
      console.warn(`[session] ${request} fell back for scenario ${session.scenario.id}: ${result.reason}`);
      await this.recordDegraded(session, request, result.reason);
    }
    return result;
  }

  private async recordDegraded(session: ScenarioSession, request: ContentRequest, reason: string): Promise<void> {
    session.degraded = true;
    await this.record("scenario-content-degraded", session, { request, reason });
  }

  private async record(
    eventType: AuditEventType,
    session: { profile: UserProfile; scenario: Scenario },
    metadata: Record<string, unknown>,
  ): Promise<void> {
    await this.audit?.log({
      eventType,
      userId: session.profile.id,
      scenarioId: session.scenario.id,
      timestamp: this.now().toISOString(),
      metadata,
    });
  }
}
