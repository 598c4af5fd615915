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
 * Pure profile progress operations. Every function returns a new profile;
 * the input is never mutated.
 */

import { SECURITY_DOMAINS, type Scenario, type ScoreReport, type SecurityDomain } from "../scenario/schemas";
import { InvalidStateError } from "../scenario/errors";
import {
  type CompletionRecord,
  MAX_SKILL_SCORE,
  type ProfileInput,
  ProfileInputSchema,
  type SkillScores,
  type UserProfile,
} from "./schemas";

/** Fraction of the overall score added to the domain skill on completion. */
export const SKILL_GAIN_FACTOR = 0.5;

function emptySkillScores(): SkillScores {
  return {
    phishing: 0,
    ransomware: 0,
    social_engineering: 0,
    data_protection: 0,
    network_security: 0,
    other: 0,
  };
}

export function createProfile(input: ProfileInput, now: Date = new Date()): UserProfile {
  const data = ProfileInputSchema.parse(input);
  const timestamp = now.toISOString();
  return {
    ...data,
    skillScores: emptySkillScores(),
    completedScenarios: [],
    scenariosStarted: 0,
    totalPoints: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function recordScenarioStart(profile: UserProfile, now: Date = new Date()): UserProfile {
  return {
    ...profile,
    scenariosStarted: profile.scenariosStarted + 1,
    updatedAt: now.toISOString(),
  };
}

/**
 * Append a completion record, add the points earned, and raise the domain
 * skill by `overallScore * SKILL_GAIN_FACTOR`, capped at MAX_SKILL_SCORE.
 */
export function recordScenarioCompletion(
  profile: UserProfile,
  scenario: Scenario,
  report: ScoreReport,
  now: Date = new Date(),
): UserProfile {
  if (scenario.status !== "completed") {
    throw new InvalidStateError(scenario.status, "record completion");
  }

  const record: CompletionRecord = {
    scenarioId: scenario.id,
    title: scenario.title,
    domain: scenario.domain,
    completedAt: scenario.completedAt ?? now.toISOString(),
    pointsEarned: report.pointsEarned,
    correctDecisions: report.correctDecisions,
    totalDecisions: report.totalDecisions,
    assessmentScore: report.assessmentAccuracy,
    overallScore: report.overallScore,
    passed: report.passed,
  };

  const current = profile.skillScores[scenario.domain];
  const raised = Math.min(MAX_SKILL_SCORE, current + report.overallScore * SKILL_GAIN_FACTOR);

  return {
    ...profile,
    skillScores: { ...profile.skillScores, [scenario.domain]: raised },
    completedScenarios: [...profile.completedScenarios, record],
    totalPoints: profile.totalPoints + report.pointsEarned,
    updatedAt: now.toISOString(),
  };
}

/**
 * Domains ordered weakest first: ascending skill score, then fewest
 * completions, then declared domain order.
 */
export function recommendDomains(profile: UserProfile, count = 3): SecurityDomain[] {
  const completions = new Map<SecurityDomain, number>();
  for (const record of profile.completedScenarios) {
    completions.set(record.domain, (completions.get(record.domain) ?? 0) + 1);
  }

  return SECURITY_DOMAINS.map((domain, order) => ({
    domain,
    order,
    skill: profile.skillScores[domain],
    completed: completions.get(domain) ?? 0,
  }))
    .sort((a, b) => a.skill - b.skill || a.completed - b.completed || a.order - b.order)
    .slice(0, Math.max(0, count))
    .map((entry) => entry.domain);
}
