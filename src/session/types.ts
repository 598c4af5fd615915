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
 * Session value types. A ScenarioSession is owned by the caller (the
 * presentation layer); the service only reads and updates the value passed in.
 */

import type { ContentDegradedMetadata } from "../audit/audit-types";
import type { Certificate } from "../certificate/certificate";
import type { UserProfile } from "../profile/schemas";
import type {
  AssessmentQuestion,
  DecisionOutcome,
  Difficulty,
  LearningMoment,
  Scenario,
  ScoreReport,
  SecurityDomain,
} from "../scenario/schemas";

export type ContentRequest = ContentDegradedMetadata["request"];

export interface ScenarioSelection {
  domain: SecurityDomain;
  /** Defaults to the profile's experience level. */
  difficulty?: Difficulty;
  /** Defaults to the profile's industry. */
  industryContext?: string;
}

export interface DecisionHistoryEntry {
  decisionPointId: string;
  selectedIndex: number;
  isCorrect: boolean;
  feedback: string;
  learningMoment: string | null;
  recordedAt: string;
}

export interface ScenarioSession {
  profile: UserProfile;
  scenario: Scenario;
  /** True once any piece of content has come from fallback data. */
  degraded: boolean;
  decisionHistory: DecisionHistoryEntry[];
}

export interface DecisionResult {
  outcome: DecisionOutcome;
  /** Generated analysis of the choice, or the option's own feedback on fallback. */
  feedback: string;
  learningMoment: LearningMoment | null;
  status: Scenario["status"];
}

export interface AssessmentPreparation {
  questions: AssessmentQuestion[];
  degraded: boolean;
}

export interface CompletionResult {
  report: ScoreReport;
  profile: UserProfile;
  certificate: Readonly<Certificate> | null;
}
