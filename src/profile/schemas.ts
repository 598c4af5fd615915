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
 * Zod schemas for learner profiles and progress records.
 */

import { z } from "zod";
import { DifficultySchema, type SecurityDomain, SecurityDomainSchema } from "../scenario/schemas";

export const MAX_SKILL_SCORE = 5;

export const SkillScoreSchema = z.number().min(0).max(MAX_SKILL_SCORE);

export const SkillScoresSchema = z.object({
  phishing: SkillScoreSchema,
  ransomware: SkillScoreSchema,
  social_engineering: SkillScoreSchema,
  data_protection: SkillScoreSchema,
  network_security: SkillScoreSchema,
  other: SkillScoreSchema,
} satisfies Record<SecurityDomain, typeof SkillScoreSchema>);

export const CompletionRecordSchema = z.object({
  scenarioId: z.string().min(1),
  title: z.string(),
  domain: SecurityDomainSchema,
  completedAt: z.string().datetime(),
  pointsEarned: z.number().int().min(0),
  correctDecisions: z.number().int().min(0),
  totalDecisions: z.number().int().min(0),
  assessmentScore: z.number().min(0).max(1),
  overallScore: z.number().min(0).max(1),
  passed: z.boolean(),
});

export const UserProfileSchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  industry: z.string(),
  role: z.string(),
  experienceLevel: DifficultySchema,
  skillScores: SkillScoresSchema,
  completedScenarios: z.array(CompletionRecordSchema),
  scenariosStarted: z.number().int().min(0),
  totalPoints: z.number().int().min(0),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const ProfileInputSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().trim().default(""),
  industry: z.string().trim().default(""),
  role: z.string().trim().default(""),
  experienceLevel: DifficultySchema.default("beginner"),
});

export type SkillScores = z.infer<typeof SkillScoresSchema>;
export type CompletionRecord = z.infer<typeof CompletionRecordSchema>;
export type UserProfile = z.infer<typeof UserProfileSchema>;
export type ProfileInput = z.input<typeof ProfileInputSchema>;
