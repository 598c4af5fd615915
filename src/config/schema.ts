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
 * Zod schemas for runtime configuration validation.
 * All schemas use .strict() to reject unknown fields.
 */

import { z } from "zod";

const WEIGHT_SUM_TOLERANCE = 1e-9;

export const AIConfigSchema = z
  .object({
    provider: z.enum(["anthropic", "openai", "azure-openai"]).default("anthropic"),
    model: z.string().min(1).default("claude-sonnet-4-20250514"),
    temperature: z.number().min(0).max(1).default(0.7),
    timeoutMs: z.number().int().positive().default(30_000),
    maxRetries: z.number().int().min(0).max(5).default(1),
    retryBackoffMs: z.number().int().min(0).default(1_000),
    gatewayUrl: z
      .string()
      .url()
      .optional()
      .describe("Vercel AI Gateway URL. When set, provider requests route through the gateway."),
  })
  .strict();

export const ScenarioConfigSchema = z
  .object({
    decisionPoints: z.number().int().min(1).max(10).default(3),
    assessmentQuestions: z.number().int().min(1).max(10).default(3),
  })
  .strict();

export const ScoringConfigSchema = z
  .object({
    decisionWeight: z.number().min(0).max(1).default(0.5),
    assessmentWeight: z.number().min(0).max(1).default(0.5),
    passThreshold: z.number().min(0).max(1).default(0.7),
  })
  .strict()
  .refine(
    (s) => Math.abs(s.decisionWeight + s.assessmentWeight - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: "decisionWeight and assessmentWeight must sum to 1", path: ["assessmentWeight"] },
  );

export const StorageConfigSchema = z
  .object({
    dbPath: z.string().min(1).default("data/scenarios.db"),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    ai: AIConfigSchema.default({}),
    scenario: ScenarioConfigSchema.default({}),
    scoring: ScoringConfigSchema.default({}),
    storage: StorageConfigSchema.default({}),
  })
  .strict();

export type AIConfig = z.output<typeof AIConfigSchema>;
export type ScenarioConfig = z.output<typeof ScenarioConfigSchema>;
export type ScoringConfig = z.output<typeof ScoringConfigSchema>;
export type StorageConfig = z.output<typeof StorageConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfigParsed = z.output<typeof AppConfigSchema>;

/** Validated configuration plus load metadata. Frozen once loaded. */
export interface AppConfig extends AppConfigParsed {
  readonly configHash: string;
  readonly loadedAt: Date;
}
