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
 * Audit event types and schemas for the scenario learning flow.
 */

import { z } from "zod";

export const AuditEventTypeSchema = z.enum([
  "scenario-started",
  "scenario-content-degraded",
  "decision-recorded",
  "assessment-answered",
  "scenario-completed",
  "certificate-issued",
]);

export type AuditEventType = z.infer<typeof AuditEventTypeSchema>;

export const AuditEventInputSchema = z.object({
  eventType: AuditEventTypeSchema,
  userId: z.string().nullable(),
  scenarioId: z.string().nullable().default(null),
  timestamp: z.string().datetime(),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type AuditEventInput = z.input<typeof AuditEventInputSchema>;

/** An audit event as read back from storage. */
export const AuditEventSchema = AuditEventInputSchema.extend({ id: z.string() });

export type AuditEvent = z.infer<typeof AuditEventSchema>;

/** Which content request fell back, and why. */
export const ContentDegradedMetadataSchema = z.object({
  request: z.enum(["narrative", "decision-points", "feedback", "learning-moment", "assessment"]),
  reason: z.string(),
});

export type ContentDegradedMetadata = z.infer<typeof ContentDegradedMetadataSchema>;
