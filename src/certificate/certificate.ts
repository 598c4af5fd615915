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
 * Completion certificates for passed scenarios.
 * The content hash covers every other field, so any edit to an issued
 * certificate is detectable with verifyCertificate().
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { hashCanonical } from "../config/hasher";
import type { UserProfile } from "../profile/schemas";
import { InvalidStateError } from "../scenario/errors";
import { type Scenario, type ScoreReport, SecurityDomainSchema } from "../scenario/schemas";
import { toWholePercent } from "../scenario/score-calculator";

export const CertificateBodySchema = z.object({
  certificateId: z.string().uuid(),
  recipientName: z.string(),
  scenarioId: z.string(),
  scenarioTitle: z.string(),
  domain: SecurityDomainSchema,
  scorePercent: z.number().int().min(0).max(100),
  issuedAt: z.string().datetime(),
});

export const CertificateSchema = CertificateBodySchema.extend({
  contentHash: z.string().regex(/^[a-f0-9]{64}$/),
});

export type CertificateBody = z.infer<typeof CertificateBodySchema>;
export type Certificate = z.infer<typeof CertificateSchema>;

export function computeCertificateHash(body: CertificateBody): string {
  return hashCanonical(CertificateBodySchema.parse(body), "certificate");
}

/**
 * Issue a certificate for a completed scenario with a passing report.
 * @throws InvalidStateError when the scenario is not completed or the report did not pass.
 */
export function issueCertificate(
  profile: UserProfile,
  scenario: Scenario,
  report: ScoreReport,
  now: Date = new Date(),
): Readonly<Certificate> {
  if (scenario.status !== "completed") {
    throw new InvalidStateError(scenario.status, "issue a certificate");
  }
  if (!report.passed || report.scenarioId !== scenario.id) {
    throw new InvalidStateError(scenario.status, "issue a certificate without a passing score");
  }

  const body: CertificateBody = {
    certificateId: randomUUID(),
    recipientName: profile.displayName || profile.id,
    scenarioId: scenario.id,
    scenarioTitle: scenario.title,
    domain: scenario.domain,
    scorePercent: toWholePercent(report.overallScore),
    issuedAt: now.toISOString(),
  };

  return Object.freeze({ ...body, contentHash: computeCertificateHash(body) });
}

/**
 * True when the stored hash matches the certificate's current contents.
 */
export function verifyCertificate(certificate: Certificate): boolean {
  const { contentHash, ...body } = certificate;
  const parsed = CertificateBodySchema.safeParse(body);
  if (!parsed.success) return false;
  return hashCanonical(parsed.data, "certificate") === contentHash;
}
