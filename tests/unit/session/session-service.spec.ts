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

import { GenerationUnavailableError } from "@/agent/contract";
import { AuditLogger } from "@/audit/audit-logger";
import type { ProfileStore } from "@/profile/profile-store";
import { createProfile } from "@/profile/progress";
import type { UserProfile } from "@/profile/schemas";
import { AlreadyAnsweredError, InvalidStateError, NotFoundError } from "@/scenario/errors";
import { fallbackLearningMoment } from "@/scenario/fallback-content";
import { ScenarioSessionService, type ScenarioSessionServiceOptions } from "@/session/session-service";
import type { ScenarioSession } from "@/session/types";
import type { StorageAdapter } from "@/storage/adapter";
import { DECISION_POINT_ITEMS, FakeScenarioAgent, type FakeReply, type FakeRequest } from "../../fixtures/fake-agent";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date("2026-05-01T12:00:00.000Z");

const CONFIG: ScenarioSessionServiceOptions["config"] = {
  scenario: { decisionPoints: 3, assessmentQuestions: 3 },
  scoring: { decisionWeight: 0.5, assessmentWeight: 0.5, passThreshold: 0.7 },
};

class MemoryProfileStore implements ProfileStore {
  readonly saved: UserProfile[] = [];

  async load(id: string): Promise<UserProfile | null> {
    return [...this.saved].reverse().find((p) => p.id === id) ?? null;
  }

  async save(profile: UserProfile): Promise<void> {
    this.saved.push(profile);
  }
}

function createMockStorage(): StorageAdapter {
  return {
    initialize: vi.fn().mockResolvedValue(undefined),
    create: vi.fn().mockResolvedValue({ id: "evt-1" }),
    upsert: vi.fn(),
    findById: vi.fn(),
    findMany: vi.fn(),
    getMetadata: vi.fn().mockReturnValue({ adapterName: "mock", adapterVersion: "1.0" }),
    close: vi.fn(),
  };
}

function setup(replies: Partial<Record<FakeRequest, FakeReply | FakeReply[]>> = {}) {
  const agent = new FakeScenarioAgent(replies);
  const storage = createMockStorage();
  const profiles = new MemoryProfileStore();
  const service = new ScenarioSessionService({
    agent,
    config: CONFIG,
    audit: new AuditLogger(storage),
    profileStore: profiles,
    now: () => NOW,
  });

  const auditEvents = () =>
    vi.mocked(storage.create).mock.calls.map(([, , data]) => ({
      eventType: data.eventType,
      metadata: data.metadata,
    }));

  return { agent, service, profiles, auditEvents };
}

function learner(): UserProfile {
  return createProfile(
    { id: "user-1", displayName: "Ada", industry: "Finance", role: "Accounts payable clerk" },
    NOW,
  );
}

function pointId(session: ScenarioSession, index: number): string {
  const point = session.scenario.decisionPoints[index];
  if (!point) throw new Error(`no decision point at ${index}`);
  return point.id;
}

function unavailable(request: string): GenerationUnavailableError {
  return new GenerationUnavailableError("AI provider error: timeout", request, 2);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ScenarioSessionService", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("startScenario", () => {
    it("creates a scenario with generated decision points", async () => {
      const { service, profiles, auditEvents } = setup();

      const session = await service.startScenario(learner(), { domain: "phishing" });

      expect(session.degraded).toBe(false);
      expect(session.scenario.title).toBe("Invoice From a New Supplier");
      expect(session.scenario.difficulty).toBe("beginner");
      expect(session.scenario.industryContext).toBe("Finance");
      expect(session.scenario.decisionPoints.map((dp) => dp.contentSource)).toEqual([
        "generated",
        "generated",
        "generated",
      ]);
      expect(session.scenario.decisionPoints.map((dp) => dp.options.length)).toEqual([2, 3, 2]);
      expect(session.profile.scenariosStarted).toBe(1);
      expect(profiles.saved).toHaveLength(1);
      expect(auditEvents()).toEqual([
        { eventType: "scenario-started", metadata: { domain: "phishing", difficulty: "beginner" } },
      ]);
    });

    it("honours an explicit difficulty and industry", async () => {
      const { service, agent } = setup();

      const session = await service.startScenario(learner(), {
        domain: "ransomware",
        difficulty: "advanced",
        industryContext: "Manufacturing",
      });

      expect(session.scenario.difficulty).toBe("advanced");
      expect(session.scenario.industryContext).toBe("Manufacturing");
      expect(agent.callsFor("decision-points")[0]?.args[1]).toBe(3);
    });

    it("falls back to placeholder content when the narrative is malformed", async () => {
      const { service, auditEvents } = setup({ narrative: "Here is your scenario: {title: Phish" });

      const session = await service.startScenario(learner(), { domain: "phishing" });

      expect(session.degraded).toBe(true);
      expect(session.scenario.title).toBe("The Suspicious Email");
      expect(session.scenario.contentSource).toBe("fallback");
      expect(auditEvents()[1]?.eventType).toBe("scenario-content-degraded");
      expect(auditEvents()[1]?.metadata).toMatchObject({ request: "narrative" });
    });

    it("tops up a short decision point response with fallback items", async () => {
      const { service, auditEvents } = setup({
        "decision-points": JSON.stringify(DECISION_POINT_ITEMS.slice(0, 1)),
      });

      const session = await service.startScenario(learner(), { domain: "phishing" });

      expect(session.scenario.decisionPoints.map((dp) => dp.contentSource)).toEqual([
        "generated",
        "fallback",
        "fallback",
      ]);
      expect(session.scenario.decisionPoints[1]?.promptText).toBe(
        "While the phishing incident is being investigated, what should you do?",
      );
      expect(session.degraded).toBe(true);
      expect(auditEvents()[1]).toEqual({
        eventType: "scenario-content-degraded",
        metadata: { request: "decision-points", reason: "only 1 of 3 decision points generated" },
      });
    });

    it("uses fallback decision points when generation is unavailable", async () => {
      const { service } = setup({ "decision-points": unavailable("decision-points") });

      const session = await service.startScenario(learner(), { domain: "data_protection" });

      expect(session.scenario.decisionPoints).toHaveLength(3);
      expect(session.scenario.decisionPoints.every((dp) => dp.contentSource === "fallback")).toBe(true);
      expect(session.degraded).toBe(true);
      expect(console.warn).toHaveBeenCalledWith(
        `[session] decision-points fell back for scenario ${session.scenario.id}: AI provider error: timeout`,
      );
    });

    it("drops generated items beyond the configured count", async () => {
      const { service } = setup({
        "decision-points": JSON.stringify([...DECISION_POINT_ITEMS, ...DECISION_POINT_ITEMS.slice(0, 1)]),
      });

      const session = await service.startScenario(learner(), { domain: "phishing" });

      expect(session.scenario.decisionPoints).toHaveLength(3);
      expect(session.degraded).toBe(false);
    });
  });

  describe("answerDecision", () => {
    it("returns generated feedback and a learning moment for a correct choice", async () => {
      const { service, agent } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const result = await service.answerDecision(session, pointId(session, 0), 1);

      expect(result.outcome.isCorrect).toBe(true);
      expect(result.feedback).toBe("Verifying through a known channel is exactly right.");
      expect(result.learningMoment).toEqual({
        text: "Always verify payment changes out-of-band.",
        triggeringDecisionId: pointId(session, 0),
        contentSource: "generated",
      });
      expect(result.status).toBe("in_progress");
      expect(session.scenario.learningMoments).toHaveLength(1);
      expect(session.decisionHistory).toEqual([
        {
          decisionPointId: pointId(session, 0),
          selectedIndex: 1,
          isCorrect: true,
          feedback: "Verifying through a known channel is exactly right.",
          learningMoment: "Always verify payment changes out-of-band.",
          recordedAt: "2026-05-01T12:00:00.000Z",
        },
      ]);
      expect(agent.callsFor("feedback")[0]?.args[1]).toEqual({
        promptText: "The email asks you to open an attached invoice. What do you do?",
        selectedOption: "Verify the supplier by phone",
        correctOption: "Verify the supplier by phone",
      });
    });

    it("skips the learning moment for an incorrect choice", async () => {
      const { service, agent } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const result = await service.answerDecision(session, pointId(session, 0), 0);

      expect(result.outcome.isCorrect).toBe(false);
      expect(result.learningMoment).toBeNull();
      expect(agent.callsFor("learning-moment")).toHaveLength(0);
      expect(agent.callsFor("feedback")[0]?.args[2]).toBe(false);
    });

    it("uses the option's own feedback when generation is unavailable", async () => {
      const { service } = setup({ feedback: unavailable("feedback") });
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const result = await service.answerDecision(session, pointId(session, 0), 0);

      expect(result.feedback).toBe("Attachments from unknown senders can carry malware.");
      expect(session.degraded).toBe(true);
    });

    it("treats an empty feedback response as unusable", async () => {
      const { service, auditEvents } = setup({ feedback: "   " });
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const result = await service.answerDecision(session, pointId(session, 0), 1);

      expect(result.feedback).toBe("Out-of-band verification defeats spoofing.");
      expect(auditEvents()).toContainEqual({
        eventType: "scenario-content-degraded",
        metadata: { request: "feedback", reason: "empty feedback text" },
      });
    });

    it("uses the domain's fallback learning moment when generation is unavailable", async () => {
      const { service } = setup({ "learning-moment": unavailable("learning-moment") });
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const result = await service.answerDecision(session, pointId(session, 0), 1);

      expect(result.learningMoment).toEqual({
        text: fallbackLearningMoment("phishing"),
        triggeringDecisionId: pointId(session, 0),
        contentSource: "fallback",
      });
    });

    it("rejects a repeated answer before requesting any content", async () => {
      const { service, agent } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });
      await service.answerDecision(session, pointId(session, 0), 0);

      await expect(service.answerDecision(session, pointId(session, 0), 1)).rejects.toThrow(
        AlreadyAnsweredError,
      );
      expect(agent.callsFor("feedback")).toHaveLength(1);
      expect(session.decisionHistory).toHaveLength(1);
    });

    it("leaves no trace of a concurrent duplicate answer", async () => {
      const { service, auditEvents } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });
      const id = pointId(session, 0);

      const results = await Promise.allSettled([
        service.answerDecision(session, id, 1),
        service.answerDecision(session, id, 1),
      ]);

      const rejected = results.filter((r) => r.status === "rejected");
      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.status === "rejected" && rejected[0].reason).toBeInstanceOf(AlreadyAnsweredError);
      expect(session.scenario.learningMoments).toHaveLength(1);
      expect(session.decisionHistory).toHaveLength(1);
      expect(auditEvents().filter((e) => e.eventType === "decision-recorded")).toHaveLength(1);
    });

    it("rejects an unknown decision point", async () => {
      const { service, agent } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });

      await expect(service.answerDecision(session, "missing", 0)).rejects.toThrow(NotFoundError);
      expect(agent.callsFor("feedback")).toHaveLength(0);
    });

    it("propagates agent errors other than unavailability", async () => {
      const { service } = setup({ feedback: new TypeError("bad wiring") });
      const session = await service.startScenario(learner(), { domain: "phishing" });

      await expect(service.answerDecision(session, pointId(session, 0), 1)).rejects.toThrow("bad wiring");
      expect(session.scenario.decisionPoints[0]?.userSelectedIndex).toBeNull();
    });
  });

  describe("prepareAssessment", () => {
    it("generates the configured number of questions once", async () => {
      const { service, agent } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const first = await service.prepareAssessment(session);
      const second = await service.prepareAssessment(session);

      expect(first.degraded).toBe(false);
      expect(first.questions.map((q) => q.promptText)).toEqual([
        "What is the safest way to verify an unexpected payment request?",
        "Which sign most strongly suggests a phishing email?",
        "What should you do with a confirmed phishing email?",
      ]);
      expect(second.questions).toEqual(first.questions);
      expect(agent.callsFor("assessment")).toHaveLength(1);
      expect(agent.callsFor("assessment")[0]?.args[2]).toBe(3);
    });

    it("falls back to template questions when the response is malformed", async () => {
      const { service } = setup({ assessment: "no questions today" });
      const session = await service.startScenario(learner(), { domain: "phishing" });

      const result = await service.prepareAssessment(session);

      expect(result.degraded).toBe(true);
      expect(result.questions[0]?.promptText).toBe(
        "What is the most important first step when dealing with a phishing threat?",
      );
      expect(session.degraded).toBe(true);
    });
  });

  describe("completeScenario", () => {
    async function playThrough(assessmentAnswers: number[]) {
      const context = setup();
      const { service } = context;
      const session = await service.startScenario(learner(), { domain: "phishing" });
      for (let i = 0; i < 3; i++) {
        await service.answerDecision(session, pointId(session, i), 1);
      }
      const { questions } = await service.prepareAssessment(session);
      for (const [i, question] of questions.entries()) {
        await service.answerAssessment(session, question.id, assessmentAnswers[i] ?? 0);
      }
      return { ...context, session };
    }

    it("scores, updates the profile, and issues a certificate on a pass", async () => {
      const { service, session, profiles, auditEvents } = await playThrough([1, 1, 0]);
      expect(session.scenario.status).toBe("completed");

      const result = await service.completeScenario(session);

      expect(result.report.correctDecisions).toBe(3);
      expect(result.report.correctAnswers).toBe(2);
      expect(result.report.overallScore).toBeCloseTo(0.8333333, 6);
      expect(result.report.pointsEarned).toBe(83);
      expect(result.report.passed).toBe(true);
      expect(result.profile.totalPoints).toBe(83);
      expect(result.profile.completedScenarios).toHaveLength(1);
      expect(result.certificate?.scorePercent).toBe(83);
      expect(result.certificate?.recipientName).toBe("Ada");
      expect(session.profile).toBe(result.profile);
      expect(profiles.saved.at(-1)).toBe(result.profile);
      expect(auditEvents().map((e) => e.eventType)).toEqual([
        "scenario-started",
        "decision-recorded",
        "decision-recorded",
        "decision-recorded",
        "assessment-answered",
        "assessment-answered",
        "assessment-answered",
        "scenario-completed",
        "certificate-issued",
      ]);
    });

    it("issues no certificate below the pass threshold", async () => {
      const { service, session, auditEvents } = await playThrough([0, 0, 0]);

      const result = await service.completeScenario(session);

      expect(result.report.overallScore).toBe(0.5);
      expect(result.report.passed).toBe(false);
      expect(result.certificate).toBeNull();
      expect(auditEvents().at(-1)?.eventType).toBe("scenario-completed");
    });

    it("refuses to complete an unfinished scenario", async () => {
      const { service } = setup();
      const session = await service.startScenario(learner(), { domain: "phishing" });

      await expect(service.completeScenario(session)).rejects.toThrow(InvalidStateError);
    });
  });
});
