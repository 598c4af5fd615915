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

import { AUDIT_COLLECTION, AuditLogger } from "@/audit/audit-logger";
import type { AuditEventInput } from "@/audit/audit-types";
import type { StorageAdapter } from "@/storage/adapter";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ISO = "2026-02-22T12:00:00.000Z";

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

function validEvent(overrides: Partial<AuditEventInput> = {}): AuditEventInput {
  return {
    eventType: "scenario-started",
    userId: "user-001",
    scenarioId: "scn-001",
    timestamp: ISO,
    metadata: { domain: "phishing" },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("AuditLogger", () => {
  let storage: StorageAdapter;
  let logger: AuditLogger;

  beforeEach(() => {
    storage = createMockStorage();
    logger = new AuditLogger(storage);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes a valid event to the audit collection under the default tenant", async () => {
    await logger.log(validEvent());

    expect(storage.create).toHaveBeenCalledWith("default", AUDIT_COLLECTION, {
      eventType: "scenario-started",
      userId: "user-001",
      scenarioId: "scn-001",
      timestamp: ISO,
      metadata: { domain: "phishing" },
    });
  });

  it("uses the tenant it was constructed with", async () => {
    const scoped = new AuditLogger(storage, "team-a");
    await scoped.log(validEvent());
    expect(vi.mocked(storage.create).mock.calls[0]?.[0]).toBe("team-a");
  });

  it("defaults scenarioId to null and metadata to an empty object", async () => {
    await logger.log({ eventType: "certificate-issued", userId: "user-001", timestamp: ISO });

    expect(storage.create).toHaveBeenCalledWith("default", "audit_events", {
      eventType: "certificate-issued",
      userId: "user-001",
      scenarioId: null,
      timestamp: ISO,
      metadata: {},
    });
  });

  it("drops events that fail validation and logs the reason", async () => {
    await logger.log(validEvent({ timestamp: "yesterday" }));

    expect(storage.create).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0]?.[0]).toBe("[audit] event validation failed:");
  });

  it("logs storage failures without throwing", async () => {
    const failure = new Error("disk full");
    vi.mocked(storage.create).mockRejectedValueOnce(failure);

    await expect(logger.log(validEvent({ eventType: "decision-recorded" }))).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith("[audit] logging failed (decision-recorded):", failure);
  });

  it("exposes no update or delete operation", () => {
    expect("update" in logger).toBe(false);
    expect("delete" in logger).toBe(false);
  });

  describe("listScenarioEvents", () => {
    it("reads a scenario's events oldest first", async () => {
      vi.mocked(storage.findMany).mockResolvedValueOnce([{ id: "evt-1", ...validEvent() }]);

      const events = await logger.listScenarioEvents("scn-001");

      expect(storage.findMany).toHaveBeenCalledWith("default", AUDIT_COLLECTION, {
        where: { scenarioId: "scn-001" },
        orderBy: [{ field: "timestamp", direction: "asc" }],
      });
      expect(events).toEqual([{ id: "evt-1", ...validEvent() }]);
    });

    it("skips records that do not match the event schema", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      vi.mocked(storage.findMany).mockResolvedValueOnce([
        { id: "evt-1", eventType: "unknown-event", userId: null, timestamp: ISO },
        { id: "evt-2", ...validEvent({ eventType: "scenario-completed" }) },
      ]);

      const events = await logger.listScenarioEvents("scn-001");

      expect(events.map((e) => e.id)).toEqual(["evt-2"]);
      expect(warn).toHaveBeenCalledWith("[audit] skipping invalid event record evt-1");
    });
  });
});
