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
 * Immutable audit event logger.
 * Audit entries are append-only: events can be written and read back, never
 * updated or deleted.
 * A failed write is logged and never interrupts the learning flow.
 */

import { DEFAULT_TENANT_ID, type StorageAdapter } from "../storage/adapter";
import { type AuditEvent, type AuditEventInput, AuditEventInputSchema, AuditEventSchema } from "./audit-types";

export const AUDIT_COLLECTION = "audit_events";

export class AuditLogger {
  private readonly storage: StorageAdapter;
  private readonly tenantId: string;

  constructor(storage: StorageAdapter, tenantId: string = DEFAULT_TENANT_ID) {
    this.storage = storage;
    this.tenantId = tenantId;
  }

  /**
   * Record an immutable audit event.
   * This is the ONLY write operation exposed.
   */
  async log(event: AuditEventInput): Promise<void> {
    const parsed = AuditEventInputSchema.safeParse(event);
    if (!parsed.success) {
      console.error("[audit] event validation failed:", parsed.error.message);
      return;
    }

    try {
      await this.storage.create(this.tenantId, AUDIT_COLLECTION, {
        eventType: parsed.data.eventType,
        userId: parsed.data.userId,
        scenarioId: parsed.data.scenarioId,
        timestamp: parsed.data.timestamp,
        metadata: parsed.data.metadata,
      });
    } catch (error) {
      console.error(`[audit] logging failed (${parsed.data.eventType}):`, error);
    }
  }

  /**
   * The audit trail of one scenario, oldest first. Records that no longer
   * match the event schema are skipped with a warning.
   */
  async listScenarioEvents(scenarioId: string): Promise<AuditEvent[]> {
    const records = await this.storage.findMany(this.tenantId, AUDIT_COLLECTION, {
      where: { scenarioId },
      orderBy: [{ field: "timestamp", direction: "asc" }],
    });

    const events: AuditEvent[] = [];
    for (const record of records) {
      const parsed = AuditEventSchema.safeParse(record);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        console.warn(`[audit] skipping invalid event record ${record.id}`);
      }
    }
    return events;
  }
}
