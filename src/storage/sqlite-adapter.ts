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
 * SQLite-backed StorageAdapter implementation using better-sqlite3.
 * Records are JSON documents in a single table; every query is scoped by tenant_id.
 */

import crypto from "node:crypto";
import Database from "better-sqlite3";
import type { StorageAdapter } from "./adapter";
import type { FilterValue, QueryFilter, StorageMetadata, StoredRecord } from "./types";

export interface SQLiteAdapterOptions {
  dbPath: string;
}

const FIELD_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function isDataRow(row: unknown): row is { data: string } {
  return typeof row === "object" && row !== null && "data" in row && typeof row.data === "string";
}

function decodeRecord(row: unknown): StoredRecord {
  if (!isDataRow(row)) {
    throw new Error("Malformed storage row: missing data column");
  }
  const parsed: unknown = JSON.parse(row.data);
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    Array.isArray(parsed) ||
    !("id" in parsed) ||
    typeof parsed.id !== "string"
  ) {
    throw new Error("Malformed storage row: data is not a record with an id");
  }
  return { ...parsed, id: parsed.id };
}

export class SQLiteAdapter implements StorageAdapter {
  private db: Database.Database;
  private initialized = false;

  constructor(options: SQLiteAdapterOptions) {
    this.db = new Database(options.dbPath);
    this.db.pragma("journal_mode = WAL");
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        id TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        collection TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (tenant_id, collection, id)
      );

      CREATE INDEX IF NOT EXISTS idx_records_tenant_collection
        ON records (tenant_id, collection);
    `);

    this.initialized = true;
  }

  async create(
    tenantId: string,
    collection: string,
    data: Record<string, unknown>,
  ): Promise<StoredRecord> {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();
    const record = { ...data, id };

    this.db
      .prepare(
        "INSERT INTO records (id, tenant_id, collection, data, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)",
      )
      .run(id, tenantId, collection, JSON.stringify(record), now, now);

    return record;
  }

  async upsert(
    tenantId: string,
    collection: string,
    id: string,
    data: Record<string, unknown>,
  ): Promise<StoredRecord> {
    const now = new Date().toISOString();
    const record = { ...data, id };

    this.db
      .prepare(
        `INSERT INTO records (id, tenant_id, collection, data, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (tenant_id, collection, id)
         DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at`,
      )
      .run(id, tenantId, collection, JSON.stringify(record), now, now);

    return record;
  }

  async findById(tenantId: string, collection: string, id: string): Promise<StoredRecord | null> {
    const row: unknown = this.db
      .prepare("SELECT data FROM records WHERE id = ? AND tenant_id = ? AND collection = ?")
      .get(id, tenantId, collection);

    if (row === undefined) {
      return null;
    }

    return decodeRecord(row);
  }

  async findMany(tenantId: string, collection: string, query: QueryFilter): Promise<StoredRecord[]> {
    const conditions: string[] = ["tenant_id = ?", "collection = ?"];
    const params: FilterValue[] = [tenantId, collection];

    if (query.where) {
      for (const [key, value] of Object.entries(query.where)) {
        if (value === null) {
          conditions.push(`json_extract(data, '$.' || ?) IS NULL`);
          params.push(key);
        } else {
          conditions.push(`json_extract(data, '$.' || ?) = ?`);
          params.push(key, value);
        }
      }
    }

    const orderClauses = (query.orderBy ?? []).map((o) => {
      if (!FIELD_NAME.test(o.field)) {
        throw new Error(`Invalid order field: ${o.field}`);
      }
      const dir = o.direction === "desc" ? "DESC" : "ASC";
      return `json_extract(data, '$.${o.field}') ${dir}`;
    });
    const sql = `SELECT data FROM records WHERE ${conditions.join(" AND ")} ORDER BY ${[
      ...orderClauses,
      "created_at ASC",
      "rowid ASC",
    ].join(", ")}`;

    const rows: unknown[] = this.db.prepare(sql).all(...params);
    return rows.map(decodeRecord);
  }

  getMetadata(): StorageMetadata {
    return {
      adapterName: "sqlite",
      adapterVersion: "1.0.0",
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
