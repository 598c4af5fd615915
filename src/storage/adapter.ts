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
 * StorageAdapter interface for a pluggable storage backend.
 * Every method is scoped by tenantId; a single-user deployment uses DEFAULT_TENANT_ID.
 */

import type { QueryFilter, StorageMetadata, StoredRecord } from "./types";

export const DEFAULT_TENANT_ID = "default";

export interface StorageAdapter {
  initialize(): Promise<void>;

  /** Insert a record under a generated id. */
  create(tenantId: string, collection: string, data: Record<string, unknown>): Promise<StoredRecord>;

  /** Insert or replace the record with the given id. */
  upsert(
    tenantId: string,
    collection: string,
    id: string,
    data: Record<string, unknown>,
  ): Promise<StoredRecord>;

  findById(tenantId: string, collection: string, id: string): Promise<StoredRecord | null>;

  findMany(tenantId: string, collection: string, query: QueryFilter): Promise<StoredRecord[]>;

  getMetadata(): StorageMetadata;

  close(): Promise<void>;
}
