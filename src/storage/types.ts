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
 * Storage value types shared by StorageAdapter implementations.
 */

/** Values that can be matched with a `where` equality filter. */
export type FilterValue = string | number | null;

export interface QueryFilter {
  where?: Record<string, FilterValue>;
  /** Sort keys; rows that tie on every key keep insertion order. */
  orderBy?: { field: string; direction: "asc" | "desc" }[];
}

/** A JSON record as stored; callers validate the shape they expect. */
export type StoredRecord = Record<string, unknown> & { id: string };

export interface StorageMetadata {
  adapterName: string;
  adapterVersion: string;
}
