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
 * Profile persistence. The scenario core never stores profiles itself;
 * callers load and save through a ProfileStore.
 */

import { DEFAULT_TENANT_ID, type StorageAdapter } from "../storage/adapter";
import { type UserProfile, UserProfileSchema } from "./schemas";

export const PROFILE_COLLECTION = "user_profiles";

export interface ProfileStore {
  load(id: string): Promise<UserProfile | null>;
  save(profile: UserProfile): Promise<void>;
}

export class StorageProfileStore implements ProfileStore {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly tenantId: string = DEFAULT_TENANT_ID,
  ) {}

  /**
   * Returns null when no profile exists. A stored record that no longer
   * matches the schema is reported and treated as absent.
   */
  async load(id: string): Promise<UserProfile | null> {
    const record = await this.storage.findById(this.tenantId, PROFILE_COLLECTION, id);
    if (!record) return null;

    const parsed = UserProfileSchema.safeParse(record);
    if (!parsed.success) {
      console.error(`[profile-store] stored profile ${id} failed validation:`, parsed.error.message);
      return null;
    }
    return parsed.data;
  }

  async save(profile: UserProfile): Promise<void> {
    const data = UserProfileSchema.parse(profile);
    await this.storage.upsert(this.tenantId, PROFILE_COLLECTION, data.id, data);
  }
}
