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
 * Adapter factory. Creates and manages a shared StorageAdapter singleton.
 * The database path comes from the `storage.dbPath` configuration value.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { StorageAdapter } from "./adapter";
import { SQLiteAdapter } from "./sqlite-adapter";

export interface StorageOptions {
  dbPath: string;
}

let instance: StorageAdapter | null = null;
let initPromise: Promise<StorageAdapter> | null = null;

function createAdapter(options: StorageOptions): StorageAdapter {
  if (options.dbPath !== ":memory:") {
    mkdirSync(dirname(options.dbPath), { recursive: true });
  }
  return new SQLiteAdapter({ dbPath: options.dbPath });
}

/**
 * Returns a shared, initialized StorageAdapter singleton.
 * First call creates and initializes the adapter; subsequent calls return the
 * same instance regardless of the options passed.
 */
export function getStorage(options: StorageOptions): Promise<StorageAdapter> {
  if (instance) {
    return Promise.resolve(instance);
  }

  if (initPromise) {
    return initPromise;
  }

  initPromise = (async () => {
    try {
      const adapter = createAdapter(options);
      await adapter.initialize();
      instance = adapter;
      return adapter;
    } finally {
      initPromise = null;
    }
  })();

  return initPromise;
}

/**
 * Closes the singleton adapter and resets state.
 * Used for graceful shutdown and test cleanup.
 */
export async function closeStorage(): Promise<void> {
  if (instance) {
    await instance.close();
    instance = null;
  }
  initPromise = null;
}
