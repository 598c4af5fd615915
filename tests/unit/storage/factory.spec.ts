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

const { mockSqliteAdapter, mockMkdirSync } = vi.hoisted(() => {
  const mockSqliteAdapter = {
    initialize: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
    getMetadata: vi.fn().mockReturnValue({ adapterName: "sqlite", adapterVersion: "1.0.0" }),
  };
  const mockMkdirSync = vi.fn();
  return { mockSqliteAdapter, mockMkdirSync };
});

vi.mock("@/storage/sqlite-adapter", () => ({
  SQLiteAdapter: vi.fn().mockImplementation(() => mockSqliteAdapter),
}));
vi.mock("node:fs", () => ({
  mkdirSync: mockMkdirSync,
}));

import { closeStorage, getStorage } from "@/storage/factory";
import { SQLiteAdapter } from "@/storage/sqlite-adapter";

describe("storage/factory", () => {
  beforeEach(async () => {
    await closeStorage();
    vi.clearAllMocks();
  });

  it("creates and initializes a SQLite adapter at the configured path", async () => {
    const adapter = await getStorage({ dbPath: "data/test/scenarios.db" });

    expect(SQLiteAdapter).toHaveBeenCalledWith({ dbPath: "data/test/scenarios.db" });
    expect(mockSqliteAdapter.initialize).toHaveBeenCalledTimes(1);
    expect(mockMkdirSync).toHaveBeenCalledWith("data/test", { recursive: true });
    expect(adapter).toBe(mockSqliteAdapter);
  });

  it("does not create directories for an in-memory database", async () => {
    await getStorage({ dbPath: ":memory:" });
    expect(mockMkdirSync).not.toHaveBeenCalled();
  });

  it("returns the same instance on subsequent calls", async () => {
    const first = await getStorage({ dbPath: ":memory:" });
    const second = await getStorage({ dbPath: "other.db" });

    expect(second).toBe(first);
    expect(SQLiteAdapter).toHaveBeenCalledTimes(1);
  });

  it("shares one initialization between concurrent callers", async () => {
    const [a, b] = await Promise.all([getStorage({ dbPath: ":memory:" }), getStorage({ dbPath: ":memory:" })]);

    expect(a).toBe(b);
    expect(mockSqliteAdapter.initialize).toHaveBeenCalledTimes(1);
  });

  it("closes the adapter and creates a fresh one afterwards", async () => {
    await getStorage({ dbPath: ":memory:" });
    await closeStorage();

    expect(mockSqliteAdapter.close).toHaveBeenCalledTimes(1);

    await getStorage({ dbPath: ":memory:" });
    expect(SQLiteAdapter).toHaveBeenCalledTimes(2);
  });
});
