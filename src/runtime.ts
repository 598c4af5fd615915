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
 * Runtime assembly.
 * Loads dotenv and config, opens storage, resolves the model, and wires the
 * session service with audit logging and profile persistence.
 */

import { join } from "node:path";
import type { LanguageModel } from "ai";
import { config as loadDotenv } from "dotenv";
import type { ScenarioAgent } from "./agent/contract";
import { LlmScenarioAgent } from "./agent/llm-agent";
import { resolveModel } from "./agent/model-resolver";
import { AuditLogger } from "./audit/audit-logger";
import { DEFAULTS_FILE, loadConfigFromFile } from "./config/index";
import type { AppConfig } from "./config/schema";
import { type ProfileStore, StorageProfileStore } from "./profile/profile-store";
import { ScenarioSessionService } from "./session/session-service";
import type { StorageAdapter } from "./storage/adapter";
import { closeStorage, getStorage } from "./storage/factory";

export interface RuntimeOptions {
  /** Path to the YAML config file. Defaults to `$CONFIG_DIR/defaults.yaml`. */
  configPath?: string;
  env?: Record<string, string | undefined>;
  /** Skip reading `.env`. */
  skipDotenv?: boolean;
  /** Use this agent instead of one built from the configured model. */
  agent?: ScenarioAgent;
  /** Use this model instead of resolving one from configuration. */
  model?: LanguageModel;
}

export interface Runtime {
  config: AppConfig;
  storage: StorageAdapter;
  agent: ScenarioAgent;
  profiles: ProfileStore;
  audit: AuditLogger;
  sessions: ScenarioSessionService;
  close(): Promise<void>;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  if (!options.skipDotenv) {
    loadDotenv();
  }
  const env = options.env ?? process.env;

  const configPath =
    options.configPath ?? join(env.CONFIG_DIR ?? join(process.cwd(), "config"), DEFAULTS_FILE);
  const config = await loadConfigFromFile(configPath, { env });
  console.log(`[config] Loaded ${configPath}`);
  console.log(`[config] Config hash: ${config.configHash} (SHA-256)`);

  const storage = await getStorage({ dbPath: config.storage.dbPath });
  const agent =
    options.agent ??
    new LlmScenarioAgent({
      model: options.model ?? resolveModel(config.ai, env),
      settings: config.ai,
    });
  const audit = new AuditLogger(storage);
  const profiles = new StorageProfileStore(storage);

  return {
    config,
    storage,
    agent,
    profiles,
    audit,
    sessions: new ScenarioSessionService({ agent, config, audit, profileStore: profiles }),
    close: closeStorage,
  };
}
