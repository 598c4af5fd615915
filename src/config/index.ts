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
 * Public config API.
 * Orchestrates: read → substitute → parse → validate → hash → freeze.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { type EnvSource, substituteEnvVars } from "./env-substitute";
import { ConfigError, ConfigValidationError } from "./errors";
import { computeConfigHash } from "./hasher";
import { type AppConfig, AppConfigSchema } from "./schema";

export interface LoadConfigOptions {
  env?: EnvSource;
}

export const DEFAULTS_FILE = "defaults.yaml";

let currentConfig: AppConfig | null = null;
let initPromise: Promise<AppConfig> | null = null;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Validate already-substituted YAML text into a frozen AppConfig.
 * Every schema issue is collected before failing.
 */
export function parseConfigText(
  text: string,
  sourceFile: string,
  options: LoadConfigOptions = {},
): AppConfig {
  const substituted = substituteEnvVars(text, sourceFile, options.env);

  let parsed: unknown;
  try {
    parsed = parseYaml(substituted) ?? {};
  } catch (error) {
    throw new ConfigError("config_invalid_yaml", {
      file: sourceFile,
      message: `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const result = AppConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigValidationError(
      sourceFile,
      result.error.issues.map((issue) => ({
        file: sourceFile,
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }

  const data = result.data;
  return Object.freeze({
    ai: Object.freeze(data.ai),
    scenario: Object.freeze(data.scenario),
    scoring: Object.freeze(data.scoring),
    storage: Object.freeze(data.storage),
    configHash: computeConfigHash(data),
    loadedAt: new Date(),
  });
}

/**
 * Load and validate a single YAML config file, and make it the current config.
 */
export async function loadConfigFromFile(
  filePath: string,
  options: LoadConfigOptions = {},
): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ConfigError("config_file_not_found", {
        file: filePath,
        message: `Config file not found: ${filePath}`,
      });
    }
    throw error;
  }

  const config = parseConfigText(raw, filePath, options);
  currentConfig = config;
  return config;
}

/**
 * Returns the current loaded config, or null if none has been loaded yet.
 */
export function getConfig(): AppConfig | null {
  return currentConfig;
}

/**
 * Ensures config is loaded, loading it lazily on first call.
 * Concurrent callers share the same Promise; a failed load is retried on the next call.
 * Reads the config directory from CONFIG_DIR or defaults to ./config.
 */
export async function ensureConfigLoaded(env: EnvSource = process.env): Promise<AppConfig> {
  if (currentConfig) return currentConfig;

  if (!initPromise) {
    const configDir = env.CONFIG_DIR ?? join(process.cwd(), "config");
    initPromise = loadConfigFromFile(join(configDir, DEFAULTS_FILE), { env });
  }

  try {
    return await initPromise;
  } catch (error) {
    initPromise = null;
    console.error("[config] ensureConfigLoaded failed:", error);
    throw error;
  }
}

/** Clears the cached config. Intended for tests. */
export function resetConfig(): void {
  currentConfig = null;
  initPromise = null;
}

export { ConfigError, ConfigValidationError, UnresolvedVariableError, describeConfigIssue } from "./errors";
export type { ConfigErrorCode, ConfigErrorDetail } from "./errors";
export { substituteEnvVars } from "./env-substitute";
export type { EnvSource } from "./env-substitute";
export { computeConfigHash, hashCanonical } from "./hasher";
export * from "./schema";
