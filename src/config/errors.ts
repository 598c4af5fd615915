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
 * Errors raised while loading the scenario configuration. Each carries the
 * stage that failed as its `code`, so callers can tell a missing file from a
 * bad value without matching on messages.
 */

export type ConfigErrorCode =
  | "config_file_not_found"
  | "config_invalid_yaml"
  | "config_unresolved_variable"
  | "config_invalid";

export interface ConfigErrorDetail {
  file?: string;
  /** Dotted field path within the config, e.g. `scoring.passThreshold`. */
  path?: string;
  message: string;
}

export function describeConfigIssue(detail: ConfigErrorDetail): string {
  const location = [detail.file && `File: ${detail.file}`, detail.path && `Field: ${detail.path}`].filter(
    (part): part is string => Boolean(part),
  );
  return [...location, `Message: ${detail.message}`].join(", ");
}

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly file?: string;
  readonly path?: string;

  constructor(code: ConfigErrorCode, detail: ConfigErrorDetail) {
    super(detail.message);
    this.name = "ConfigError";
    this.code = code;
    this.file = detail.file;
    this.path = detail.path;
  }

  toString(): string {
    return `${this.name} [${this.code}] ${describeConfigIssue(this)}`;
  }
}

/** One or more `${VAR}` references had no value and no default. */
export class UnresolvedVariableError extends ConfigError {
  readonly variables: readonly string[];

  constructor(file: string, variables: string[]) {
    super("config_unresolved_variable", {
      file,
      message: `Unresolved environment variable: \${${variables[0] ?? ""}}`,
    });
    this.name = "UnresolvedVariableError";
    this.variables = Object.freeze([...variables]);
  }
}

/** Schema validation failed; every issue is kept, in schema order. */
export class ConfigValidationError extends ConfigError {
  readonly errors: readonly ConfigErrorDetail[];

  constructor(file: string, errors: ConfigErrorDetail[]) {
    super("config_invalid", {
      file,
      message: `Config validation failed with ${errors.length} error(s):\n${errors
        .map((e) => `  - ${describeConfigIssue(e)}`)
        .join("\n")}`,
    });
    this.name = "ConfigValidationError";
    this.errors = Object.freeze([...errors]);
  }

  /** Field paths that failed validation, without duplicates. */
  get fields(): string[] {
    return [...new Set(this.errors.flatMap((e) => (e.path ? [e.path] : [])))];
  }
}
