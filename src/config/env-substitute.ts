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
 * Environment variable substitution for config files.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Runs on raw YAML text BEFORE parsing.
 */

import { UnresolvedVariableError } from "./errors";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Substitute ${VAR} and ${VAR:-default} references in raw text.
 * An empty default (`${VAR:-}`) resolves to the empty string.
 * @throws UnresolvedVariableError listing every variable that is unset and has no default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: EnvSource = process.env,
): string {
  const unresolved: string[] = [];

  const result = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const sep = expr.indexOf(":-");
    const varName = sep === -1 ? expr : expr.slice(0, sep);
    const value = env[varName];
    if (value !== undefined) return value;
    if (sep !== -1) return expr.slice(sep + 2);

    unresolved.push(varName);
    return match;
  });

  if (unresolved.length > 0) {
    throw new UnresolvedVariableError(sourceFile, [...new Set(unresolved)]);
  }

  return result;
}
