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
 * Error types for scenario lifecycle and answer recording.
 * These signal usage errors in the calling layer and always propagate.
 */

export type ScenarioErrorCode =
  | "validation_failed"
  | "not_found"
  | "already_answered"
  | "index_out_of_range"
  | "invalid_state";

export abstract class ScenarioError extends Error {
  abstract readonly code: ScenarioErrorCode;
}

export interface ValidationIssue {
  index?: number;
  field: string;
  message: string;
}

export class ValidationError extends ScenarioError {
  readonly code = "validation_failed";
  readonly issues: readonly ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues
      .map((i) => `${i.index !== undefined ? `[${i.index}] ` : ""}${i.field}: ${i.message}`)
      .join("; ");
    super(`Validation failed: ${summary}`);
    this.name = "ValidationError";
    this.issues = Object.freeze([...issues]);
  }
}

export class NotFoundError extends ScenarioError {
  readonly code = "not_found";

  constructor(
    public readonly entity: string,
    public readonly id: string,
    public readonly scenarioId: string,
  ) {
    super(`${entity} '${id}' does not belong to scenario '${scenarioId}'`);
    this.name = "NotFoundError";
  }
}

export class AlreadyAnsweredError extends ScenarioError {
  readonly code = "already_answered";

  constructor(
    public readonly entity: string,
    public readonly id: string,
    public readonly existingIndex: number,
  ) {
    super(`${entity} '${id}' was already answered with option ${existingIndex}`);
    this.name = "AlreadyAnsweredError";
  }
}

export class IndexOutOfRangeError extends ScenarioError {
  readonly code = "index_out_of_range";

  constructor(
    public readonly index: number,
    public readonly optionCount: number,
  ) {
    super(`Option index ${index} is out of range (expected 0..${optionCount - 1})`);
    this.name = "IndexOutOfRangeError";
  }
}

export class InvalidStateError extends ScenarioError {
  readonly code = "invalid_state";

  constructor(
    public readonly currentState: string,
    public readonly operation: string,
  ) {
    super(`Invalid state: cannot ${operation} while scenario is '${currentState}'`);
    this.name = "InvalidStateError";
  }
}
