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

import { InvalidStateError } from "./errors";
import type { ScenarioStatus } from "./schemas";

// ---------------------------------------------------------------------------
// Event types
// ---------------------------------------------------------------------------

export type ScenarioEvent = "answer-recorded" | "all-answered";

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

/**
 * Maps (currentStatus, event) → nextStatus for all valid scenario transitions.
 * Transitions only move forward.
 */
export const SCENARIO_TRANSITIONS: Partial<
  Record<ScenarioStatus, Partial<Record<ScenarioEvent, ScenarioStatus>>>
> = {
  not_started: {
    "answer-recorded": "in_progress",
  },
  in_progress: {
    "all-answered": "completed",
  },
  // completed is terminal.
};

// ---------------------------------------------------------------------------
// Pure transition functions
// ---------------------------------------------------------------------------

/**
 * Returns the next ScenarioStatus for the given event, or throws
 * InvalidStateError when the transition is not defined.
 */
export function transitionScenario(
  currentStatus: ScenarioStatus,
  event: ScenarioEvent,
): ScenarioStatus {
  const next = SCENARIO_TRANSITIONS[currentStatus]?.[event];
  if (next === undefined) {
    throw new InvalidStateError(currentStatus, `apply event '${event}'`);
  }
  return next;
}

/**
 * Returns true when the (currentStatus, event) pair is a valid transition.
 * Never throws.
 */
export function canTransitionScenario(currentStatus: ScenarioStatus, event: ScenarioEvent): boolean {
  return SCENARIO_TRANSITIONS[currentStatus]?.[event] !== undefined;
}

const SCENARIO_TERMINAL_STATES = new Set<ScenarioStatus>(["completed"]);

export function isScenarioTerminal(status: ScenarioStatus): boolean {
  return SCENARIO_TERMINAL_STATES.has(status);
}

/**
 * Throws InvalidStateError when the scenario no longer accepts mutation.
 */
export function assertMutable(status: ScenarioStatus, operation: string): void {
  if (isScenarioTerminal(status)) {
    throw new InvalidStateError(status, operation);
  }
}
