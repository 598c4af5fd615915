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
 * Agent module public API.
 */

export { GenerationUnavailableError } from "./contract";
export type {
  DecisionContext,
  ProfileContext,
  ScenarioAgent,
  ScenarioBrief,
  ScenarioContext,
} from "./contract";
export { LlmScenarioAgent } from "./llm-agent";
export type { AgentGenerationSettings, LlmScenarioAgentOptions } from "./llm-agent";
export { resolveModel } from "./model-resolver";
export { SYSTEM_PROMPT, domainGuidance } from "./prompts";
