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
 * AI model resolver.
 * Resolves AI configuration to an AI SDK LanguageModel instance.
 * When a gateway URL is configured, provider requests route through it.
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { createAzure } from "@ai-sdk/azure";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { EnvSource } from "../config/env-substitute";
import type { AIConfig } from "../config/schema";

function requireKey(env: EnvSource, name: string, providerLabel: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required for ${providerLabel} provider`);
  }
  return value;
}

export function resolveModel(
  aiConfig: Pick<AIConfig, "provider" | "model" | "gatewayUrl">,
  env: EnvSource = process.env,
): LanguageModel {
  const gatewayUrl = aiConfig.gatewayUrl ?? env.AI_GATEWAY_URL;
  const baseURL = gatewayUrl ? { baseURL: gatewayUrl } : {};

  switch (aiConfig.provider) {
    case "anthropic": {
      const anthropic = createAnthropic({
        apiKey: requireKey(env, "ANTHROPIC_API_KEY", "Anthropic"),
        ...baseURL,
      });
      return anthropic(aiConfig.model);
    }
    case "openai": {
      const openai = createOpenAI({
        apiKey: requireKey(env, "OPENAI_API_KEY", "OpenAI"),
        ...baseURL,
      });
      return openai(aiConfig.model);
    }
    case "azure-openai": {
      const azure = createAzure({
        apiKey: requireKey(env, "AZURE_OPENAI_API_KEY", "Azure OpenAI"),
        ...baseURL,
      });
      return azure(aiConfig.model);
    }
    default: {
      const _exhaustive: never = aiConfig.provider;
      throw new Error(`Unsupported AI provider: ${_exhaustive}`);
    }
  }
}
