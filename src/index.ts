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
 * Public API.
 */

export * from "./agent/index";
export { AuditLogger, AUDIT_COLLECTION } from "./audit/audit-logger";
export { AuditEventSchema, AuditEventTypeSchema } from "./audit/audit-types";
export type { AuditEvent, AuditEventInput, AuditEventType } from "./audit/audit-types";
export {
  CertificateSchema,
  computeCertificateHash,
  issueCertificate,
  verifyCertificate,
} from "./certificate/certificate";
export type { Certificate, CertificateBody } from "./certificate/certificate";
export {
  ConfigError,
  ConfigValidationError,
  UnresolvedVariableError,
  ensureConfigLoaded,
  getConfig,
  loadConfigFromFile,
  parseConfigText,
} from "./config/index";
export type { AIConfig, AppConfig } from "./config/schema";
export * from "./content/index";
export * from "./profile/index";
export { createRuntime } from "./runtime";
export type { Runtime, RuntimeOptions } from "./runtime";
export * from "./scenario/index";
export * from "./session/index";
export { DEFAULT_TENANT_ID } from "./storage/adapter";
export type { StorageAdapter } from "./storage/adapter";
export { SQLiteAdapter } from "./storage/sqlite-adapter";
export { closeStorage, getStorage } from "./storage/factory";
