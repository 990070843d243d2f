/**
 * @classbank/node: HTTP API for the classroom economy.
 */

export { EconomyService } from "./services/economy-service.js";
export type { EconomyServiceOptions, EconomyHealth } from "./services/economy-service.js";
export { AuditLog, computeAuditHash, GENESIS_HASH } from "./services/audit-log.js";
export type {
  AuditCategory,
  AuditLogInput,
  AuditLogEntry,
  AuditLogQuery,
  AuditChainResult,
} from "./services/audit-log.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
