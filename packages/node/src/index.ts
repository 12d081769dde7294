/**
 * @trustnet/node — Package public API.
 *
 * main.ts is the executable; this module only re-exports, so the app
 * can be embedded or tested without starting a server.
 */

export { NetworkService, COMMANDS_METRIC } from "./services/network-service.js";
export type { NetworkServiceConfig } from "./services/network-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery } from "./services/audit-log.js";
export { SnapshotFile, computeStateHash } from "./services/snapshot-file.js";
export type { StoredNetworkSnapshot } from "./services/snapshot-file.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
