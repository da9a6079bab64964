export { DashboardClient, DEFAULT_DASHBOARD_PORT } from './infrastructure/tcp/DashboardClient.js';
export type { DashboardClientConfig } from './infrastructure/tcp/DashboardClient.js';
export { ScriptClient, DEFAULT_SCRIPT_PORT } from './infrastructure/tcp/ScriptClient.js';
export type { ScriptClientConfig } from './infrastructure/tcp/ScriptClient.js';
export { ReplyDecoder, cleanReplyLine, MAX_REPLY_LENGTH } from './infrastructure/tcp/ReplyDecoder.js';
export { PinoLogger } from './infrastructure/logging/PinoLogger.js';
export { loadConfig, validateConfig } from './infrastructure/config/Config.js';
export type { AppConfig } from './infrastructure/config/Config.js';
export { HttpServer } from './presentation/HttpServer.js';
export * from './domain/index.js';
export * from './application/index.js';
