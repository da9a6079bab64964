export * from './entities/ConnectionState.js';
export * from './entities/DashboardReply.js';
export * from './ports/ILogger.js';
export * from './ports/IDashboardClient.js';
export * from './entities/ScriptProgram.js';
export * from './ports/IScriptClient.js';
