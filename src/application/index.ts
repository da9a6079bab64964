export * from './AsyncMutex.js';
export * from './ReplyGate.js';
export * from './DashboardCommands.js';
export * from './use-cases/index.js';
