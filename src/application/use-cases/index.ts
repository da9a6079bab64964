export * from './StartProgram.js';
export * from './GetRobotStatus.js';
export * from './RecoverFromProtectiveStop.js';
