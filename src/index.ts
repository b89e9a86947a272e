/**
 * Mock Cloud API: persistent test double for an OpenStack-style cloud.
 *
 * Library entry: build the app around any persistence provider. The HTTP
 * process itself starts from main.ts.
 */

export { createApp, createAppContext, openAppContext, SERVICE_VERSION } from './server';
export type { AppContext } from './server';
export { loadConfig } from './config';
export type { Config } from './config';
export * from './domain';
export * from './services';
export * from './storage';
export { logger, createLogger, setLogHandler, setLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
