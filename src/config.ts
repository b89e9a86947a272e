/**
 * Runtime configuration, read from the environment once at startup.
 *
 * PORT                 HTTP listen port (default 8000)
 * MOCK_CLOUD_DATA_DIR  Directory holding one JSON document per collection (default ./mock_data)
 * LOG_LEVEL            debug | info | warn | error (default info)
 */

import * as path from 'path';
import { LogLevel, isLogLevel } from './logger';

export interface Config {
  port: number;
  dataDir: string;
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_DATA_DIR = './mock_data';

type Env = Record<string, string | undefined>;

const getEnvOptional = (env: Env, key: string): string | undefined => {
  const value = env[key];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toPort = (value: string, key: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    throw new Error(`Env var ${key} must be a port number (1-65535)`);
  }
  return parsed;
};

const toLogLevel = (value: string, key: string): LogLevel => {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`Env var ${key} must be one of ${Object.values(LogLevel).join(', ')}`);
  }
  return normalized;
};

export function loadConfig(env: Env = process.env): Config {
  const port = getEnvOptional(env, 'PORT');
  const dataDir = getEnvOptional(env, 'MOCK_CLOUD_DATA_DIR') ?? DEFAULT_DATA_DIR;
  const logLevel = getEnvOptional(env, 'LOG_LEVEL');

  return {
    port: port ? toPort(port, 'PORT') : DEFAULT_PORT,
    dataDir: path.resolve(dataDir),
    logLevel: logLevel ? toLogLevel(logLevel, 'LOG_LEVEL') : LogLevel.Info,
  };
}
