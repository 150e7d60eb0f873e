import { resolve } from 'node:path';
import { LogLevel, defaultLogLevel } from '../logger';

export const DATA_DIR_ENV = 'TIMECARD_DATA_DIR';

export type EnvConfig = {
  dataDir: string;
  logLevel: LogLevel;
};

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const dir = env[DATA_DIR_ENV]?.trim();
  return {
    dataDir: resolve(dir || './data'),
    logLevel: defaultLogLevel(env),
  };
}
