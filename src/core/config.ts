import type { ScanOptions } from '#features/scanner';

import { isLogLevel, LOG_LEVELS, type LogLevel } from '#lib/logger';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';

export const LOG_LEVEL_ENV = 'DUSK_LOG_LEVEL';
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/** Flags as commander parses them. */
export interface CliOptions {
  oneFileSystem?: boolean;
  followLinks?: boolean;
  propagateRefresh?: boolean;
}

export interface AppConfig {
  rootPath: string;
  scan: ScanOptions;
  propagateRefreshToAncestors: boolean;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  override name = 'ConfigError';
}

function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return DEFAULT_LOG_LEVEL;
  if (!isLogLevel(raw)) {
    throw new ConfigError(
      `Invalid ${LOG_LEVEL_ENV} "${raw}"; expected one of ${LOG_LEVELS.join(', ')}`
    );
  }
  return raw;
}

export function resolveConfig(
  pathArg: string | undefined,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  return {
    rootPath: resolve(cwd, pathArg === undefined || pathArg === '' ? '.' : pathArg),
    scan: {
      oneFileSystem: options.oneFileSystem === true,
      followLinks: options.followLinks === true
    },
    propagateRefreshToAncestors: options.propagateRefresh === true,
    logLevel: resolveLogLevel(env)
  };
}

/** Fails with a ConfigError unless `rootPath` is a readable directory. */
export async function assertScannableRoot(rootPath: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(rootPath)).isDirectory();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${rootPath}: ${reason}`);
  }
  if (!isDirectory) {
    throw new ConfigError(`${rootPath} is not a directory`);
  }
}
