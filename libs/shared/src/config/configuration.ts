import { registerAs } from '@nestjs/config';
import { join, resolve } from 'path';

export const CONFIG_FILE_SUBPATH = [
  '.claude',
  'hooks',
  'config',
  'disk-monitoring.jsonc',
] as const;

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/**
 * Location of disk-monitoring.jsonc. DISK_MONITOR_CONFIG wins over the
 * HOME-relative default; null when neither is set.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv): string | null {
  if (env.DISK_MONITOR_CONFIG) return resolve(env.DISK_MONITOR_CONFIG);
  if (!env.HOME) return null;
  return join(env.HOME, ...CONFIG_FILE_SUBPATH);
}

export function resolveLogLevel(val: string | undefined): LogLevelName {
  const match = LOG_LEVEL_NAMES.find((name) => name === val?.trim().toLowerCase());
  return match ?? 'info';
}

export const diskMonitorConfig = registerAs('diskMonitor', () => ({
  configPath: resolveConfigPath(process.env),
}));
