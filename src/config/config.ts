import * as path from 'node:path';
import { LogLevelSchema, type LogLevel } from '../logging/logger';

export interface AppConfig {
  annotate: boolean;
  logLevel: LogLevel;
  logFile: string;
  // Every file listed in KUBECONFIG, merged in order
  kubeconfigPaths: string[];
}

type Env = Record<string, string | undefined>;

export function getConfig(env: Env = process.env): AppConfig {
  return {
    annotate: parseBoolean(env.ANNOTATE),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: env.LIMITS_CHECKER_LOG_FILE || getDefaultLogFile(env),
    kubeconfigPaths: getKubeconfigPaths(env)
  };
}

// Only "true" (any case) enables a flag, mirroring how ANNOTATE is documented
export function parseBoolean(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'true';
}

function parseLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toUpperCase());
  return parsed.success ? parsed.data : 'INFO';
}

function getHomeDir(env: Env): string {
  return env.HOME || env.USERPROFILE || '.';
}

function getDefaultLogFile(env: Env): string {
  return path.join(getHomeDir(env), '.k8s-limits-checker', 'limits-checker.log');
}

// KUBECONFIG may hold a list of files, as kubectl reads it
function getKubeconfigPaths(env: Env): string[] {
  const listed = (env.KUBECONFIG ?? '').split(path.delimiter).filter(entry => entry.length > 0);
  return listed.length > 0 ? listed : [path.join(getHomeDir(env), '.kube', 'config')];
}
