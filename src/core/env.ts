/**
 * Environment variable handling with validation
 */

import { join } from 'path';

export interface EnvConfig {
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
  auditDbPath: string;
  policyConfigPath: string | null;
}

const LOG_LEVELS: readonly EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((value) => value === raw) ?? fallback;
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function loadEnvConfig(projectRoot: string = process.cwd()): EnvConfig {
  const nodeEnv = pick(process.env.NODE_ENV, NODE_ENVS, 'development');
  return {
    // Test runs stay quiet unless LOG_LEVEL asks otherwise
    logLevel: pick(getEnvVar('LOG_LEVEL'), LOG_LEVELS, nodeEnv === 'test' ? 'silent' : 'info'),
    nodeEnv,
    auditDbPath: getEnvVar('AUDIT_DB_PATH') ?? join(projectRoot, 'data', 'overrides.db'),
    policyConfigPath: getEnvVar('POLICY_CONFIG') ?? null,
  };
}
