import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigurationError } from '@agora/shared/src/utils/errors.js';
import { validateOrchestrationConfig } from './validators.js';
import type { OrchestrationConfig } from './orchestration-config.schema.js';

export const DEFAULT_CONFIG_PATH = 'config/orchestration.json';

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

function readIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  return isRecord(value) ? value : {};
}

/**
 * Environment variables win over the file: AGORA_WORKERS, AGORA_MAX_INVOCATIONS,
 * AGORA_CADENCE_MS, AGORA_SEED.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const workers = readIntEnv(env, 'AGORA_WORKERS');
  const maxInvocations = readIntEnv(env, 'AGORA_MAX_INVOCATIONS');
  const cadenceMs = readIntEnv(env, 'AGORA_CADENCE_MS');
  const seed = readIntEnv(env, 'AGORA_SEED');

  return {
    ...raw,
    workers: {
      ...section(raw, 'workers'),
      ...(workers !== undefined && { concurrency: workers }),
    },
    budget: {
      ...section(raw, 'budget'),
      ...(maxInvocations !== undefined && { maxInvocations }),
    },
    supervisor: {
      ...section(raw, 'supervisor'),
      ...(cadenceMs !== undefined && { cadenceMs }),
      ...(seed !== undefined && { seed }),
    },
  };
}

export async function loadOrchestrationConfig(
  configPath: string = resolve(process.cwd(), DEFAULT_CONFIG_PATH),
  env: NodeJS.ProcessEnv = process.env,
): Promise<OrchestrationConfig> {
  const raw = await readJsonFile(configPath);
  return validateOrchestrationConfig(applyEnvOverrides(raw, env));
}

export function defaultOrchestrationConfig(): OrchestrationConfig {
  return validateOrchestrationConfig({});
}
