import * as dotenv from 'dotenv';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { isLogLevel, type LogLevel } from '../utils/Logger.js';

export type KernelMode = 'stub' | 'memory';

export const KERNEL_MODES: readonly KernelMode[] = ['stub', 'memory'];

export interface EnvConfig {
  kernel: KernelMode;
  logLevel: LogLevel;
}

/**
 * Configuration values as read, before validation.
 */
export interface RawEnvConfig {
  kernel: string;
  logLevel: string;
}

export interface LoadEnvOptions {
  overrides?: Partial<RawEnvConfig>;
  env?: NodeJS.ProcessEnv;
  envFile?: string;
}

export function isKernelMode(value: string): value is KernelMode {
  return (KERNEL_MODES as readonly string[]).includes(value);
}

export function readEnvConfig(options: LoadEnvOptions = {}): RawEnvConfig {
  const env = options.env ?? process.env;
  const envPath = options.envFile ?? path.resolve(process.cwd(), '.env');
  // Values already in the environment win over the .env file.
  const fileValues: Record<string, string> = fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath)) : {};
  const lookup = (key: string): string | undefined => env[key] ?? fileValues[key];

  return {
    kernel: options.overrides?.kernel ?? lookup('CARDVAULT_KERNEL') ?? 'stub',
    logLevel: options.overrides?.logLevel ?? lookup('CARDVAULT_LOG_LEVEL') ?? 'info',
  };
}

export function validateEnvConfig(raw: RawEnvConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isKernelMode(raw.kernel)) {
    errors.push(`CARDVAULT_KERNEL must be one of ${KERNEL_MODES.join(', ')} (got "${raw.kernel}").`);
  }
  if (!isLogLevel(raw.logLevel)) {
    errors.push(`CARDVAULT_LOG_LEVEL must be one of silent, info, debug (got "${raw.logLevel}").`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Read and validate configuration.
 * @throws Error listing every invalid setting
 */
export function loadEnvConfig(options: LoadEnvOptions = {}): EnvConfig {
  const raw = readEnvConfig(options);
  const { kernel, logLevel } = raw;
  if (isKernelMode(kernel) && isLogLevel(logLevel)) {
    return { kernel, logLevel };
  }
  const { errors } = validateEnvConfig(raw);
  throw new Error(`Invalid CardVault configuration:\n  ${errors.join('\n  ')}`);
}
