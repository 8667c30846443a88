/**
 * Environment configuration
 *
 * Reads verifier settings from the process environment (optionally loaded
 * from a .env file). Unset variables leave the library defaults in place.
 */

import dotenv from 'dotenv';
import type { VerifyOptions } from './types';
import { ConfigurationError } from './errors';

/**
 * Environment variables understood by the verifier
 */
export const ENV_VARS = {
  apiToken: 'VERIFIER_API_TOKEN',
  apiBaseUrl: 'VERIFIER_API_URL',
  concurrency: 'VERIFIER_CONCURRENCY',
  dnsTimeout: 'VERIFIER_DNS_TIMEOUT_MS',
  smtpTimeout: 'VERIFIER_SMTP_TIMEOUT_MS',
  apiTimeout: 'VERIFIER_API_TIMEOUT_MS',
  senderEmail: 'VERIFIER_SENDER',
  heloName: 'VERIFIER_HELO_NAME',
} as const;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, name: string): number | undefined {
  const value = readString(env, name);
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value) || parseInt(value, 10) === 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Loads a .env file into process.env (existing variables win)
 *
 * @param path - File to load (default: .env in the working directory)
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Builds verify options from environment variables
 *
 * Unset variables come back as undefined, which the orchestrator
 * replaces with its defaults.
 *
 * @param env - Variables to read (default: process.env)
 * @throws ConfigurationError if a numeric variable is not a positive integer
 *
 * @example
 * ```ts
 * loadEnvFile();
 * const orchestrator = new VerificationOrchestrator({ ...loadConfig(), mode: 'api' });
 * ```
 */
export function loadConfig(env: Env = process.env): VerifyOptions {
  return {
    apiToken: readString(env, ENV_VARS.apiToken),
    apiBaseUrl: readString(env, ENV_VARS.apiBaseUrl),
    concurrency: readInteger(env, ENV_VARS.concurrency),
    dnsTimeout: readInteger(env, ENV_VARS.dnsTimeout),
    smtpTimeout: readInteger(env, ENV_VARS.smtpTimeout),
    apiTimeout: readInteger(env, ENV_VARS.apiTimeout),
    senderEmail: readString(env, ENV_VARS.senderEmail),
    heloName: readString(env, ENV_VARS.heloName),
  };
}
