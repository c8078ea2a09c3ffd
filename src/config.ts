/**
 * Configuration - read once at startup and passed explicitly to the client
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, formatIssues } from './errors.js';

export const DEFAULT_API_BASE = 'https://sdk.senso.ai/api/v1';
export const DEFAULT_TIMEOUT_MS = 30000;

const PackageSchema = z.object({ version: z.string().min(1) });

// package.json sits one level above both src/ and dist/
function readPackageVersion(): string {
  const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
  return PackageSchema.parse(JSON.parse(raw)).version;
}

export const SERVER_VERSION = readPackageVersion();

export interface SensoConfig {
  readonly apiKey: string;
  readonly apiBase: string;
  readonly timeoutMs: number;
  readonly serverName: string;
  readonly serverVersion: string;
}

const EnvSchema = z.object({
  SENSO_API_KEY: z.string({ required_error: 'SENSO_API_KEY is required' })
    .trim()
    .min(1, 'SENSO_API_KEY cannot be empty'),
  SENSO_API_BASE: z.string()
    .url('SENSO_API_BASE must be a URL')
    .optional()
    .default(DEFAULT_API_BASE),
  SENSO_TIMEOUT_MS: z.coerce.number()
    .int()
    .positive('SENSO_TIMEOUT_MS must be positive')
    .optional()
    .default(DEFAULT_TIMEOUT_MS),
  MCP_SERVER_NAME: z.string().min(1).optional().default('senso'),
  MCP_SERVER_VERSION: z.string().min(1).optional().default(SERVER_VERSION)
});

/**
 * Build the server configuration from environment variables.
 * Trailing slashes on the base URL are dropped so endpoint paths join cleanly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SensoConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error.issues)}`);
  }

  const vars = parsed.data;
  return Object.freeze({
    apiKey: vars.SENSO_API_KEY,
    apiBase: vars.SENSO_API_BASE.replace(/\/+$/, ''),
    timeoutMs: vars.SENSO_TIMEOUT_MS,
    serverName: vars.MCP_SERVER_NAME,
    serverVersion: vars.MCP_SERVER_VERSION
  });
}
