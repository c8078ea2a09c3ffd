/**
 * Logger Module - Structured Logging for the Senso MCP Server
 *
 * Uses pino for fast, structured JSON logging.
 * Logs to stderr to avoid interfering with MCP stdio transport.
 */

import pino from 'pino';
import { z } from 'zod';

const DEFAULT_LOG_LEVEL = 'info';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Map a LOG_LEVEL value onto a pino level. Unknown values fall back to
 * info, since pino throws on a level it does not know.
 */
export function resolveLogLevel(value: string | undefined): pino.LevelWithSilent {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase() || DEFAULT_LOG_LEVEL);
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

// Configuration
const LOG_LEVEL = resolveLogLevel(process.env.LOG_LEVEL);
const SERVER_NAME = process.env.MCP_SERVER_NAME || 'senso';

// MCP uses stdio, so we log to stderr to avoid protocol interference
export const logger = pino(
  {
    name: SERVER_NAME,
    level: LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: () => ({}) // Remove pid and hostname for cleaner logs
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['api_key', 'headers["X-API-Key"]', 'config.apiKey'],
      censor: '[REDACTED]'
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err
    }
  },
  pino.destination(2)
);

if (process.env.LOG_LEVEL && process.env.LOG_LEVEL.trim().toLowerCase() !== LOG_LEVEL) {
  logger.warn({ action: 'invalid_log_level', value: process.env.LOG_LEVEL }, `Unknown LOG_LEVEL, using ${LOG_LEVEL}`);
}

/**
 * Log a tool execution with timing
 */
export function logToolCall(opts: {
  tool: string;
  duration_ms: number;
  success: boolean;
  error?: string;
}) {
  const { tool, duration_ms, success, error } = opts;

  const logData = {
    action: 'tool_call',
    tool,
    duration_ms
  };

  if (success) {
    logger.info(logData, `Tool ${tool} completed in ${duration_ms}ms`);
  } else {
    logger.error({ ...logData, error }, `Tool ${tool} failed: ${error}`);
  }
}

/**
 * Log an API call
 */
export function logApiCall(opts: {
  endpoint: string;
  method: string;
  duration_ms: number;
  status?: number;
  success: boolean;
  error?: string;
}) {
  const { endpoint, method, duration_ms, status, success, error } = opts;

  const logData = {
    action: 'api_call',
    endpoint,
    method,
    duration_ms,
    status
  };

  if (success) {
    logger.info(logData, `API call succeeded: ${method} ${endpoint}`);
  } else {
    logger.error({ ...logData, error }, `API call failed: ${method} ${endpoint}`);
  }
}

/**
 * Log startup information
 */
export function logStartup(config: {
  server: string;
  version: string;
  api_base: string;
  timeout_ms: number;
}) {
  logger.info({
    action: 'server_start',
    ...config,
    api_key_configured: true
  }, `Starting Senso MCP Server v${config.version}`);
}

export default logger;
