/**
 * Error types raised by the client, the dispatcher and startup.
 *
 * Everything except ConfigurationError is caught at the dispatcher boundary
 * and returned to the caller as error content.
 */

import type { ZodIssue } from 'zod';

export class SensoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SensoError';
  }
}

/**
 * Tool arguments failed schema validation
 */
export class InvalidArgumentError extends SensoError {
  constructor(
    public toolName: string,
    public issues: ZodIssue[] = []
  ) {
    super(
      issues.length > 0
        ? `Invalid arguments for ${toolName}: ${formatIssues(issues)}`
        : `Invalid arguments for ${toolName}`
    );
    this.name = 'InvalidArgumentError';
  }
}

export class UnknownToolError extends SensoError {
  constructor(public toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

/**
 * Non-2xx response or network failure from the Senso API.
 * `status` is undefined when no response was received.
 */
export class RemoteApiError extends SensoError {
  constructor(
    public method: string,
    public endpoint: string,
    public detail: string,
    public status?: number
  ) {
    super(
      status !== undefined
        ? `Senso API error (HTTP ${status}) on ${method} ${endpoint}: ${detail}`
        : `Senso API request failed on ${method} ${endpoint}: ${detail}`
    );
    this.name = 'RemoteApiError';
  }
}

export class ConfigurationError extends SensoError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
