export class ClimateSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClimateSyncError';
  }
}

export class ConfigError extends ClimateSyncError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid climate sync configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A host action (select_option, set_value) that rejected or failed to be acknowledged.
 */
export class ActionInvocationError extends ClimateSyncError {
  readonly domain: string;
  readonly action: string;
  readonly entityId: string;

  constructor(domain: string, action: string, entityId: string, cause: unknown) {
    super(`${domain}.${action} failed for ${entityId}: ${describeError(cause)}`, { cause });
    this.name = 'ActionInvocationError';
    this.domain = domain;
    this.action = action;
    this.entityId = entityId;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
