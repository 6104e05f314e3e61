import { readFile } from 'fs/promises';
import { z } from 'zod';

import { ConfigError } from './errors';

export const DEFAULT_TOLERANCE_C = 0.5;
export const DEFAULT_SYNC_INTERVAL_MINUTES = 10;
export const DEFAULT_MODEL_ID = 'TRVZB';
export const DEFAULT_EXTERNAL_OPTION = 'external';

const MS_PER_MINUTE = 60_000;

export const climateSyncConfigSchema = z.object({
  tolerance: z.number().finite().positive().default(DEFAULT_TOLERANCE_C),
  syncIntervalMinutes: z.number().finite().positive().default(DEFAULT_SYNC_INTERVAL_MINUTES),
  modelId: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  externalOption: z.string().trim().min(1).default(DEFAULT_EXTERNAL_OPTION),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
}).strict();

export type ClimateSyncConfigInput = z.input<typeof climateSyncConfigSchema>;

export interface ClimateSyncOptions extends z.output<typeof climateSyncConfigSchema> {
  syncIntervalMs: number;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function parseConfig(input: unknown = {}): ClimateSyncOptions {
  const result = climateSyncConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }
  return {
    ...result.data,
    syncIntervalMs: Math.round(result.data.syncIntervalMinutes * MS_PER_MINUTE),
  };
}

/**
 * Reads a JSON config file. A missing file yields the defaults.
 */
export async function loadConfigFile(path: string): Promise<ClimateSyncOptions> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return parseConfig({});
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (_error) {
    throw new ConfigError([`${path}: not valid JSON`]);
  }
  return parseConfig(json);
}
