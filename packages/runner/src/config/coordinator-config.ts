import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { CoordinatorError } from '../errors/coordinator-error.js';

export const DEFAULT_TRAVEL_DURATION_MS = 240;
export const DEFAULT_CONFLICT_WARNING_DURATION_MS = 2600;
export const DEFAULT_MAX_DIAGNOSTIC_ENTRIES = 200;

const LoggingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxDiagnosticEntries: z.number().int().min(1).default(DEFAULT_MAX_DIAGNOSTIC_ENTRIES),
}).strict();

export const CoordinatorConfigSchema = z.object({
  travelDurationMs: z.number().int().min(0).default(DEFAULT_TRAVEL_DURATION_MS),
  conflictWarningDurationMs: z.number().int().min(1).default(DEFAULT_CONFLICT_WARNING_DURATION_MS),
  guideEnabled: z.boolean().default(true),
  hapticsEnabled: z.boolean().default(true),
  logging: LoggingConfigSchema.default({}),
}).strict();

export type CoordinatorConfig = z.output<typeof CoordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = CoordinatorConfigSchema.parse({});

export type CoordinatorConfigDiagnosticCode =
  | 'CONFIG_FILE_UNREADABLE'
  | 'CONFIG_YAML_INVALID'
  | 'CONFIG_SCHEMA_INVALID';

export interface CoordinatorConfigDiagnostic {
  readonly code: CoordinatorConfigDiagnosticCode;
  readonly path: string;
  readonly message: string;
}

export interface LoadCoordinatorConfigResult {
  readonly config: CoordinatorConfig;
  readonly diagnostics: readonly CoordinatorConfigDiagnostic[];
}

export function resolveCoordinatorConfig(input: CoordinatorConfigInput = {}): CoordinatorConfig {
  const parsed = CoordinatorConfigSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  throw new CoordinatorError(
    'CONFIG_INVALID',
    'Invalid coordinator config.',
    parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`),
  );
}

export function validateCoordinatorConfig(value: unknown): LoadCoordinatorConfigResult {
  const parsed = CoordinatorConfigSchema.safeParse(value ?? {});
  if (parsed.success) {
    return { config: parsed.data, diagnostics: [] };
  }

  return {
    config: DEFAULT_COORDINATOR_CONFIG,
    diagnostics: parsed.error.issues.map((issue) => ({
      code: 'CONFIG_SCHEMA_INVALID',
      path: formatIssuePath(issue.path),
      message: issue.message,
    })),
  };
}

/**
 * Reads a YAML config file. Any diagnostic means the returned config is the
 * defaults, never a partially applied file.
 */
export function loadCoordinatorConfigFromFile(filePath: string): LoadCoordinatorConfigResult {
  let source: string;
  try {
    source = readFileSync(filePath, 'utf8');
  } catch (error) {
    return failWith('CONFIG_FILE_UNREADABLE', `Cannot read ${filePath}: ${describeError(error)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (error) {
    return failWith('CONFIG_YAML_INVALID', `Invalid YAML in ${filePath}: ${describeError(error)}`);
  }

  return validateCoordinatorConfig(raw);
}

function failWith(code: CoordinatorConfigDiagnosticCode, message: string): LoadCoordinatorConfigResult {
  return {
    config: DEFAULT_COORDINATOR_CONFIG,
    diagnostics: [{ code, path: 'config', message }],
  };
}

function formatIssuePath(path: readonly PropertyKey[]): string {
  return path.length > 0 ? `config.${path.map(String).join('.')}` : 'config';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
