/**
 * Configuration loader — reads a JSON config file, resolves environment
 * variable placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { TimerError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { timerConfigSchema } from './schema.js';
import type { TimerConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends TimerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the form `${VAR_NAME}` with the value of
 * that environment variable. Numeric-looking values are converted to numbers
 * so that `"tickIntervalMs": "${TICK_MS}"` validates.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName === undefined) return obj;

    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not defined`, {
        variableName: varName,
        pattern: obj,
      });
    }
    const asNumber = Number(value);
    return value.trim() !== '' && Number.isFinite(asNumber) ? asNumber : value;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  return obj;
}

// ─── Parsing ────────────────────────────────────────────────────

/** Validate an already-parsed configuration object. */
export function parseTimerConfig(raw: unknown): Result<TimerConfig, ConfigError> {
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(raw);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }

  const validation = timerConfigSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { issues }));
  }

  return ok(validation.data);
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads and validates a timer configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders and validates
 */
export async function loadTimerConfig(
  filePath: string,
): Promise<Result<TimerConfig, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  const result = parseTimerConfig(parsed);
  if (!result.ok) {
    return err(
      new ConfigError(result.error.message, { ...result.error.context, filePath }),
    );
  }
  return result;
}
