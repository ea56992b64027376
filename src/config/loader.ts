/**
 * Configuration loader — reads JSON config files, validates with Zod,
 * and resolves environment variable placeholders.
 */
import { readFile } from 'node:fs/promises';

import { AgentError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { agentConfigSchema } from './schema.js';
import type { AgentConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends AgentError {
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
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
        });
      }
      return value;
    }
    return obj;
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

function validate(raw: unknown, source: string): Result<AgentConfig, ConfigError> {
  const validation = agentConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { source, issues }));
  }
  return ok(validation.data);
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads and validates an agent configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadAgentConfig(
  filePath: string,
): Promise<Result<AgentConfig, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const errorCode = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (errorCode === 'ENOENT') {
      return err(new ConfigError(`Configuration file not found: ${filePath}`, { filePath, errorCode }));
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode,
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

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  return validate(resolved, filePath);
}

/**
 * Build a configuration from environment variables alone, for runs
 * without a config file. `TURNLOOP_MODEL` is required.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<AgentConfig, ConfigError> {
  const model = env['TURNLOOP_MODEL'];
  if (!model) {
    return err(new ConfigError('TURNLOOP_MODEL is not set and no configuration file was given'));
  }

  return validate(
    {
      provider: {
        provider: env['TURNLOOP_PROVIDER'] ?? 'openai',
        model,
        ...(env['TURNLOOP_BASE_URL'] ? { baseUrl: env['TURNLOOP_BASE_URL'] } : {}),
        ...(env['TURNLOOP_API_KEY_ENV'] ? { apiKeyEnvVar: env['TURNLOOP_API_KEY_ENV'] } : {}),
      },
      ...(env['TURNLOOP_SYSTEM_PROMPT'] ? { systemPrompt: env['TURNLOOP_SYSTEM_PROMPT'] } : {}),
    },
    'environment',
  );
}
