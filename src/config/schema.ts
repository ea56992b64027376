/**
 * Zod schemas for validating agent configuration files.
 * The inferred output types live in config/types.ts.
 */
import { z } from 'zod';

// ─── Provider Config ────────────────────────────────────────────

/**
 * Schema for the completion backend.
 * `apiKeyEnvVar` names an environment variable, never the raw key.
 */
export const providerConfigSchema = z.object({
  provider: z.enum(['openai', 'openai-compatible', 'ollama']).default('openai'),
  model: z.string().min(1, 'Model identifier cannot be empty'),
  baseUrl: z.string().url('Invalid base URL format').optional(),
  apiKeyEnvVar: z.string().min(1).default('OPENAI_API_KEY'),
  timeoutMs: z.number().int().positive('Timeout must be a positive integer').optional(),
  includeUsage: z.boolean().default(true),
});

// ─── Retry Config ───────────────────────────────────────────────

/**
 * Schema for the transport retry policy.
 * Attempt k waits `baseDelayMs * 2^k` before the next one.
 */
export const retryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10, 'Max retries cannot exceed 10').default(3),
  baseDelayMs: z.number().int().positive('Base delay must be a positive integer').default(1000),
});

// ─── Agent Config ───────────────────────────────────────────────

export const agentConfigSchema = z.object({
  provider: providerConfigSchema,
  retry: retryConfigSchema.default({}),
  stream: z.boolean().default(true),
  systemPrompt: z.string().min(1).optional(),
  /** Values for {{placeholder}} tokens in `systemPrompt`. */
  promptVariables: z.record(z.string()).optional(),
  workingDirectory: z.string().min(1).optional(),
});
