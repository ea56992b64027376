import type { z } from 'zod';

import type { agentConfigSchema, providerConfigSchema, retryConfigSchema } from './schema.js';

// ─── Agent Configuration ────────────────────────────────────────

/** Validated agent configuration, with defaults applied. */
export type AgentConfig = z.infer<typeof agentConfigSchema>;

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

export type RetryConfig = z.infer<typeof retryConfigSchema>;
