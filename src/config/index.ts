// ─── Types ──────────────────────────────────────────────────────
export type { AgentConfig, ProviderConfig, RetryConfig } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export { agentConfigSchema, providerConfigSchema, retryConfigSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, configFromEnv, loadAgentConfig, resolveEnvVars } from './loader.js';
