/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Claude model IDs - centralized to avoid hardcoding across files */
  models: {
    planner: optional('PLANNER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    agent: optional('AGENT_MODEL_ID', 'claude-sonnet-4-5-20250929'),
  },

  /** Deliberate-then-act loop limits */
  agent: {
    maxExecutionTurns: optionalInt('MAX_EXECUTION_TURNS', 10),
    maxTokens: optionalInt('AGENT_MAX_TOKENS', 4096),
  },

  /** Outreach drafting configuration */
  outreach: {
    labelBase: optional('OUTREACH_LABEL', 'Outreach'),
    attachmentsBaseDir: optional('ATTACHMENTS_BASE_DIR', process.cwd()),
  },

  /** Google OAuth configuration (refresh-token mode) */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    refreshToken: required('GOOGLE_REFRESH_TOKEN'),
    sender: process.env.GMAIL_SENDER,
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  // Google OAuth (required for draft creation)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');
  if (!config.google.refreshToken) errors.push('GOOGLE_REFRESH_TOKEN is required');

  // Numeric bounds
  if (!Number.isInteger(config.agent.maxExecutionTurns) || config.agent.maxExecutionTurns < 1) {
    errors.push(`MAX_EXECUTION_TURNS must be >= 1, got ${config.agent.maxExecutionTurns}`);
  }
  if (!Number.isInteger(config.agent.maxTokens) || config.agent.maxTokens < 256) {
    errors.push(`AGENT_MAX_TOKENS must be >= 256, got ${config.agent.maxTokens}`);
  }

  if (!config.outreach.labelBase.trim()) {
    errors.push('OUTREACH_LABEL must not be blank');
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
