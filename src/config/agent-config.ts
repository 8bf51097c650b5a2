import { readFile } from 'node:fs/promises';
import { AgentConfigSchema, type AgentConfig, type AgentConfigInput } from '../schemas/config.schema.js';
import { ConfigError, errorMessage } from '../exception/errors.js';

/** Validate a partial configuration and fill in every default. */
export function resolveAgentConfig(input: AgentConfigInput = {}): AgentConfig {
  return parseConfig(input, 'agent configuration');
}

export async function loadAgentConfig(filePath: string): Promise<AgentConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseConfig(json, filePath);
}

function parseConfig(value: unknown, source: string): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${source}): ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

const ENV_OVERRIDES = {
  AGENT_MAX_STEPS: 'maxSteps',
  AGENT_MAX_FAILURES: 'maxConsecutiveFailures',
  AGENT_MAX_INPUT_TOKENS: 'maxInputTokens',
} as const satisfies Record<string, keyof AgentConfig>;

/**
 * Environment variables win over file values:
 * AGENT_MAX_STEPS, AGENT_MAX_FAILURES, AGENT_MAX_INPUT_TOKENS, AGENT_USE_VISION.
 */
export function applyEnvOverrides(
  config: AgentConfig,
  env: Record<string, string | undefined> = process.env,
): AgentConfig {
  const next: AgentConfig = { ...config };

  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new ConfigError(`${variable} must be a positive integer, got "${value}"`);
    }
    next[key] = parsed;
  }

  const vision = env.AGENT_USE_VISION;
  if (vision !== undefined && vision !== '') {
    const normalized = vision.toLowerCase();
    if (!['true', 'false', '1', '0'].includes(normalized)) {
      throw new ConfigError(`AGENT_USE_VISION must be true or false, got "${vision}"`);
    }
    next.useVision = normalized === 'true' || normalized === '1';
  }

  return next;
}
