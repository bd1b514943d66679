/**
 * Projector configuration
 *
 * Values come from explicit overrides first, then environment variables, then
 * the schema defaults.
 *
 * Environment variables:
 *   PROJECTOR_AUTHOR               author for markers without one (default: Unknown)
 *   PROJECTOR_MIN_SCORE            matcher acceptance threshold, 0..1 (default: 0.5)
 *   PROJECTOR_MATCHER_TIMEOUT_MS   bound on one matcher call (default: 60000)
 *   PROJECTOR_TARGET_LANGUAGE      language of the target document (default: Chinese)
 *   OLLAMA_BASE_URL                Ollama server URL (default: http://localhost:11434)
 *   OLLAMA_MODEL                   model name (default: deepseek-r1:1.5b)
 *   OLLAMA_TEMPERATURE             generation temperature (default: 0.1)
 *   OLLAMA_MAX_OUTPUT_TOKENS       num_predict (default: 500)
 *   OLLAMA_REQUEST_TIMEOUT_MS      per-request timeout (default: 30000)
 */

import { z } from 'zod';
import { ConfigurationError } from './core/errors';

export const DEFAULT_OLLAMA_MODEL = 'deepseek-r1:1.5b';

export const OllamaConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),
  temperature: z.number().min(0).max(2).default(0.1),
  maxOutputTokens: z.number().int().positive().default(500),
  requestTimeoutMs: z.number().int().positive().default(30000),

  // Retry configuration
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10000),
    })
    .default({}),
});

export const ProjectorConfigSchema = z.object({
  author: z.string().min(1).default('Unknown'),
  minScore: z.number().min(0).max(1).default(0.5),
  matcherTimeoutMs: z.number().int().positive().default(60000),
  targetLanguage: z.string().min(1).default('Chinese'),
  ollama: OllamaConfigSchema.default({}),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type OllamaConfigInput = z.input<typeof OllamaConfigSchema>;
export type ProjectorConfig = z.infer<typeof ProjectorConfigSchema>;
export type ProjectorConfigOverrides = z.input<typeof ProjectorConfigSchema>;

type Env = Record<string, string | undefined>;

function stringEnv(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function numberEnv(env: Env, name: string): number | undefined {
  const raw = stringEnv(env, name);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Build and validate the configuration.
 *
 * @param env Defaults to process.env; tests pass their own
 */
export function loadProjectorConfig(
  overrides: ProjectorConfigOverrides = {},
  env: Env = process.env
): ProjectorConfig {
  const raw: ProjectorConfigOverrides = {
    author: overrides.author ?? stringEnv(env, 'PROJECTOR_AUTHOR'),
    minScore: overrides.minScore ?? numberEnv(env, 'PROJECTOR_MIN_SCORE'),
    matcherTimeoutMs: overrides.matcherTimeoutMs ?? numberEnv(env, 'PROJECTOR_MATCHER_TIMEOUT_MS'),
    targetLanguage: overrides.targetLanguage ?? stringEnv(env, 'PROJECTOR_TARGET_LANGUAGE'),
    ollama: {
      baseUrl: overrides.ollama?.baseUrl ?? stringEnv(env, 'OLLAMA_BASE_URL'),
      model: overrides.ollama?.model ?? stringEnv(env, 'OLLAMA_MODEL'),
      temperature: overrides.ollama?.temperature ?? numberEnv(env, 'OLLAMA_TEMPERATURE'),
      maxOutputTokens: overrides.ollama?.maxOutputTokens ?? numberEnv(env, 'OLLAMA_MAX_OUTPUT_TOKENS'),
      requestTimeoutMs: overrides.ollama?.requestTimeoutMs ?? numberEnv(env, 'OLLAMA_REQUEST_TIMEOUT_MS'),
      retry: overrides.ollama?.retry,
    },
  };

  const result = ProjectorConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, { cause: result.error });
  }

  return result.data;
}
