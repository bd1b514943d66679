/**
 * Ollama HTTP client
 *
 * Thin wrapper over a local Ollama server's /api/generate and /api/tags.
 * Instances are explicit handles: create one, pass it to the matcher, close it
 * when the run is over. Closing aborts any request still in flight.
 */

import { z } from 'zod';
import { MatcherError, errorMessage } from '../core/errors';
import { createConsoleLogger, type Logger } from '../core/logger';
import { OllamaConfigSchema, type OllamaConfig, type OllamaConfigInput } from '../config';

const AVAILABILITY_TIMEOUT_MS = 5000;

const GenerateResponseSchema = z.object({
  response: z.string().default(''),
  done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface OllamaClientOptions {
  logger?: Logger;
  /** Replaces setTimeout-based backoff sleeping */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class OllamaClient {
  readonly config: OllamaConfig;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: OllamaConfigInput = {}, options: OllamaClientOptions = {}) {
    this.config = OllamaConfigSchema.parse(config);
    this.logger = options.logger ?? createConsoleLogger('OllamaClient');
    this.sleep = options.sleep ?? defaultSleep;
  }

  private get baseUrl(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Whether the server answers and lists a model with the configured
   * model's family name (the part before the tag).
   */
  async isAvailable(): Promise<boolean> {
    const family = this.config.model.split(':')[0];
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), AVAILABILITY_TIMEOUT_MS);

    try {
      const rawResponse = await fetch(`${this.baseUrl}/api/tags`, { signal: controller.signal });
      if (!rawResponse.ok) {
        this.logger.error(`Ollama /api/tags returned ${rawResponse.status}`);
        return false;
      }
      const parsed = TagsResponseSchema.safeParse(await rawResponse.json());
      if (!parsed.success) {
        this.logger.error('Ollama /api/tags returned an unexpected body');
        return false;
      }
      return parsed.data.models.some((model) => model.name.startsWith(family));
    } catch (error) {
      this.logger.error(`Ollama availability check failed: ${errorMessage(error)}`);
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Run one completion and return the generated text, trimmed.
   * Transient failures (server errors, connection failures, request
   * timeouts) are retried with exponential backoff.
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (this.closed) {
      throw new MatcherError('UNAVAILABLE', 'Ollama client is closed');
    }
    return this.executeWithRetry(() => this.callGenerate(prompt, options.signal), options.signal);
  }

  /**
   * Abort in-flight requests and refuse new ones
   */
  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async callGenerate(prompt: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new MatcherError('TIMEOUT', 'Ollama request aborted before it started');
    }

    const url = `${this.baseUrl}/api/generate`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    this.inFlight.add(controller);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          options: {
            temperature: this.config.temperature,
            num_predict: this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new MatcherError('TIMEOUT', 'Ollama request aborted', { cause: error });
      }
      if (this.closed) {
        throw new MatcherError('UNAVAILABLE', 'Ollama client closed during request', { cause: error });
      }
      if (controller.signal.aborted) {
        throw new MatcherError(
          'TIMEOUT',
          `Ollama request timed out after ${this.config.requestTimeoutMs}ms`,
          { cause: error }
        );
      }
      throw new MatcherError('UNAVAILABLE', `Cannot reach Ollama at ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
      this.inFlight.delete(controller);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new MatcherError(
        rawResponse.status >= 500 ? 'UNAVAILABLE' : 'BAD_RESPONSE',
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`
      );
    }

    const parsed = GenerateResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new MatcherError('BAD_RESPONSE', 'Ollama /api/generate returned an unexpected body', {
        cause: parsed.error,
      });
    }

    return parsed.data.response.trim();
  }

  /**
   * Execute a request function with exponential backoff retry
   */
  private async executeWithRetry<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        const retryable =
          error instanceof MatcherError &&
          error.code !== 'BAD_RESPONSE' &&
          !signal?.aborted &&
          !this.closed;

        if (!retryable) {
          throw error;
        }
        if (attempt < maxAttempts - 1) {
          const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
          this.logger.warn(
            `Attempt ${attempt + 1}/${maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delay}ms...`
          );
          await this.sleep(delay);
        }
      }
    }

    throw lastError ?? new MatcherError('UNAVAILABLE', 'All retry attempts failed');
  }
}
