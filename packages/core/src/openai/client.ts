/**
 * Model gateway backed by an OpenAI-compatible chat completions endpoint.
 *
 * Responsibilities:
 * - Build the AI SDK provider for the configured base URL and API key.
 * - Send the system prompt plus one user message and return the reply text.
 * - Turn transport and HTTP failures into `GatewayError`, so callers can tell
 *   "the call failed" apart from "the model asked for nothing".
 */

import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, generateText, type LanguageModel, type ModelMessage } from 'ai';

import { DEFAULT_MAX_TOKENS } from '../constants.js';
import { resolveSystemPrompt } from '../config/systemPrompt.js';
import { ConfigError, GatewayError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ModelGateway {
  chat(userMessage: string): Promise<string>;
}

export interface ModelGatewayConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly systemPrompt?: string | null;
  readonly maxTokens?: number;
  readonly requestTimeoutSec?: number | null;
}

export interface ModelGatewayDependencies {
  /** Replaces the global fetch, mainly for tests. */
  readonly fetch?: typeof globalThis.fetch;
  readonly logger?: Logger;
}

export function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, '');

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch (error) {
    throw new ConfigError(`Model base URL must be a valid URL: ${describeError(error)}`, error);
  }

  if (/\/(chat\/completions|completions)$/.test(parsed.pathname)) {
    throw new ConfigError(
      'Model base URL should reference the API root (e.g., https://api.openai.com/v1) rather than a specific completions endpoint.',
    );
  }

  return trimmed;
}

const isSuccessStatus = (status: number | undefined): boolean =>
  typeof status === 'number' && status >= 200 && status < 300;

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    // No status means the request never got an HTTP answer.
    if (typeof status !== 'number') {
      return new GatewayError(`Model request failed: ${error.message}`, null, error);
    }
    if (!isSuccessStatus(status)) {
      const body = error.responseBody ?? '';
      return new GatewayError(`Model API error ${status}: ${body}`.trimEnd(), status, error);
    }
    return new GatewayError(`Model response could not be read: ${error.message}`, status, error);
  }

  return new GatewayError(`Model request failed: ${describeError(error)}`, null, error);
}

export class OpenAICompatibleGateway implements ModelGateway {
  private readonly languageModel: LanguageModel;

  private readonly modelName: string;

  private readonly baseUrl: string;

  private readonly systemPrompt: string;

  private readonly maxTokens: number;

  private readonly requestTimeoutMs: number | null;

  private readonly logger: Logger;

  constructor(config: ModelGatewayConfig, deps: ModelGatewayDependencies = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.modelName = config.model;
    this.systemPrompt = resolveSystemPrompt(config.systemPrompt);
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.requestTimeoutMs =
      typeof config.requestTimeoutSec === 'number' && config.requestTimeoutSec > 0
        ? config.requestTimeoutSec * 1000
        : null;
    this.logger = deps.logger ?? silentLogger;

    const clientOptions = {
      apiKey: config.apiKey,
      baseURL: this.baseUrl,
      fetch: deps.fetch,
    } satisfies Parameters<typeof createOpenAI>[0];

    this.languageModel = createOpenAI(clientOptions).chat(config.model);
  }

  async chat(userMessage: string): Promise<string> {
    const messages: ModelMessage[] = [{ role: 'user', content: userMessage }];

    this.logger.info('Calling model', { model: this.modelName });
    this.logger.debug('Model request', {
      url: `${this.baseUrl}/chat/completions`,
      maxTokens: this.maxTokens,
      user: userMessage,
    });

    try {
      const result = await generateText({
        model: this.languageModel,
        system: this.systemPrompt,
        messages,
        maxOutputTokens: this.maxTokens,
        maxRetries: 0,
        ...(this.requestTimeoutMs !== null
          ? { abortSignal: AbortSignal.timeout(this.requestTimeoutMs) }
          : {}),
      });

      const text = typeof result.text === 'string' ? result.text : '';
      this.logger.debug('Model response', { text });
      return text;
    } catch (error) {
      throw toGatewayError(error);
    }
  }
}

export function createModelGateway(
  config: ModelGatewayConfig,
  deps: ModelGatewayDependencies = {},
): ModelGateway {
  return new OpenAICompatibleGateway(config, deps);
}
