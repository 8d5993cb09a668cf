/**
 * Application configuration: a JSON file validated with zod, with secrets
 * and endpoints overridable from the environment.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { DEFAULT_COMMAND_TIMEOUT_SEC, DEFAULT_MAX_TOKENS } from '../constants.js';
import { ConfigError, describeError } from '../errors.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

const TelegramConfigSchema = z.object({
  botToken: z.string().min(1, 'botToken is required'),
  allowedChatIds: z.array(z.number().int()).default([]),
});

const LlmConfigSchema = z.object({
  baseUrl: z.string().min(1, 'baseUrl is required'),
  apiKey: z.string().min(1, 'apiKey is required'),
  model: z.string().min(1, 'model is required'),
  systemPrompt: z.string().nullable().default(null),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  requestTimeoutSec: z.number().positive().nullable().default(null),
});

const ExecutorConfigSchema = z.object({
  workingDir: z.string().nullable().default(null),
  timeoutSecs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_SEC),
  echoResult: z.boolean().default(true),
});

export const AppConfigSchema = z.object({
  telegram: TelegramConfigSchema,
  llm: LlmConfigSchema,
  executor: ExecutorConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type TelegramConfig = AppConfig['telegram'];
export type LlmConfig = AppConfig['llm'];
export type ExecutorConfig = AppConfig['executor'];

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ResolvedAppConfig = DeepReadonly<AppConfig>;

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const ENV_OVERRIDES: ReadonlyArray<{
  section: 'telegram' | 'llm';
  key: string;
  variables: readonly string[];
}> = [
  { section: 'telegram', key: 'botToken', variables: ['TELEGRAM_BOT_TOKEN'] },
  { section: 'llm', key: 'apiKey', variables: ['AGENT_API_KEY', 'OPENAI_API_KEY'] },
  { section: 'llm', key: 'baseUrl', variables: ['AGENT_BASE_URL', 'OPENAI_BASE_URL'] },
  { section: 'llm', key: 'model', variables: ['AGENT_MODEL', 'OPENAI_MODEL'] },
];

/**
 * Layers environment values over the raw file contents before validation.
 * The first non-empty variable of each entry wins.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isJsonObject(raw)) {
    return raw;
  }

  const merged: JsonObject = { ...raw };
  for (const { section, key, variables } of ENV_OVERRIDES) {
    const value = variables.map((name) => env[name]?.trim()).find((candidate) => candidate);
    if (!value) {
      continue;
    }
    const current = merged[section];
    merged[section] = { ...(isJsonObject(current) ? current : {}), [key]: value };
  }
  return merged;
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `- ${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    .join('\n');

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function parseAppConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = {},
  source = '<inline>',
): ResolvedAppConfig {
  const parsed = AppConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    throw new ConfigError(`Config file is invalid: ${source}\n${formatIssues(parsed.error)}`, parsed.error);
  }
  return deepFreeze(parsed.data);
}

export interface LoadAppConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(configPath: string | undefined, cwd: string = process.cwd()): string {
  return path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
}

export function loadAppConfig(
  configPath?: string,
  options: LoadAppConfigOptions = {},
): ResolvedAppConfig {
  const resolvedPath = resolveConfigPath(configPath, options.cwd);

  let contents: string;
  try {
    contents = fs.readFileSync(resolvedPath, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Unable to read config file: ${resolvedPath} (${describeError(error)})`,
      error,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(
      `Config file is invalid: ${resolvedPath}\n- (root): ${describeError(error)}`,
      error,
    );
  }

  return parseAppConfig(raw, options.env ?? process.env, resolvedPath);
}
