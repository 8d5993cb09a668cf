import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';

import { ConfigError } from '../../errors.js';
import { applyEnvOverrides, loadAppConfig, parseAppConfig, resolveConfigPath } from '../appConfig.js';

const minimal = {
  telegram: { botToken: '123456:test-token' },
  llm: { baseUrl: 'https://llm.example.test/v1', apiKey: 'test-secret', model: 'test-model' },
};

describe('parseAppConfig', () => {
  test('applies defaults for optional fields and the executor section', () => {
    const config = parseAppConfig(minimal);

    expect(config).toEqual({
      telegram: { botToken: '123456:test-token', allowedChatIds: [] },
      llm: {
        baseUrl: 'https://llm.example.test/v1',
        apiKey: 'test-secret',
        model: 'test-model',
        systemPrompt: null,
        maxTokens: 2048,
        requestTimeoutSec: null,
      },
      executor: { workingDir: null, timeoutSecs: 120, echoResult: true },
    });
  });

  test('returns a deeply frozen object', () => {
    const config = parseAppConfig({ ...minimal, telegram: { ...minimal.telegram, allowedChatIds: [1] } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.telegram)).toBe(true);
    expect(Object.isFrozen(config.telegram.allowedChatIds)).toBe(true);
    expect(Object.isFrozen(config.executor)).toBe(true);
  });

  test('lists every schema problem', () => {
    const attempt = () =>
      parseAppConfig({ telegram: { allowedChatIds: ['x'] }, llm: minimal.llm }, {}, 'bad.json');

    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow(/^Config file is invalid: bad\.json\n/);
    expect(attempt).toThrow(/- telegram\.botToken: Required/);
    expect(attempt).toThrow(/- telegram\.allowedChatIds\.0: Expected number, received string/);
  });

  test('lets the environment fill in secrets and endpoints', () => {
    const config = parseAppConfig(
      { telegram: {}, llm: { baseUrl: 'https://file.example.test/v1', model: 'file-model' } },
      {
        TELEGRAM_BOT_TOKEN: 'env-token',
        OPENAI_API_KEY: 'test-secret',
        AGENT_MODEL: 'env-model',
      },
    );

    expect(config.telegram.botToken).toBe('env-token');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.model).toBe('env-model');
    expect(config.llm.baseUrl).toBe('https://file.example.test/v1');
  });
});

describe('applyEnvOverrides', () => {
  test('prefers AGENT_ variables over OPENAI_ ones and ignores blanks', () => {
    const merged = applyEnvOverrides(
      { llm: { apiKey: 'file-key' } },
      { AGENT_API_KEY: '  ', OPENAI_API_KEY: 'openai-key', AGENT_BASE_URL: 'https://agent.example.test' },
    );

    expect(merged).toEqual({
      llm: { apiKey: 'openai-key', baseUrl: 'https://agent.example.test' },
    });
  });

  test('leaves non-object input alone', () => {
    expect(applyEnvOverrides(null, { TELEGRAM_BOT_TOKEN: 'x' })).toBeNull();
  });
});

describe('loadAppConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shellcourier-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('reads config.json from the working directory by default', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify(minimal));

    const config = loadAppConfig(undefined, { cwd: dir, env: {} });

    expect(config.llm.model).toBe('test-model');
    expect(resolveConfigPath(undefined, dir)).toBe(path.join(dir, 'config.json'));
  });

  test('resolves an explicit path against the working directory', () => {
    fs.writeFileSync(
      path.join(dir, 'agent.json'),
      JSON.stringify({ ...minimal, executor: { timeoutSecs: 5, echoResult: false } }),
    );

    const config = loadAppConfig('agent.json', { cwd: dir, env: {} });

    expect(config.executor).toEqual({ workingDir: null, timeoutSecs: 5, echoResult: false });
  });

  test('reports a missing file as unreadable', () => {
    const expectedPath = path.join(dir, 'missing.json');

    expect(() => loadAppConfig('missing.json', { cwd: dir, env: {} })).toThrow(
      `Unable to read config file: ${expectedPath}`,
    );
  });

  test('reports malformed JSON as invalid', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '{ "telegram": ');

    expect(() => loadAppConfig(undefined, { cwd: dir, env: {} })).toThrow(
      new RegExp(`^Config file is invalid: ${escapeRegExp(path.join(dir, 'config.json'))}\\n- \\(root\\): `),
    );
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
