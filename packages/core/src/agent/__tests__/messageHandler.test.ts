import { describe, expect, jest, test } from '@jest/globals';

import type { ChatTransport, InboundMessage } from '../../contracts/chat.js';
import {
  createCommandResult,
  type ExecutionReport,
  type TaskCommand,
} from '../../contracts/task.js';
import { GatewayError } from '../../errors.js';
import type { ModelGateway } from '../../openai/client.js';
import { ChatAuthorizationPolicy } from '../authorization.js';
import { MessageHandler, type PlanExecutor } from '../messageHandler.js';

const message = (overrides: Partial<InboundMessage> = {}): InboundMessage => ({
  chatId: 42,
  senderName: 'Ada',
  chatKind: 'private',
  text: 'check disk space',
  ...overrides,
});

function setup(options: { reply?: string; policy?: ChatAuthorizationPolicy; echoResult?: boolean } = {}) {
  const sent: Array<[number, string]> = [];
  const transport = {
    sendMessage: jest.fn<ChatTransport['sendMessage']>(async (chatId, text) => {
      sent.push([chatId, text]);
    }),
  };
  const gateway = {
    chat: jest.fn<ModelGateway['chat']>(async () => options.reply ?? '[]'),
  };
  const executor = {
    runAll: jest.fn<PlanExecutor['runAll']>(
      async (commands: readonly TaskCommand[]): Promise<ExecutionReport> =>
        commands.map((task) => createCommandResult(task.command, 0, 'ok', '')),
    ),
  };
  const handler = new MessageHandler({
    gateway,
    executor,
    policy: options.policy,
    echoResult: options.echoResult,
  });

  return { handler, transport, gateway, executor, sent };
}

describe('MessageHandler', () => {
  test('ignores chats outside a non-empty allow-list without replying', async () => {
    const { handler, transport, gateway, sent } = setup({
      policy: new ChatAuthorizationPolicy([7]),
    });

    await expect(handler.handle(message(), transport)).resolves.toBe('unauthorized');
    expect(sent).toEqual([]);
    expect(gateway.chat).not.toHaveBeenCalled();
  });

  test('ignores messages without text', async () => {
    const { handler, transport, gateway, sent } = setup();

    await expect(handler.handle(message({ text: null }), transport)).resolves.toBe('no_text');
    expect(sent).toEqual([]);
    expect(gateway.chat).not.toHaveBeenCalled();
  });

  test('reports a gateway failure to the chat', async () => {
    const { handler, transport, gateway, executor, sent } = setup();
    gateway.chat.mockRejectedValueOnce(new GatewayError('Model API error 401: unauthorized', 401));

    await expect(handler.handle(message(), transport)).resolves.toBe('gateway_failed');
    expect(sent).toEqual([
      [42, '🔄 Analyzing task...'],
      [42, '❌ Model call failed: Model API error 401: unauthorized'],
    ]);
    expect(executor.runAll).not.toHaveBeenCalled();
  });

  test('tells the chat when nothing needs to run', async () => {
    const { handler, transport, executor, sent } = setup({ reply: 'No commands needed: []' });

    await expect(handler.handle(message({ text: 'hello' }), transport)).resolves.toBe('no_commands');
    expect(sent).toEqual([
      [42, '🔄 Analyzing task...'],
      [42, 'ℹ️ No commands need to be executed for this message.'],
    ]);
    expect(executor.runAll).not.toHaveBeenCalled();
  });

  test('treats an unparseable reply as no commands', async () => {
    const { handler, transport, sent } = setup({ reply: 'Sorry, I am not sure.' });

    await expect(handler.handle(message(), transport)).resolves.toBe('no_commands');
    expect(sent[1]).toEqual([42, 'ℹ️ No commands need to be executed for this message.']);
  });

  test('sends the plan and the execution report', async () => {
    const { handler, transport, gateway, executor, sent } = setup({
      reply: '```json\n[{"command":"df -h","description":"Disk usage"}]\n```',
    });

    await expect(handler.handle(message(), transport)).resolves.toBe('executed');

    expect(gateway.chat).toHaveBeenCalledWith('check disk space');
    expect(executor.runAll).toHaveBeenCalledWith([{ command: 'df -h', description: 'Disk usage' }]);
    expect(sent).toEqual([
      [42, '🔄 Analyzing task...'],
      [42, '📝 Execution plan:\n1. Disk usage → `df -h`'],
      [42, '📋 Task execution report\n\n✅ Disk usage\n  Command: df -h\n  Output:\nok\n\n'],
    ]);
  });

  test('skips the report when echo is disabled', async () => {
    const { handler, transport, executor, sent } = setup({
      reply: '[{"command":"uptime","description":"Load"}]',
      echoResult: false,
    });

    await expect(handler.handle(message(), transport)).resolves.toBe('executed');
    expect(executor.runAll).toHaveBeenCalledTimes(1);
    expect(sent.map(([, text]) => text)).toEqual([
      '🔄 Analyzing task...',
      '📝 Execution plan:\n1. Load → `uptime`',
    ]);
  });

  test('keeps going when replies cannot be delivered', async () => {
    const { handler, transport, executor } = setup({
      reply: '[{"command":"uptime","description":"Load"}]',
    });
    transport.sendMessage.mockRejectedValue(new Error('network down'));

    await expect(handler.handle(message(), transport)).resolves.toBe('executed');
    expect(executor.runAll).toHaveBeenCalledTimes(1);
    expect(transport.sendMessage).toHaveBeenCalledTimes(3);
  });
});
