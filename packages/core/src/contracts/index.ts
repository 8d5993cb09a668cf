export {
  TaskCommandSchema,
  TaskCommandListSchema,
  createCommandResult,
  type TaskCommand,
  type CommandResult,
  type ExecutionReport,
} from './task.js';

export type { ChatTransport, InboundMessage } from './chat.js';
