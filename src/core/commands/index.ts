export type {
  Command,
  CommandContext,
  CommandKind,
  DirectCommand,
  RowsCommand,
  WriterCommand,
} from './types.js';
export { defineDirectCommand, defineRowsCommand, defineWriterCommand } from './define.js';
export { executeCommand, type ExecuteOptions, type ExecutionResult } from './execute.js';
