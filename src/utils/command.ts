import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], options?: { timeoutMs?: number }) => Promise<CommandOutput>;

export class CommandError extends Error {
  readonly command: string;
  readonly missing: boolean;

  constructor(command: string, message: string, missing: boolean) {
    super(message);
    this.name = 'CommandError';
    this.command = command;
    this.missing = missing;
  }
}

function describeFailure(command: string, error: unknown): CommandError {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    if (code === 'ENOENT') return new CommandError(command, `Command not found: ${command}`, true);
    const detail = stderr ? stderr.split('\n').slice(-3).join(' ') : error.message;
    return new CommandError(command, `${command} failed: ${detail}`, false);
  }
  return new CommandError(command, `${command} failed: ${String(error)}`, false);
}

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options.timeoutMs ?? 0,
      maxBuffer: 64 * 1024 * 1024,
      encoding: 'utf8'
    });
    return { stdout, stderr };
  } catch (error) {
    throw describeFailure(command, error);
  }
};
