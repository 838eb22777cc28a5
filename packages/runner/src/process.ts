import { spawnSync } from 'node:child_process';
import { constants } from 'node:os';
import { HarnessFatalError } from './errors.js';

export type CommandOutcome =
  | { kind: 'not-found'; command: string }
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'succeeded'; stdout: string; stderr: string };

export interface CommandOptions {
  input?: Buffer;
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => CommandOutcome;

function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? -entry[1] : 1;
}

/**
 * Runs a command to completion. Without `input` the child gets an empty
 * stdin, so an interpreter waiting for input sees EOF rather than the
 * harness's terminal.
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) => {
  const result = spawnSync(command, args, {
    cwd: options.cwd,
    input: options.input ?? Buffer.alloc(0),
    maxBuffer: Number.POSITIVE_INFINITY
  });

  if (result.error) {
    if ('code' in result.error && result.error.code === 'ENOENT') {
      return { kind: 'not-found', command };
    }
    throw new HarnessFatalError(`Error running ${[command, ...args].join(' ')}: ${result.error.message}`);
  }

  const stdout = result.stdout.toString('utf8');
  const stderr = result.stderr.toString('utf8');
  const exitCode = result.status ?? (result.signal ? signalExitCode(result.signal) : 1);

  if (exitCode !== 0) {
    return { kind: 'exited', exitCode, stdout, stderr };
  }
  return { kind: 'succeeded', stdout, stderr };
};

export function exitCodeOf(outcome: Exclude<CommandOutcome, { kind: 'not-found' }>): number {
  return outcome.kind === 'exited' ? outcome.exitCode : 0;
}
