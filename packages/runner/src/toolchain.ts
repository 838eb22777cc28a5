import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, statSync, unlinkSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { ReferenceMode, RunResult, ToolchainConfig } from '@lama-regression/schemas';
import { HarnessFatalError } from './errors.js';
import { exitCodeOf, spawnCommand, type CommandOutcome, type CommandRunner } from './process.js';

export interface Toolchain {
  compile(source: string): string;
  runTarget(byteCode: string, input?: string): RunResult;
  runReference(source: string, input: string | undefined, mode: ReferenceMode): RunResult;
}

type FinishedOutcome = Exclude<CommandOutcome, { kind: 'not-found' }>;

function ensureFound(outcome: CommandOutcome): FinishedOutcome {
  if (outcome.kind === 'not-found') {
    throw new HarnessFatalError(`Executable not found: ${outcome.command}`);
  }
  return outcome;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function readInput(input?: string): Buffer | undefined {
  return input !== undefined && isFile(input) ? readFileSync(input) : undefined;
}

function moveFile(from: string, to: string): void {
  try {
    renameSync(from, to);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EXDEV')) throw error;
    copyFileSync(from, to);
    unlinkSync(from);
  }
}

// stdout and stderr are joined by a newline; the comparison with the
// reference relies on both sides being built the same way.
function combinedOutput(outcome: FinishedOutcome): string {
  return `${outcome.stdout}\n${outcome.stderr}`.trim();
}

function timed(run: () => CommandOutcome): RunResult {
  const start = performance.now();
  const outcome = ensureFound(run());
  const seconds = (performance.now() - start) / 1000;
  return { exitCode: exitCodeOf(outcome), seconds, output: combinedOutput(outcome) };
}

export function createToolchain(config: ToolchainConfig, run: CommandRunner = spawnCommand): Toolchain {
  return {
    compile(source) {
      if (!isFile(source)) {
        throw new Error(`Source file not found: ${source}`);
      }

      mkdirSync(config.dumpDir, { recursive: true });

      const outcome = ensureFound(
        run(
          config.lamac,
          ['-64', source, '-I', config.stdLibDir, '-runtime', config.runtimeDir, '-b'],
          { cwd: config.workDir }
        )
      );
      if (outcome.kind === 'exited') {
        throw new Error(`Compilation failed for ${source}\n${outcome.stderr}`);
      }

      const generated = join(config.workDir, `${basename(source, extname(source))}.bc`);
      if (!isFile(generated)) {
        throw new Error(
          `Expected bytecode file not produced. Searched: ${generated}\n` +
            `Compiler stdout:\n${outcome.stdout}\n` +
            `Compiler stderr:\n${outcome.stderr}`
        );
      }

      const destination = join(config.dumpDir, basename(generated));
      moveFile(generated, destination);
      return destination;
    },

    runTarget(byteCode, input) {
      return timed(() =>
        run(config.lamarik, ['-l', byteCode], { cwd: config.workDir, input: readInput(input) })
      );
    },

    runReference(source, input, mode) {
      return timed(() =>
        run(config.lamac, [`-${mode}`, source], { cwd: config.workDir, input: readInput(input) })
      );
    }
  };
}
