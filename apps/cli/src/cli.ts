import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { Command, CommanderError, Option } from 'commander';
import {
  FailureLog,
  createToolchain,
  discoverTestCases,
  errorMessage,
  exitDecisionFor,
  formatSummary,
  loadToolchainConfig,
  runSuite,
  writeReport,
  type Toolchain
} from '@lama-regression/runner';
import { DEFAULT_ALL_PASSED_COUNT, cliOptionsSchema, type ToolchainConfig } from '@lama-regression/schemas';

export interface CliConsole {
  log(message: string): void;
  error(message: string): void;
}

export interface CliContext {
  env: Record<string, string | undefined>;
  cwd: string;
  console: CliConsole;
  toolchainFor?: (config: ToolchainConfig) => Toolchain;
}

function buildProgram(context: CliContext, setExitCode: (code: number) => void): Command {
  const { env, cwd, console: out } = context;
  const toolchainFor = context.toolchainFor ?? ((config: ToolchainConfig) => createToolchain(config));

  return new Command()
    .name('lama-regress')
    .description(
      'Compile .lama files, run them under the target interpreter and compare the answers ' +
        'with the golden .t transcripts'
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out.log(text.trimEnd()),
      writeErr: (text) => out.error(text.trimEnd())
    })
    .argument('[paths...]', 'file(s) or a directory containing *.lama files')
    .addOption(
      new Option(
        '-r, --reference <mode>',
        'run reference implementation (i = interpreter, s = stack-machine) and compare'
      ).choices(['i', 's'])
    )
    .option('--out <path>', 'write a JSON run report to this path')
    .option(
      '--all-passed-count <n>',
      'exit 0 as soon as this many cases pass',
      String(DEFAULT_ALL_PASSED_COUNT)
    )
    .action((paths: string[], rawOptions: unknown) => {
      const options = cliOptionsSchema.parse(rawOptions);
      const config = loadToolchainConfig(env, cwd);

      const cases = discoverTestCases(paths, cwd);
      const failureLog = new FailureLog(config.failLog);

      const report = runSuite({
        cases,
        toolchain: toolchainFor(config),
        failureLog,
        referenceMode: options.reference,
        logger: out
      });

      out.log(
        formatSummary(report.summary, {
          referenceMode: options.reference,
          failLogPath: config.failLog,
          failLogExists: existsSync(config.failLog)
        })
      );

      if (options.out) {
        const reportPath = resolve(cwd, options.out);
        mkdirSync(dirname(reportPath), { recursive: true });
        writeReport(report, reportPath);
        out.log(`Report written to ${reportPath}`);
      }

      const decision = exitDecisionFor(report.summary, options.allPassedCount);
      if (decision.message) {
        out.log(decision.message);
      }
      setExitCode(decision.exitCode);
    });
}

/** Runs the harness for `args` (without the node and script paths) and returns the exit code. */
export function runCli(args: string[], context: CliContext): number {
  let exitCode = 0;
  const program = buildProgram(context, (code) => {
    exitCode = code;
  });

  try {
    program.parse(args, { from: 'user' });
  } catch (error: unknown) {
    // commander has already printed its own usage errors
    if (error instanceof CommanderError) return error.exitCode;
    context.console.error(errorMessage(error));
    return 1;
  }
  return exitCode;
}
