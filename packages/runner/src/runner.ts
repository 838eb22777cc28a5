import { writeFileSync } from 'node:fs';
import { runReportSchema, type CaseResult, type RunReport, type RunResult, type TestCase } from '@lama-regression/schemas';
import { extractAnswersFromFile, extractAnswersFromText } from './answers.js';
import { HarnessFatalError, errorMessage } from './errors.js';
import { decideOutcome } from './outcome.js';
import type { AnswerSequence, BatchState, Logger, SuiteInput } from './types.js';

const NAME_WIDTH = 30;

function now(): string {
  return new Date().toISOString();
}

function seconds(value: number): string {
  return `${value.toFixed(3)}s`;
}

export function initialBatchState(total: number): BatchState {
  return { total, passed: 0, failed: 0, targetSeconds: 0, referenceSeconds: 0, cases: [] };
}

export function foldCase(state: BatchState, result: CaseResult): BatchState {
  const passed = result.status === 'PASS';
  return {
    ...state,
    passed: state.passed + (passed ? 1 : 0),
    failed: state.failed + (passed ? 0 : 1),
    targetSeconds: state.targetSeconds + result.targetSeconds,
    referenceSeconds: state.referenceSeconds + (result.referenceSeconds ?? 0),
    cases: [...state.cases, result]
  };
}

function readGoldenAnswers(testCase: TestCase): AnswerSequence {
  if (testCase.answers === undefined) {
    throw new HarnessFatalError(`Answers file not found for ${testCase.source}`);
  }
  try {
    return extractAnswersFromFile(testCase.answers);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new HarnessFatalError(`Answers file not found: ${testCase.answers}`);
    }
    throw error;
  }
}

function runCase(testCase: TestCase, input: SuiteInput, logger: Logger): CaseResult {
  const { toolchain, failureLog, referenceMode } = input;

  const byteCode = toolchain.compile(testCase.source);

  logger.log(`Running ${byteCode}`);
  const target = toolchain.runTarget(byteCode, testCase.input);

  const goldenAnswers = readGoldenAnswers(testCase);
  const targetAnswers = extractAnswersFromText(target.output);

  let reference: RunResult | undefined;
  if (referenceMode !== undefined) {
    reference = toolchain.runReference(testCase.source, testCase.input, referenceMode);
  }

  const outcome = decideOutcome({ target, reference, goldenAnswers, targetAnswers });

  if (outcome.verdict === 'FAIL') {
    failureLog.recordFailure({
      name: testCase.name,
      targetOutput: target.output,
      answers: outcome.answersDiffer ? { golden: goldenAnswers, target: targetAnswers } : undefined,
      referenceOutput: reference?.output
    });
  }

  let line = `${testCase.name.padEnd(NAME_WIDTH)} [${outcome.verdict}]  target:${seconds(target.seconds)}`;
  if (reference !== undefined && referenceMode !== undefined) {
    line += `  ref(${referenceMode}):${seconds(reference.seconds)}`;
  }
  logger.log(line);

  return {
    name: testCase.name,
    source: testCase.source,
    status: outcome.verdict,
    targetSeconds: target.seconds,
    referenceSeconds: reference?.seconds,
    goldenAnswers: goldenAnswers.map(String),
    targetAnswers: targetAnswers.map(String)
  };
}

/**
 * Runs every case in order. A case that throws is recorded as an ERROR and
 * the batch moves on; only HarnessFatalError ends the run early.
 */
export function runSuite(input: SuiteInput): RunReport {
  const logger = input.logger ?? console;
  const startedAt = now();

  input.failureLog.reset();
  logger.log(`Testing ${input.cases.length} file(s)...\n`);

  let state = initialBatchState(input.cases.length);

  for (const testCase of input.cases) {
    let result: CaseResult;
    try {
      result = runCase(testCase, input, logger);
    } catch (error) {
      if (error instanceof HarnessFatalError) throw error;

      const message = errorMessage(error);
      logger.log(`${testCase.name.padEnd(NAME_WIDTH)} [ERROR] ${message}`);
      input.failureLog.recordException(testCase.name, message);
      result = {
        name: testCase.name,
        source: testCase.source,
        status: 'ERROR',
        targetSeconds: 0,
        error: message
      };
    }
    state = foldCase(state, result);
  }

  return {
    runId: `${startedAt}_regression`,
    startedAt,
    finishedAt: now(),
    referenceMode: input.referenceMode,
    summary: {
      total: state.total,
      passed: state.passed,
      failed: state.failed,
      targetSeconds: state.targetSeconds,
      referenceSeconds: state.referenceSeconds
    },
    cases: state.cases
  };
}

export function writeReport(report: RunReport, outputPath: string): void {
  writeFileSync(outputPath, JSON.stringify(runReportSchema.parse(report), null, 2), 'utf8');
}
