export {
  extractAnswersFromFile,
  extractAnswersFromText,
  formatAnswers,
  parseGoldenAnswers,
  sequencesEqual
} from './answers.js';
export { FAILURE_MARKER, isRuntimeFailure } from './classify.js';
export { loadToolchainConfig } from './config.js';
export { answerFileFor, discoverTestCases, inputFileFor, toTestCase } from './discovery.js';
export { HarnessFatalError, errorMessage } from './errors.js';
export { FailureLog, formatFailure, type FailureDetails } from './failureLog.js';
export { decideOutcome } from './outcome.js';
export { spawnCommand, type CommandOptions, type CommandOutcome, type CommandRunner } from './process.js';
export { foldCase, initialBatchState, runSuite, writeReport } from './runner.js';
export {
  exitDecisionFor,
  formatSummary,
  type ExitDecision,
  type SummaryOptions
} from './summary.js';
export { createToolchain, type Toolchain } from './toolchain.js';
export type {
  AnswerSequence,
  BatchState,
  Logger,
  Outcome,
  OutcomeInput,
  SuiteInput,
  Verdict
} from './types.js';
