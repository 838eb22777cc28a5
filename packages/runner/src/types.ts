import type { CaseResult, ReferenceMode, RunResult, TestCase } from '@lama-regression/schemas';
import type { FailureLog } from './failureLog.js';
import type { Toolchain } from './toolchain.js';

export type AnswerSequence = bigint[];

export type Verdict = 'PASS' | 'FAIL';

export interface Logger {
  log(message: string): void;
}

export interface Outcome {
  verdict: Verdict;
  baseOk: boolean;
  answersDiffer: boolean;
}

export interface OutcomeInput {
  target: RunResult;
  reference?: RunResult;
  goldenAnswers: AnswerSequence;
  targetAnswers: AnswerSequence;
}

export interface BatchState {
  total: number;
  passed: number;
  failed: number;
  targetSeconds: number;
  referenceSeconds: number;
  cases: CaseResult[];
}

export interface SuiteInput {
  cases: TestCase[];
  toolchain: Toolchain;
  failureLog: FailureLog;
  referenceMode?: ReferenceMode;
  logger?: Logger;
}
