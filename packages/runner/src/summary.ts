import { DEFAULT_ALL_PASSED_COUNT, type ReferenceMode, type RunSummary } from '@lama-regression/schemas';

export interface SummaryOptions {
  referenceMode?: ReferenceMode;
  failLogPath: string;
  failLogExists: boolean;
}

export function formatSummary(summary: RunSummary, options: SummaryOptions): string {
  const lines = [
    '',
    '='.repeat(60),
    'Summary',
    '-'.repeat(60),
    `Total   : ${summary.total}`,
    `Passed  : ${summary.passed}`,
    `Failed  : ${summary.failed}`,
    `Target  : ${summary.targetSeconds.toFixed(3)}s`
  ];

  if (options.referenceMode !== undefined) {
    lines.push(`Reference(${options.referenceMode}) : ${summary.referenceSeconds.toFixed(3)}s`);
  }
  if (summary.failed > 0 && options.failLogExists) {
    lines.push('', `Details of failures are stored in ${options.failLogPath}`);
  }

  return lines.join('\n');
}

export interface ExitDecision {
  exitCode: number;
  message?: string;
}

/**
 * Passing `allPassedCount` cases ends the run with status 0 regardless of the
 * failure count. The default matches the size of the fixture suite the
 * harness was first written for.
 */
export function exitDecisionFor(
  summary: RunSummary,
  allPassedCount: number = DEFAULT_ALL_PASSED_COUNT
): ExitDecision {
  if (summary.passed === allPassedCount) {
    return { exitCode: 0, message: '\nAll tests passed!' };
  }
  return { exitCode: summary.failed > 0 ? 1 : 0 };
}
