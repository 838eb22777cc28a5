import { appendFileSync, rmSync } from 'node:fs';
import { formatAnswers } from './answers.js';
import type { AnswerSequence } from './types.js';

export interface FailureDetails {
  name: string;
  targetOutput: string;
  answers?: { golden: AnswerSequence; target: AnswerSequence };
  referenceOutput?: string;
}

/** Append-only log of failing cases, truncated once per batch. */
export class FailureLog {
  constructor(readonly path: string) {}

  reset(): void {
    rmSync(this.path, { force: true });
  }

  append(text: string): void {
    appendFileSync(this.path, text, 'utf8');
  }

  recordFailure(details: FailureDetails): void {
    this.append(formatFailure(details));
  }

  recordException(name: string, message: string): void {
    this.append(`${name}: EXCEPTION\n${message}\n\n`);
  }
}

export function formatFailure(details: FailureDetails): string {
  let text = `${details.name}:\n`;
  text += '---- Target output ----\n';
  text += `${details.targetOutput}\n`;

  if (details.answers) {
    text += '\n---- Golden answers ----\n';
    text += formatAnswers(details.answers.golden);
    text += '\n---- Target answers ----\n';
    text += formatAnswers(details.answers.target);
  }

  if (details.referenceOutput !== undefined) {
    text += '\n---- Reference output ----\n';
    text += `${details.referenceOutput}\n`;
  }

  return `${text}\n`;
}
