import { readFileSync } from 'node:fs';
import type { AnswerSequence } from './types.js';

const AFTER_PROMPT = />\s*(-?\d+)/;
const LEADING_INTEGER = /^\s*(-?\d+)/;
const ANY_INTEGER = /-?\d+/g;

/**
 * Golden transcripts look like
 *
 *   $ ../src/Driver.exe -i test084.lama < test084.input
 *    > 55
 *   310
 *   310
 *
 * Each line yields at most one answer: the integer after a `>` prompt, or
 * the integer the line starts with.
 */
export function parseGoldenAnswers(text: string): AnswerSequence {
  const answers: AnswerSequence = [];

  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line = raw.trimEnd();
    if (!line) continue;

    if (line.includes('>')) {
      const match = AFTER_PROMPT.exec(line);
      if (match) answers.push(BigInt(match[1]));
      continue;
    }

    const first = line.trimStart().charAt(0);
    if (first === '-' || (first >= '0' && first <= '9')) {
      const match = LEADING_INTEGER.exec(line);
      if (match) answers.push(BigInt(match[1]));
    }
  }

  return answers;
}

// A missing file is a harness misconfiguration, so the read error propagates.
export function extractAnswersFromFile(path: string): AnswerSequence {
  return parseGoldenAnswers(readFileSync(path, 'utf8'));
}

/**
 * Captured interpreter output is scanned more loosely than golden files:
 * every integer on every line counts, wherever it appears.
 */
export function extractAnswersFromText(text: string): AnswerSequence {
  const answers: AnswerSequence = [];

  for (const raw of text.trim().split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    for (const match of line.matchAll(ANY_INTEGER)) {
      answers.push(BigInt(match[0]));
    }
  }

  return answers;
}

export function sequencesEqual(left: AnswerSequence, right: AnswerSequence): boolean {
  return left.length === right.length && left.every((value, index) => value === right[index]);
}

export function formatAnswers(answers: AnswerSequence): string {
  return `[${answers.join(', ')}]`;
}
