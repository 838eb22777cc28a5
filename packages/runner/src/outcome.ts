import { sequencesEqual } from './answers.js';
import { isRuntimeFailure } from './classify.js';
import type { Outcome, OutcomeInput } from './types.js';

export function decideOutcome(input: OutcomeInput): Outcome {
  const { target, reference, goldenAnswers, targetAnswers } = input;

  let baseOk = !isRuntimeFailure(target.exitCode, target.output);

  // The reference must succeed and print exactly what the target printed.
  if (reference !== undefined) {
    baseOk = baseOk && reference.exitCode === 0 && target.output === reference.output;
  }

  const answersMatch = sequencesEqual(targetAnswers, goldenAnswers);

  return {
    verdict: baseOk && answersMatch ? 'PASS' : 'FAIL',
    baseOk,
    answersDiffer: baseOk && !answersMatch
  };
}
