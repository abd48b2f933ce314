import { GuestRuntimeError, PolicyViolationError, TimeoutExceededError } from '../errors.js';
import type { CapturedOutput, ExecutionResult, Outcome } from '../types.js';
import { sanitizeErrorText } from './ErrorSanitizer.js';

export type ClassifierInput =
  | { kind: 'rejected'; error: PolicyViolationError }
  | {
      kind: 'attempted';
      outcome: Outcome<unknown>;
      captured: CapturedOutput;
      limitSeconds: number;
    };

const NO_OUTPUT: CapturedOutput = { stdout: '', stderr: '', truncated: false };

export function formatTimeoutMessage(limitSeconds: number): string {
  return new TimeoutExceededError(limitSeconds).message;
}

export function formatRaisedError(error: Error): string {
  if (error instanceof GuestRuntimeError) {
    return sanitizeErrorText(error.message);
  }
  return sanitizeErrorText(error.message ? `${error.name}: ${error.message}` : error.name);
}

/**
 * Map a pre-check rejection or a supervised outcome to the uniform result shape.
 */
export function classify(input: ClassifierInput, elapsedSeconds: number): ExecutionResult {
  if (input.kind === 'rejected') {
    return build(false, NO_OUTPUT, input.error.message, elapsedSeconds);
  }

  const { outcome, captured, limitSeconds } = input;
  switch (outcome.kind) {
    case 'completed':
      return build(true, captured, '', elapsedSeconds);
    case 'raised':
      return build(false, captured, formatRaisedError(outcome.error), elapsedSeconds);
    case 'timedOut':
      return build(false, captured, formatTimeoutMessage(limitSeconds), elapsedSeconds);
  }
}

function build(
  success: boolean,
  captured: CapturedOutput,
  error: string,
  executionTimeSeconds: number,
): ExecutionResult {
  return Object.freeze({
    success,
    output: captured.stdout,
    error,
    executionTimeSeconds,
    stderr: captured.stderr,
    truncated: captured.truncated,
  });
}
