export type ViolationKind = 'BlockedName' | 'DisallowedImport';

export interface Violation {
  kind: ViolationKind;
  identifier: string;
}

/**
 * Uniform result of one execution. `output` and `error` are always present;
 * the unused one is an empty string.
 */
export interface ExecutionResult {
  readonly success: boolean;
  readonly output: string;
  readonly error: string;
  readonly executionTimeSeconds: number;
  /** Captured console.warn / console.error text */
  readonly stderr: string;
  /** True when a capture buffer reached maxOutputChars */
  readonly truncated: boolean;
}

export interface CapturedOutput {
  stdout: string;
  stderr: string;
  truncated: boolean;
}

export type Outcome<T> =
  | { kind: 'completed'; value: T }
  | { kind: 'raised'; error: Error }
  | { kind: 'timedOut' };
