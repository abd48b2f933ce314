/**
 * Sandbox Error Handling Module
 *
 * Typed errors for every failure the sandbox can produce. All of them except
 * ConfigurationError are recovered inside the engine and turned into results.
 */

import type { Violation } from './types.js';

/**
 * Base error class for all sandbox errors
 */
export class SandboxError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SandboxError';
    this.code = code;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SandboxError.prototype);
  }
}

/**
 * Snippet references a disallowed import or a blocked identifier
 */
export class PolicyViolationError extends SandboxError {
  public readonly violations: readonly Violation[];

  constructor(violations: readonly Violation[]) {
    super(describeViolations(violations), 'POLICY_VIOLATION', { count: violations.length });
    this.name = 'PolicyViolationError';
    this.violations = violations;
    Object.setPrototypeOf(this, PolicyViolationError.prototype);
  }
}

/**
 * The guest snippet raised an error. `guestName` and `guestMessage` are already
 * sanitized; `message` is the text reported to callers.
 */
export class GuestRuntimeError extends SandboxError {
  public readonly guestName: string;
  public readonly guestMessage: string;

  constructor(guestName: string, guestMessage: string) {
    super(guestMessage ? `${guestName}: ${guestMessage}` : guestName, 'GUEST_RUNTIME_ERROR');
    this.name = 'GuestRuntimeError';
    this.guestName = guestName;
    this.guestMessage = guestMessage;
    Object.setPrototypeOf(this, GuestRuntimeError.prototype);
  }
}

/**
 * The wall-clock deadline elapsed before the snippet finished
 */
export class TimeoutExceededError extends SandboxError {
  public readonly limitSeconds: number;

  constructor(limitSeconds: number) {
    super(`Code execution timed out after ${limitSeconds} seconds`, 'TIMEOUT_EXCEEDED', {
      limitSeconds,
    });
    this.name = 'TimeoutExceededError';
    this.limitSeconds = limitSeconds;
    Object.setPrototypeOf(this, TimeoutExceededError.prototype);
  }
}

/**
 * The text-generation collaborator is missing or failed
 */
export class GeneratorUnavailableError extends SandboxError {
  public readonly suggestions: string[];

  constructor(message: string, suggestions: string[] = [], details?: Record<string, unknown>) {
    super(message, 'GENERATOR_UNAVAILABLE', details);
    this.name = 'GeneratorUnavailableError';
    this.suggestions = suggestions;
    Object.setPrototypeOf(this, GeneratorUnavailableError.prototype);
  }
}

/**
 * Startup configuration could not be loaded. Fatal.
 */
export class ConfigurationError extends SandboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function describeViolations(violations: readonly Violation[]): string {
  const parts = violations.map((violation) =>
    violation.kind === 'DisallowedImport'
      ? `import '${violation.identifier}' is not allowed`
      : `name '${violation.identifier}' is blocked`,
  );
  return `Security policy violation: ${parts.join('; ')}`;
}
