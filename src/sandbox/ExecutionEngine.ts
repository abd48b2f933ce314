import { performance } from 'node:perf_hooks';
import winston, { type Logger } from 'winston';
import { OutputCapture } from './capture/OutputCapture.js';
import { DeadlineSupervisor } from './deadline/DeadlineSupervisor.js';
import { GuestRuntimeError, PolicyViolationError } from './errors.js';
import type { Policy } from './policy/Policy.js';
import { check } from './precheck/StaticPreCheck.js';
import { classify } from './result/ResultClassifier.js';
import { GUEST_MODULES } from './runtime/GuestModules.js';
import { transpileSnippet } from './runtime/GuestScript.js';
import { WorkerSandbox } from './runtime/WorkerSandbox.js';
import type { ExecutionResult, Outcome } from './types.js';

export interface ExecutionEngineOptions {
  policy: Policy;
  logger?: Logger;
  supervisor?: DeadlineSupervisor;
}

/**
 * Runs one snippet end to end: pre-check, supervised attempt, classification.
 * `execute` never rejects; every failure becomes an unsuccessful result.
 */
export class ExecutionEngine {
  public readonly policy: Policy;
  private readonly logger: Logger;
  private readonly supervisor: DeadlineSupervisor;

  constructor(options: ExecutionEngineOptions) {
    this.policy = options.policy;
    this.logger = options.logger ?? winston.createLogger({ silent: true });
    this.supervisor = options.supervisor ?? new DeadlineSupervisor({ logger: this.logger });

    for (const name of this.policy.allowedImports) {
      if (!GUEST_MODULES.has(name)) {
        this.logger.warn(`Allowed import '${name}' has no sandbox module and cannot be loaded`);
      }
    }
  }

  public async execute(sourceText: string): Promise<ExecutionResult> {
    const startedAt = performance.now();
    const elapsed = (): number => (performance.now() - startedAt) / 1000;
    const limitSeconds = this.policy.maxExecutionSeconds;

    if (sourceText.trim().length === 0) {
      return classify(
        {
          kind: 'attempted',
          outcome: { kind: 'raised', error: new GuestRuntimeError('Error', 'No code provided') },
          captured: { stdout: '', stderr: '', truncated: false },
          limitSeconds,
        },
        elapsed(),
      );
    }

    const violations = check(sourceText, this.policy);
    if (violations.length > 0) {
      const result = classify(
        { kind: 'rejected', error: new PolicyViolationError(violations) },
        elapsed(),
      );
      this.logger.info('Snippet rejected by policy', {
        violations: violations.length,
        executionTimeSeconds: result.executionTimeSeconds,
      });
      return result;
    }

    const capture = new OutputCapture(this.policy.maxOutputChars);
    const outcome = await this.attempt(sourceText, capture);
    capture.seal();

    if (outcome.kind === 'raised' && !(outcome.error instanceof GuestRuntimeError)) {
      this.logger.error('Internal failure while executing snippet', { error: outcome.error });
    }

    const result = classify(
      { kind: 'attempted', outcome, captured: capture.snapshot(), limitSeconds },
      elapsed(),
    );
    this.logger.info('Snippet executed', {
      success: result.success,
      outcome: outcome.kind,
      executionTimeSeconds: result.executionTimeSeconds,
      truncated: result.truncated,
    });
    return result;
  }

  /**
   * Transpile, start a worker, then run it under the deadline. Compile errors and
   * worker startup happen before the deadline is armed.
   */
  private async attempt(sourceText: string, capture: OutputCapture): Promise<Outcome<void>> {
    let sandbox: WorkerSandbox;
    try {
      sandbox = await WorkerSandbox.start({
        policy: this.policy,
        capture,
        code: transpileSnippet(sourceText),
      });
    } catch (error) {
      return { kind: 'raised', error: error instanceof Error ? error : new Error(String(error)) };
    }

    try {
      return await this.supervisor.runWithDeadline(
        (deadline) => sandbox.run(deadline),
        this.policy.maxExecutionSeconds,
      );
    } finally {
      await sandbox.terminate();
    }
  }
}
