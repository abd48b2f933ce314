import path from 'node:path';
import { Worker } from 'node:worker_threads';
import type { OutputSink } from '../capture/OutputCapture.js';
import type { Deadline } from '../deadline/DeadlineSupervisor.js';
import { GuestRuntimeError, SandboxError, TimeoutExceededError } from '../errors.js';
import { toPolicyInput, type Policy } from '../policy/Policy.js';
import { readDataProperty } from '../result/ErrorSanitizer.js';
import {
  WorkerEventSchema,
  type RunCommand,
  type SandboxWorkerData,
  type WorkerEvent,
  type WorkerOutcome,
} from './WorkerProtocol.js';

const WORKER_ENTRY = path.join(__dirname, `SandboxWorker${path.extname(__filename)}`);

function workerSource(): string {
  const entry = JSON.stringify(WORKER_ENTRY);
  if (path.extname(WORKER_ENTRY) === '.ts') {
    // Running from sources: the worker loads them through tsx
    return `require(${JSON.stringify(require.resolve('tsx/cjs'))});\nrequire(${entry});`;
  }
  return `require(${entry});`;
}

type ControlEvent = Exclude<WorkerEvent, { type: 'output' }>;

export interface WorkerSandboxOptions {
  policy: Policy;
  capture: OutputSink;
  /** Transpiled snippet code */
  code: string;
}

function isOutOfMemory(error: Error): boolean {
  return readDataProperty(error, 'code') === 'ERR_WORKER_OUT_OF_MEMORY';
}

/**
 * One worker thread holding one snippet. The thread has its own heap, capped at
 * `policy.maxMemoryMb`, and is terminated outright when the deadline aborts, so a
 * snippet that never yields only ever blocks itself.
 */
export class WorkerSandbox {
  private readonly worker: Worker;
  private pending?: { resolve: (event: ControlEvent) => void; reject: (error: Error) => void };
  private failure?: Error;
  private exited = false;

  private constructor(private readonly options: WorkerSandboxOptions) {
    const data: SandboxWorkerData = { code: options.code, policy: toPolicyInput(options.policy) };
    this.worker = new Worker(workerSource(), {
      eval: true,
      workerData: data,
      resourceLimits: { maxOldGenerationSizeMb: options.policy.maxMemoryMb },
    });
    this.worker.on('message', (message: unknown) => this.handle(message));
    this.worker.on('error', (error: Error) =>
      this.abandon(
        isOutOfMemory(error)
          ? new GuestRuntimeError(
              'MemoryError',
              `Snippet exceeded the memory limit of ${options.policy.maxMemoryMb} MB`,
            )
          : error,
      ),
    );
    this.worker.on('exit', (exitCode: number) => {
      this.exited = true;
      this.abandon(new SandboxError(`Sandbox worker exited with code ${exitCode}`, 'WORKER_EXIT'));
    });
  }

  /**
   * Spawn a worker and wait until it is ready to run. Startup is not charged to
   * the snippet's time limit.
   */
  public static async start(options: WorkerSandboxOptions): Promise<WorkerSandbox> {
    const sandbox = new WorkerSandbox(options);
    try {
      const event = await sandbox.next();
      if (event.type !== 'ready') {
        throw new SandboxError('Sandbox worker settled before it was started', 'WORKER_PROTOCOL');
      }
    } catch (error) {
      await sandbox.terminate();
      throw error;
    }
    return sandbox;
  }

  public async run(deadline: Deadline): Promise<void> {
    const limitSeconds = this.options.policy.maxExecutionSeconds;
    if (deadline.expired) {
      throw new TimeoutExceededError(limitSeconds);
    }

    const onAbort = (): void => this.abandon(new TimeoutExceededError(limitSeconds));
    deadline.signal.addEventListener('abort', onAbort, { once: true });
    try {
      const settled = this.next();
      const command: RunCommand = { type: 'run', timeoutMs: Math.max(1, deadline.remainingMs()) };
      this.worker.postMessage(command);

      const event = await settled;
      if (event.type !== 'settled') {
        throw new SandboxError('Sandbox worker reported ready twice', 'WORKER_PROTOCOL');
      }
      const error = this.toError(event.outcome);
      if (error) throw error;
    } finally {
      deadline.signal.removeEventListener('abort', onAbort);
    }
  }

  public async terminate(): Promise<void> {
    if (this.exited) return;
    await this.worker.terminate();
  }

  private next(): Promise<ControlEvent> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise<ControlEvent>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  private handle(message: unknown): void {
    const parsed = WorkerEventSchema.safeParse(message);
    if (!parsed.success) {
      this.abandon(new SandboxError('Sandbox worker sent a malformed message', 'WORKER_PROTOCOL'));
      return;
    }

    const event = parsed.data;
    if (event.type === 'output') {
      this.options.capture.write(event.stream, event.text);
      return;
    }
    const pending = this.pending;
    this.pending = undefined;
    pending?.resolve(event);
  }

  private abandon(error: Error): void {
    const failure = this.failure ?? error;
    this.failure = failure;
    const pending = this.pending;
    this.pending = undefined;
    pending?.reject(failure);
    void this.terminate();
  }

  private toError(outcome: WorkerOutcome): Error | undefined {
    switch (outcome.kind) {
      case 'completed':
        return undefined;
      case 'timedOut':
        return new TimeoutExceededError(this.options.policy.maxExecutionSeconds);
      case 'raised':
        if (outcome.guest) return new GuestRuntimeError(outcome.name, outcome.message);
        return new SandboxError(
          outcome.message ? `${outcome.name}: ${outcome.message}` : outcome.name,
          'WORKER_FAILURE',
        );
    }
  }
}
