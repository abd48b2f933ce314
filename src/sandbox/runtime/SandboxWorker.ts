import { parentPort, workerData, type MessagePort } from 'node:worker_threads';
import type { CaptureStream, OutputSink } from '../capture/OutputCapture.js';
import { DeadlineSupervisor } from '../deadline/DeadlineSupervisor.js';
import { GuestRuntimeError, TimeoutExceededError } from '../errors.js';
import { createPolicy } from '../policy/Policy.js';
import { describeThrownValue } from '../result/ErrorSanitizer.js';
import { compileGuestCode, RestrictedContext } from './RestrictedContext.js';
import {
  RunCommandSchema,
  SandboxWorkerDataSchema,
  type SandboxWorkerData,
  type WorkerEvent,
  type WorkerOutcome,
} from './WorkerProtocol.js';

export type PostEvent = (event: WorkerEvent) => void;

/**
 * Sends guest output to the engine as it is written. One character past the
 * limit is forwarded so the engine's capture still records the truncation.
 */
export class ForwardingSink implements OutputSink {
  private readonly remaining: Record<CaptureStream, number>;

  constructor(
    maxChars: number,
    private readonly post: PostEvent,
  ) {
    this.remaining = { stdout: maxChars + 1, stderr: maxChars + 1 };
  }

  public write(stream: CaptureStream, text: string): void {
    const room = this.remaining[stream];
    if (room <= 0 || text.length === 0) return;
    const forwarded = text.slice(0, room);
    this.remaining[stream] = room - forwarded.length;
    this.post({ type: 'output', stream, text: forwarded });
  }
}

export function describeFailure(error: unknown): WorkerOutcome {
  if (error instanceof TimeoutExceededError) {
    return { kind: 'timedOut' };
  }
  if (error instanceof GuestRuntimeError) {
    return { kind: 'raised', name: error.guestName, message: error.guestMessage, guest: true };
  }
  const { name, message } = describeThrownValue(error);
  return { kind: 'raised', name, message, guest: false };
}

/**
 * Run transpiled snippet code in a fresh restricted context of this thread.
 */
export async function runSnippet(
  data: SandboxWorkerData,
  timeoutMs: number,
  post: PostEvent,
): Promise<WorkerOutcome> {
  const policy = createPolicy(data.policy);
  const sink = new ForwardingSink(policy.maxOutputChars, post);

  const outcome = await new DeadlineSupervisor().runWithDeadline(async (deadline) => {
    const script = compileGuestCode(data.code);
    const context = new RestrictedContext({ policy, capture: sink });
    deadline.signal.addEventListener('abort', () => context.dispose(), { once: true });
    await context.run(script, deadline);
  }, timeoutMs / 1000);

  switch (outcome.kind) {
    case 'completed':
      return { kind: 'completed' };
    case 'timedOut':
      return { kind: 'timedOut' };
    case 'raised':
      return describeFailure(outcome.error);
  }
}

function serve(port: MessagePort, data: SandboxWorkerData): void {
  const post: PostEvent = (event) => port.postMessage(event);

  port.once('message', (message: unknown) => {
    const command = RunCommandSchema.safeParse(message);
    if (!command.success) {
      post({
        type: 'settled',
        outcome: { kind: 'raised', name: 'SandboxError', message: 'Malformed run command', guest: false },
      });
      return;
    }
    void runSnippet(data, command.data.timeoutMs, post)
      .catch(describeFailure)
      .then((outcome) => post({ type: 'settled', outcome }));
  });

  post({ type: 'ready' });
}

const spawnedWith = SandboxWorkerDataSchema.safeParse(workerData);
if (parentPort && spawnedWith.success) {
  serve(parentPort, spawnedWith.data);
}
