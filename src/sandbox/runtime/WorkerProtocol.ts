import { z } from 'zod';
import { PolicySchema } from '../policy/Policy.js';

/**
 * Messages between the engine and the worker thread that runs one snippet.
 *
 * The worker is spawned with the transpiled code and the policy, answers `ready`,
 * and waits for a single `run` command carrying the time it has left.
 */

export const SandboxWorkerDataSchema = z.object({
  code: z.string(),
  policy: PolicySchema,
});

export const RunCommandSchema = z.object({
  type: z.literal('run'),
  timeoutMs: z.number().positive(),
});

export const WorkerOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('completed') }),
  z.object({ kind: z.literal('timedOut') }),
  z.object({
    kind: z.literal('raised'),
    name: z.string(),
    message: z.string(),
    /** False when the failure came from the sandbox itself rather than the snippet */
    guest: z.boolean(),
  }),
]);

export const WorkerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({
    type: z.literal('output'),
    stream: z.enum(['stdout', 'stderr']),
    text: z.string(),
  }),
  z.object({ type: z.literal('settled'), outcome: WorkerOutcomeSchema }),
]);

export type SandboxWorkerData = z.input<typeof SandboxWorkerDataSchema>;
export type RunCommand = z.infer<typeof RunCommandSchema>;
export type WorkerOutcome = z.infer<typeof WorkerOutcomeSchema>;
export type WorkerEvent = z.infer<typeof WorkerEventSchema>;
