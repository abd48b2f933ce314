import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_ALLOWED_IMPORTS = [
  'assert',
  'crypto',
  'path',
  'querystring',
  'timers',
  'util',
] as const;

export const DEFAULT_BLOCKED_NAMES = [
  // dynamic execution
  'eval',
  'Function',
  'WebAssembly',
  'setTimeout',
  'setInterval',
  'setImmediate',
  // host and environment access
  'process',
  'global',
  'globalThis',
  'module',
  'exports',
  '__dirname',
  '__filename',
  'Buffer',
  'fetch',
  'XMLHttpRequest',
  // shared memory
  'Atomics',
  'SharedArrayBuffer',
  // reflection
  'constructor',
  '__proto__',
  'Reflect',
  'Proxy',
  'getPrototypeOf',
  'setPrototypeOf',
  'defineProperty',
  '__defineGetter__',
  '__defineSetter__',
  '__lookupGetter__',
  '__lookupSetter__',
] as const;

export const DEFAULT_MAX_EXECUTION_SECONDS = 10;
export const DEFAULT_MAX_OUTPUT_CHARS = 10_000;
export const DEFAULT_MAX_MEMORY_MB = 128;

export const PolicySchema = z.object({
  allowedImports: z.array(z.string().min(1)).default([...DEFAULT_ALLOWED_IMPORTS]),
  blockedNames: z.array(z.string().min(1)).default([...DEFAULT_BLOCKED_NAMES]),
  maxExecutionSeconds: z.number().positive().max(600).default(DEFAULT_MAX_EXECUTION_SECONDS),
  maxOutputChars: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_CHARS),
  maxMemoryMb: z.number().int().min(16).max(4096).default(DEFAULT_MAX_MEMORY_MB),
});

export type PolicyInput = z.input<typeof PolicySchema>;

/**
 * Immutable rules shared by every execution.
 */
export interface Policy {
  readonly allowedImports: ReadonlySet<string>;
  readonly blockedNames: ReadonlySet<string>;
  readonly maxExecutionSeconds: number;
  readonly maxOutputChars: number;
  /** Heap cap of the worker thread that runs a snippet */
  readonly maxMemoryMb: number;
}

export function createPolicy(input: PolicyInput = {}): Policy {
  const parsed = PolicySchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'policy'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid sandbox policy: ${issues}`, { issues });
  }

  const { allowedImports, blockedNames, maxExecutionSeconds, maxOutputChars, maxMemoryMb } =
    parsed.data;
  return Object.freeze({
    allowedImports: new Set(allowedImports.map(normalizeModuleName)),
    blockedNames: new Set(blockedNames),
    maxExecutionSeconds,
    maxOutputChars,
    maxMemoryMb,
  });
}

/**
 * Plain-data form of a policy, for handing it to a worker thread.
 */
export function toPolicyInput(policy: Policy): z.output<typeof PolicySchema> {
  return {
    allowedImports: [...policy.allowedImports],
    blockedNames: [...policy.blockedNames],
    maxExecutionSeconds: policy.maxExecutionSeconds,
    maxOutputChars: policy.maxOutputChars,
    maxMemoryMb: policy.maxMemoryMb,
  };
}

/**
 * `node:path` and `path` name the same capability.
 */
export function normalizeModuleName(specifier: string): string {
  return specifier.startsWith('node:') ? specifier.slice('node:'.length) : specifier;
}
