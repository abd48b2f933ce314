import assert from 'node:assert';
import crypto from 'node:crypto';
import path from 'node:path';
import querystring from 'node:querystring';
import util from 'node:util';
import type { AsyncHostFunction, HostFunction } from './ContextBridge.js';

/**
 * Services a module may need from the execution that loads it.
 */
export interface GuestModuleHost {
  /** Resolves after `ms`; the timer is cleared when the execution is disposed. */
  sleep(ms: number): Promise<void>;
}

export interface GuestModuleDefinition {
  functions: Record<string, HostFunction>;
  asyncFunctions?: Record<string, AsyncHostFunction>;
}

export type GuestModuleFactory = (host: GuestModuleHost) => GuestModuleDefinition;
export type GuestModuleRegistry = ReadonlyMap<string, GuestModuleFactory>;

const MAX_SLEEP_MS = 600_000;

function expectString(value: unknown, name: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`The "${name}" argument must be of type string`);
  }
  return value;
}

function expectNumber(value: unknown, name: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new TypeError(`The "${name}" argument must be of type number`);
  }
  return value;
}

function expectStrings(values: unknown[], name: string): string[] {
  return values.map((value) => expectString(value, name));
}

function optionalString(value: unknown, name: string): string | undefined {
  return value === undefined ? undefined : expectString(value, name);
}

function asMessage(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

const assertModule: GuestModuleFactory = () => ({
  functions: {
    ok: (value, message) => assert.ok(value, asMessage(message)),
    equal: (actual, expected, message) => assert.equal(actual, expected, asMessage(message)),
    strictEqual: (actual, expected, message) =>
      assert.strictEqual(actual, expected, asMessage(message)),
    notStrictEqual: (actual, expected, message) =>
      assert.notStrictEqual(actual, expected, asMessage(message)),
    deepStrictEqual: (actual, expected, message) =>
      assert.deepStrictEqual(actual, expected, asMessage(message)),
    fail: (message) => assert.fail(asMessage(message)),
  },
});

const cryptoModule: GuestModuleFactory = () => ({
  functions: {
    randomUUID: () => crypto.randomUUID(),
    randomInt: (min, max) =>
      max === undefined
        ? crypto.randomInt(expectNumber(min, 'max'))
        : crypto.randomInt(expectNumber(min, 'min'), expectNumber(max, 'max')),
    hash: (algorithm, data, encoding) => {
      const digestEncoding = optionalString(encoding, 'encoding') ?? 'hex';
      if (digestEncoding !== 'hex' && digestEncoding !== 'base64') {
        throw new TypeError(`Unsupported digest encoding '${digestEncoding}'`);
      }
      return crypto
        .createHash(expectString(algorithm, 'algorithm'))
        .update(expectString(data, 'data'))
        .digest(digestEncoding);
    },
  },
});

const pathModule: GuestModuleFactory = () => ({
  functions: {
    join: (...segments) => path.posix.join(...expectStrings(segments, 'path')),
    basename: (target, suffix) =>
      path.posix.basename(expectString(target, 'path'), optionalString(suffix, 'suffix')),
    dirname: (target) => path.posix.dirname(expectString(target, 'path')),
    extname: (target) => path.posix.extname(expectString(target, 'path')),
    normalize: (target) => path.posix.normalize(expectString(target, 'path')),
    isAbsolute: (target) => path.posix.isAbsolute(expectString(target, 'path')),
    relative: (from, to) =>
      path.posix.relative(expectString(from, 'from'), expectString(to, 'to')),
  },
});

const querystringModule: GuestModuleFactory = () => ({
  functions: {
    parse: (text) => ({ ...querystring.parse(expectString(text, 'str')) }),
    stringify: (value) => {
      if (typeof value !== 'object' || value === null) {
        throw new TypeError('The "obj" argument must be an object');
      }
      return querystring.stringify(Object.fromEntries(Object.entries(value)));
    },
    escape: (text) => querystring.escape(expectString(text, 'str')),
    unescape: (text) => querystring.unescape(expectString(text, 'str')),
  },
});

const timersModule: GuestModuleFactory = (host) => ({
  functions: {},
  asyncFunctions: {
    sleep: (ms) => {
      const delay = ms === undefined ? 0 : expectNumber(ms, 'ms');
      if (delay < 0 || !Number.isFinite(delay)) {
        throw new RangeError('The "ms" argument must be a non-negative finite number');
      }
      return host.sleep(Math.min(delay, MAX_SLEEP_MS));
    },
  },
});

const utilModule: GuestModuleFactory = () => ({
  functions: {
    format: (...args) => util.formatWithOptions({ customInspect: false }, ...args),
    inspect: (value, depth) =>
      util.inspect(value, {
        customInspect: false,
        depth: typeof depth === 'number' ? depth : 2,
      }),
    isDeepStrictEqual: (a, b) => util.isDeepStrictEqual(a, b),
  },
});

/**
 * Capabilities a snippet can `require`, keyed by module name.
 */
export const GUEST_MODULES: GuestModuleRegistry = new Map<string, GuestModuleFactory>([
  ['assert', assertModule],
  ['crypto', cryptoModule],
  ['path', pathModule],
  ['querystring', querystringModule],
  ['timers', timersModule],
  ['util', utilModule],
]);
