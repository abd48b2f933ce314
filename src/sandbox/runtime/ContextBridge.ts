import { inspect, types } from 'node:util';
import { GuestRuntimeError } from '../errors.js';
import { describeThrownValue, sanitizeHostPaths } from '../result/ErrorSanitizer.js';

/**
 * Host side of the guest/host boundary.
 *
 * Host functions never reach the guest directly. Each one is paired with a shim
 * created inside the context; the shim calls an "invoke" hook and receives a JSON
 * envelope, which it parses into context-realm values or rethrows as a
 * context-realm error.
 */

export type HostFunction = (...args: unknown[]) => unknown;
export type AsyncHostFunction = (...args: unknown[]) => Promise<unknown>;

export type Envelope =
  | { ok: true; value?: unknown }
  | { ok: false; name: string; message: string };

/** Synchronous hook handed to a shim. */
export type SyncInvoke = (args: unknown) => string;
/** Asynchronous hook handed to a shim; `ticket` names the guest promise waiting on it. */
export type AsyncInvoke = (args: unknown, ticket: unknown) => void;

/**
 * Queues the encoded result for a ticket. The context picks it up on its next
 * watchdog-bounded entry; no guest code runs from inside this call.
 */
export type Resume = (ticket: number, encoded: string) => void;

export function encodeValue(value: unknown): string {
  try {
    const envelope: Envelope = { ok: true, value };
    return JSON.stringify(envelope);
  } catch (error) {
    return encodeError(error);
  }
}

export function encodeError(error: unknown): string {
  const { name, message } =
    error instanceof GuestRuntimeError
      ? { name: error.guestName, message: error.guestMessage }
      : describeThrownValue(error);
  const envelope: Envelope = { ok: false, name, message };
  return JSON.stringify(envelope);
}

export function toArgumentList(args: unknown): unknown[] {
  return Array.isArray(args) ? Array.from(args) : [];
}

export function bridgeSync(fn: HostFunction): SyncInvoke {
  return (args) => {
    try {
      return encodeValue(fn(...toArgumentList(args)));
    } catch (error) {
      return encodeError(error);
    }
  };
}

export function bridgeAsync(fn: AsyncHostFunction, resume: Resume): AsyncInvoke {
  return (args, ticket) => {
    if (typeof ticket !== 'number') return;

    let pending: Promise<unknown>;
    try {
      pending = fn(...toArgumentList(args));
    } catch (error) {
      pending = Promise.reject(error);
    }

    void pending
      .then(encodeValue, encodeError)
      .then((encoded) => resume(ticket, encoded));
  };
}

/**
 * Text for one `print`/`console` argument. Strings pass through unchanged; errors
 * show as `Name: message`; objects are inspected without running custom inspectors.
 */
export function formatGuestValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'bigint') return `${value}n`;
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return String(value);
  }
  if (types.isNativeError(value)) {
    const { name, message } = describeThrownValue(value);
    return message ? `${name}: ${message}` : name;
  }
  return sanitizeHostPaths(
    inspect(value, { customInspect: false, depth: 4, breakLength: Infinity }),
  );
}

export function formatGuestLine(args: unknown[]): string {
  return `${args.map(formatGuestValue).join(' ')}\n`;
}
