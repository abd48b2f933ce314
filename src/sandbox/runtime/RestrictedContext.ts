import vm from 'node:vm';
import type { OutputSink } from '../capture/OutputCapture.js';
import type { Deadline } from '../deadline/DeadlineSupervisor.js';
import { GuestRuntimeError, TimeoutExceededError } from '../errors.js';
import { normalizeModuleName, type Policy } from '../policy/Policy.js';
import {
  describeThrownValue,
  readDataProperty,
  sanitizeErrorText,
} from '../result/ErrorSanitizer.js';
import {
  bridgeAsync,
  bridgeSync,
  encodeError,
  encodeValue,
  formatGuestLine,
  toArgumentList,
  type AsyncInvoke,
  type Resume,
  type SyncInvoke,
} from './ContextBridge.js';
import { GUEST_MODULES, type GuestModuleHost } from './GuestModules.js';

/** Global through which a compiled snippet hands its body to the context. */
export const LAUNCH_BINDING = '__sandboxLaunch';

/** Global the host runs, under the watchdog, to hand async results back to the guest. */
export const DELIVER_BINDING = '__sandboxDeliver';

export const SNIPPET_FILENAME = 'snippet.js';

/** Intrinsics a snippet never sees. */
export const REMOVED_GLOBALS = [
  'eval',
  'WebAssembly',
  'SharedArrayBuffer',
  'Atomics',
  'Proxy',
  'Reflect',
  'FinalizationRegistry',
  'WeakRef',
] as const;

interface ModuleHooks {
  name: string;
  sync: Array<[string, SyncInvoke]>;
  async: Array<[string, AsyncInvoke]>;
}

interface BootstrapHooks {
  removedGlobals: string[];
  launchBinding: string;
  deliverBinding: string;
  stdout: SyncInvoke;
  stderr: SyncInvoke;
  resolveModule: SyncInvoke;
  takeDelivery: () => string;
  modules: ModuleHooks[];
  complete: (ok: unknown, error?: unknown) => void;
}

// Evaluated inside the context before any guest code. Everything it needs later is
// captured up front, so guest changes to prototypes or globals cannot redirect it.
// Envelope fields are read as own properties: an inherited getter would be guest code.
const BOOTSTRAP_SCRIPT = new vm.Script(`(function (hooks) {
  'use strict';
  const root = globalThis;
  const parse = JSON.parse;
  const freeze = Object.freeze;
  const create = Object.create;
  const defineProperty = Object.defineProperty;
  const getOwnPropertyDescriptor = Object.getOwnPropertyDescriptor;
  const keys = Object.keys;
  const GuestError = Error;
  const GuestPromise = Promise;
  const promiseThen = Promise.prototype.then;
  const apply = Reflect.apply;
  const complete = hooks.complete;
  const resolveModule = hooks.resolveModule;
  const takeDelivery = hooks.takeDelivery;
  const waiting = create(null);
  let nextTicket = 0;

  function makeError(name, message) {
    const error = new GuestError(message);
    defineProperty(error, 'name', { __proto__: null, value: name, writable: true, configurable: true });
    return error;
  }

  function field(record, key) {
    const descriptor = getOwnPropertyDescriptor(record, key);
    return descriptor === undefined ? undefined : descriptor.value;
  }

  function unwrap(encoded) {
    const envelope = parse(encoded);
    if (field(envelope, 'ok') === true) return field(envelope, 'value');
    throw makeError(field(envelope, 'name'), field(envelope, 'message'));
  }

  // Whatever a host hook throws (in practice a stack overflow in a host frame) is a
  // host-realm object; the snippet only ever gets a context-realm error.
  function callHost(invoke, args, ticket) {
    try {
      return invoke(args, ticket);
    } catch {
      throw makeError('RangeError', 'Maximum call stack size exceeded');
    }
  }

  function wrapSync(invoke) {
    return function (...args) {
      return unwrap(callHost(invoke, args));
    };
  }

  function wrapAsync(invoke) {
    return function (...args) {
      const ticket = nextTicket++;
      return new GuestPromise(function (resolve, reject) {
        waiting[ticket] = freeze({ __proto__: null, resolve: resolve, reject: reject });
        callHost(invoke, args, ticket);
      });
    };
  }

  function deliver() {
    for (;;) {
      const next = parse(callHost(takeDelivery, []));
      if (next === null) return;
      const ticket = field(next, '0');
      const waiter = waiting[ticket];
      if (waiter === undefined) continue;
      delete waiting[ticket];
      let value;
      try {
        value = unwrap(field(next, '1'));
      } catch (error) {
        waiter.reject(error);
        continue;
      }
      waiter.resolve(value);
    }
  }

  const registry = create(null);
  for (const entry of hooks.modules) {
    const namespace = {};
    for (const pair of entry.sync) namespace[pair[0]] = wrapSync(pair[1]);
    for (const pair of entry.async) namespace[pair[0]] = wrapAsync(pair[1]);
    registry[entry.name] = freeze(namespace);
  }

  const stdout = wrapSync(hooks.stdout);
  const stderr = wrapSync(hooks.stderr);
  const exportsObject = {};
  let launched = false;

  function onFulfilled() {
    complete(true);
  }

  function onRejected(error) {
    complete(false, error);
  }

  const bindings = {
    print: stdout,
    console: freeze({ log: stdout, info: stdout, debug: stdout, warn: stderr, error: stderr }),
    require: function require(specifier) {
      return registry[unwrap(callHost(resolveModule, [specifier]))];
    },
  };
  for (const name of keys(bindings)) {
    defineProperty(root, name, {
      __proto__: null,
      value: bindings[name],
      writable: true,
      configurable: true,
    });
  }

  defineProperty(root, hooks.launchBinding, {
    __proto__: null,
    value: function (entry) {
      if (launched) return;
      launched = true;
      apply(promiseThen, entry(exportsObject), [onFulfilled, onRejected]);
    },
  });
  defineProperty(root, hooks.deliverBinding, { __proto__: null, value: deliver });

  for (const name of hooks.removedGlobals) delete root[name];
})`, { filename: 'bootstrap.js' });

const DELIVER_SCRIPT = new vm.Script(`${DELIVER_BINDING}();`, { filename: 'deliver.js' });

export interface RestrictedContextOptions {
  policy: Policy;
  capture: OutputSink;
}

function isBootstrap(value: unknown): value is (hooks: BootstrapHooks) => void {
  return typeof value === 'function';
}

const WATCHDOG_MESSAGE = /Script execution timed out after \d+ms/;

function isScriptTimeout(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if (readDataProperty(error, 'code') === 'ERR_SCRIPT_EXECUTION_TIMEOUT') return true;
  const message = readDataProperty(error, 'message');
  return typeof message === 'string' && WATCHDOG_MESSAGE.test(message);
}

/**
 * Compile transpiled snippet code. The script only hands the snippet body to the
 * context launcher; nothing of the snippet runs until `RestrictedContext.run`.
 */
export function compileGuestCode(code: string): vm.Script {
  try {
    return new vm.Script(code, { filename: SNIPPET_FILENAME });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GuestRuntimeError('SyntaxError', sanitizeErrorText(message));
  }
}

/**
 * One single-use guest environment.
 *
 * Guest code only ever runs inside `runInContext` with the remaining deadline as
 * the watchdog timeout. With `microtaskMode: 'afterEvaluate'` the guest microtask
 * queue is drained inside that same call, so async continuations are bounded too.
 */
export class RestrictedContext implements GuestModuleHost {
  private readonly context: vm.Context;
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly deliveries: Array<[number, string]> = [];
  private deadline?: Deadline;
  private completion?: { resolve: () => void; reject: (error: Error) => void };
  private settled = false;
  private disposed = false;

  constructor(private readonly options: RestrictedContextOptions) {
    this.context = vm.createContext(Object.create(null), {
      name: 'snippet',
      codeGeneration: { strings: false, wasm: false },
      microtaskMode: 'afterEvaluate',
    });
    this.bootstrap();
  }

  /**
   * Run a compiled snippet until it settles. Rejects with TimeoutExceededError when
   * the watchdog fires or the context is disposed first.
   */
  public run(script: vm.Script, deadline: Deadline): Promise<void> {
    if (this.deadline) {
      return Promise.reject(new Error('A restricted context runs exactly one snippet'));
    }
    this.deadline = deadline;

    return new Promise<void>((resolve, reject) => {
      this.completion = { resolve, reject };
      this.enter(script);
    });
  }

  public sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      if (this.disposed) return;
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        resolve();
      }, ms);
      this.timers.add(timer);
    });
  }

  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.deliveries.length = 0;
    if (!this.settled) {
      this.fail(new TimeoutExceededError(this.limitSeconds));
    }
  }

  public get pendingTimers(): number {
    return this.timers.size;
  }

  private get limitSeconds(): number {
    return this.deadline?.limitSeconds ?? this.options.policy.maxExecutionSeconds;
  }

  private bootstrap(): void {
    const factory: unknown = BOOTSTRAP_SCRIPT.runInContext(this.context);
    if (!isBootstrap(factory)) {
      throw new Error('Restricted context bootstrap did not evaluate to a function');
    }

    const modules = this.createModuleHooks((ticket, encoded) => this.resume(ticket, encoded));

    factory({
      removedGlobals: [...REMOVED_GLOBALS],
      launchBinding: LAUNCH_BINDING,
      deliverBinding: DELIVER_BINDING,
      stdout: bridgeSync((...args) => this.options.capture.write('stdout', formatGuestLine(args))),
      stderr: bridgeSync((...args) => this.options.capture.write('stderr', formatGuestLine(args))),
      resolveModule: (args) => this.resolveModule(toArgumentList(args)[0], modules),
      takeDelivery: () => JSON.stringify(this.deliveries.shift() ?? null),
      modules,
      complete: (ok, error) => {
        if (ok === true) {
          this.succeed();
        } else if (isScriptTimeout(error) || this.deadline?.expired === true) {
          // A watchdog termination inside the async body surfaces as a rejection
          this.fail(new TimeoutExceededError(this.limitSeconds));
        } else {
          const { name, message } = describeThrownValue(error);
          this.fail(new GuestRuntimeError(name, message));
        }
      },
    });
  }

  private createModuleHooks(resume: Resume): ModuleHooks[] {
    const hooks: ModuleHooks[] = [];

    for (const name of this.options.policy.allowedImports) {
      const factory = GUEST_MODULES.get(name);
      if (!factory) continue;
      const definition = factory(this);
      hooks.push({
        name,
        sync: Object.entries(definition.functions).map(
          ([fn, impl]): [string, SyncInvoke] => [fn, bridgeSync(impl)],
        ),
        async: Object.entries(definition.asyncFunctions ?? {}).map(
          ([fn, impl]): [string, AsyncInvoke] => [fn, bridgeAsync(impl, resume)],
        ),
      });
    }
    return hooks;
  }

  private resolveModule(specifier: unknown, modules: ModuleHooks[]): string {
    if (typeof specifier !== 'string') {
      return encodeError(new GuestRuntimeError('ImportError', 'Module name must be a string'));
    }
    const name = normalizeModuleName(specifier);
    if (!this.options.policy.allowedImports.has(name)) {
      const shown = sanitizeErrorText(specifier);
      return encodeError(new GuestRuntimeError('ImportError', `Import of '${shown}' is not allowed`));
    }
    if (!modules.some((entry) => entry.name === name)) {
      return encodeError(
        new GuestRuntimeError('ImportError', `Module '${name}' is not available in the sandbox`),
      );
    }
    return encodeValue(name);
  }

  private resume(ticket: number, encoded: string): void {
    if (this.disposed || this.settled) return;
    this.deliveries.push([ticket, encoded]);
    this.enter(DELIVER_SCRIPT);
  }

  private enter(script: vm.Script): void {
    if (this.disposed || this.settled || !this.deadline) return;

    const remaining = this.deadline.remainingMs();
    if (remaining <= 0) {
      this.fail(new TimeoutExceededError(this.deadline.limitSeconds));
      return;
    }

    try {
      script.runInContext(this.context, {
        timeout: Math.max(1, Math.ceil(remaining)),
        displayErrors: false,
      });
    } catch (error) {
      if (isScriptTimeout(error)) {
        this.fail(new TimeoutExceededError(this.deadline.limitSeconds));
        return;
      }
      const { name, message } = describeThrownValue(error);
      this.fail(new GuestRuntimeError(name, message));
    }
  }

  private succeed(): void {
    if (this.settled) return;
    this.settled = true;
    this.completion?.resolve();
  }

  private fail(error: Error): void {
    if (this.settled) return;
    this.settled = true;
    this.completion?.reject(error);
  }
}
