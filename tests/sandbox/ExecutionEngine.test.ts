import { jest } from '@jest/globals';
import winston from 'winston';
import { ExecutionEngine } from '../../src/sandbox/ExecutionEngine';
import { createPolicy, type PolicyInput } from '../../src/sandbox/policy/Policy';

function createEngine(policy: PolicyInput = {}): ExecutionEngine {
  return new ExecutionEngine({ policy: createPolicy(policy) });
}

describe('ExecutionEngine', () => {
  const engine = createEngine();

  describe('successful runs', () => {
    it('should capture printed output', async () => {
      const result = await engine.execute('print(2 + 2)');

      expect(result.success).toBe(true);
      expect(result.output).toBe('4\n');
      expect(result.error).toBe('');
      expect(result.stderr).toBe('');
      expect(result.truncated).toBe(false);
      expect(result.executionTimeSeconds).toBeGreaterThanOrEqual(0);
    });

    it('should print several values on one line', async () => {
      const result = await engine.execute("print('a', 1, true, null, undefined);\nprint({ a: 1, b: [1, 2] });");

      expect(result.output).toBe('a 1 true null undefined\n{ a: 1, b: [ 1, 2 ] }\n');
    });

    it('should route console warnings to stderr', async () => {
      const result = await engine.execute("console.log('info');\nconsole.warn('careful');");

      expect(result.output).toBe('info\n');
      expect(result.stderr).toBe('careful\n');
    });

    it('should accept TypeScript syntax', async () => {
      const source = [
        'interface Point { x: number; y: number }',
        'const p: Point = { x: 3, y: 4 };',
        'print(Math.hypot(p.x, p.y));',
      ].join('\n');

      expect((await engine.execute(source)).output).toBe('5\n');
    });

    it('should load allowed modules', async () => {
      const source = [
        "import { join } from 'path';",
        "import { hash } from 'node:crypto';",
        "import * as util from 'util';",
        "print(join('a', 'b', '../c'));",
        "print(hash('sha256', 'abc'));",
        "print(util.format('%s=%d', 'x', 5));",
      ].join('\n');

      const result = await engine.execute(source);

      expect(result.error).toBe('');
      expect(result.output).toBe(
        'a/c\nba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad\nx=5\n',
      );
    });

    it('should resume after sleeping', async () => {
      const source = [
        "const { sleep } = require('timers');",
        "print('before');",
        'await sleep(20);',
        "print('after');",
      ].join('\n');

      const result = await engine.execute(source);

      expect(result.success).toBe(true);
      expect(result.output).toBe('before\nafter\n');
    });

    it('should return identical results for identical snippets', async () => {
      const first = await engine.execute('let total = 0;\nfor (let i = 1; i <= 10; i++) total += i;\nprint(total);');
      const second = await engine.execute('let total = 0;\nfor (let i = 1; i <= 10; i++) total += i;\nprint(total);');

      expect(first.output).toBe('55\n');
      expect(second.output).toBe(first.output);
      expect(second.success).toBe(first.success);
    });

    it('should keep concurrent executions apart', async () => {
      const snippet = (tag: string): string =>
        [
          "const { sleep } = require('timers');",
          `print('${tag}1');`,
          'await sleep(20);',
          `print('${tag}2');`,
        ].join('\n');

      const [a, b] = await Promise.all([engine.execute(snippet('a')), engine.execute(snippet('b'))]);

      expect(a.output).toBe('a1\na2\n');
      expect(b.output).toBe('b1\nb2\n');
    });

    it('should not leak globals between executions', async () => {
      await engine.execute('var leaked = 1;');
      const result = await engine.execute('print(typeof leaked);');

      expect(result.output).toBe('undefined\n');
    });
  });

  describe('policy rejections', () => {
    it('should reject disallowed imports without running anything', async () => {
      const result = await engine.execute("import os from 'os';\nprint('ran');");

      expect(result).toEqual({
        success: false,
        output: '',
        error: "Security policy violation: import 'os' is not allowed",
        executionTimeSeconds: result.executionTimeSeconds,
        stderr: '',
        truncated: false,
      });
    });

    it('should reject blocked names', async () => {
      const result = await engine.execute("print(process.env.HOME);");

      expect(result.success).toBe(false);
      expect(result.error).toBe("Security policy violation: name 'process' is blocked");
    });
  });

  describe('errors', () => {
    it('should report thrown errors with their name', async () => {
      expect((await engine.execute('throw new Error("bad")')).error).toBe('Error: bad');
      expect((await engine.execute("throw new TypeError('nope')")).error).toBe('TypeError: nope');
    });

    it('should report thrown values that are not errors', async () => {
      expect((await engine.execute('throw 42;')).error).toBe('Error: 42');
    });

    it('should keep output printed before the error', async () => {
      const result = await engine.execute("print('before');\nthrow new Error('after');");

      expect(result.success).toBe(false);
      expect(result.output).toBe('before\n');
      expect(result.error).toBe('Error: after');
    });

    it('should report an empty snippet', async () => {
      const result = await engine.execute('   \n');

      expect(result.success).toBe(false);
      expect(result.error).toBe('Error: No code provided');
    });

    it('should report syntax errors with a line number', async () => {
      const result = await engine.execute('print(');

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^SyntaxError: .*\(line 1, column \d+\)$/);
    });

    it('should report failed assertions', async () => {
      const result = await engine.execute("import assert from 'assert';\nassert.strictEqual(1, 2);");

      expect(result.error).toMatch(/^AssertionError: Expected values to be strictly equal/);
    });

    it('should raise an import error for an allowed module with no sandbox counterpart', async () => {
      const withOs = createEngine({ allowedImports: ['os'] });

      const failed = await withOs.execute("import os from 'os';");
      const caught = await withOs.execute("try {\n  require('os');\n} catch (e) {\n  print(e.name);\n}");

      expect(failed.error).toBe("ImportError: Module 'os' is not available in the sandbox");
      expect(caught.output).toBe('ImportError\n');
    });
  });

  describe('limits', () => {
    it('should time out busy loops', async () => {
      const fast = createEngine({ maxExecutionSeconds: 0.5 });

      const result = await fast.execute('while (true) {}');

      expect(result.success).toBe(false);
      expect(result.error).toBe('Code execution timed out after 0.5 seconds');
      expect(result.executionTimeSeconds).toBeGreaterThanOrEqual(0.45);
      expect(result.executionTimeSeconds).toBeLessThan(5);
    });

    it('should time out snippets that never settle', async () => {
      const fast = createEngine({ maxExecutionSeconds: 0.2 });

      const result = await fast.execute("print('waiting');\nawait new Promise(() => {});");

      expect(result.error).toBe('Code execution timed out after 0.2 seconds');
      expect(result.output).toBe('waiting\n');
    });

    it('should time out busy loops that start after an await', async () => {
      const fast = createEngine({ maxExecutionSeconds: 0.3 });
      const source = "const { sleep } = require('timers');\nawait sleep(10);\nwhile (true) {}";

      const result = await fast.execute(source);

      expect(result.error).toBe('Code execution timed out after 0.3 seconds');
    });

    it('should stay bounded when a prototype getter runs after an await', async () => {
      const fast = createEngine({ maxExecutionSeconds: 0.5, blockedNames: [] });
      const source = [
        "const { sleep } = require('timers');",
        "Object.defineProperty(Object.prototype, 'value', { get() { while (true) {} } });",
        'await sleep(10);',
        "print('resumed');",
        'print(({} as { value?: unknown }).value);',
      ].join('\n');

      const result = await fast.execute(source);

      expect(result.error).toBe('Code execution timed out after 0.5 seconds');
      expect(result.output).toBe('resumed\n');
      expect(result.executionTimeSeconds).toBeLessThan(5);
    });

    it('should not let a busy snippet time out a concurrent one', async () => {
      const limited = createEngine({ maxExecutionSeconds: 1 });

      const [busy, quiet] = await Promise.all([
        limited.execute('while (true) {}'),
        limited.execute("import { sleep } from 'timers';\nawait sleep(10);\nprint('done');"),
      ]);

      expect(busy.error).toBe('Code execution timed out after 1 seconds');
      expect(quiet.success).toBe(true);
      expect(quiet.output).toBe('done\n');
      expect(quiet.error).toBe('');
    });

    it('should stop a snippet at the memory limit and keep serving', async () => {
      const capped = createEngine({ maxMemoryMb: 96 });

      const result = await capped.execute(
        'const keep = [];\nwhile (true) keep.push(new Array(1e6).fill(1));',
      );
      const next = await capped.execute('print(1)');

      expect(result.success).toBe(false);
      expect(result.error).toBe('MemoryError: Snippet exceeded the memory limit of 96 MB');
      expect(next.output).toBe('1\n');
    });

    it('should truncate output at the configured cap', async () => {
      const small = createEngine({ maxOutputChars: 50 });

      const result = await small.execute("for (let i = 0; i < 100; i++) print('xxxxxxxxxx');");

      expect(result.success).toBe(true);
      expect(result.output).toHaveLength(50);
      expect(result.truncated).toBe(true);
    });
  });

  describe('containment', () => {
    const open = createEngine({ blockedNames: [] });

    it('should refuse code generation from strings', async () => {
      const result = await open.execute("const make = print.constructor;\nmake('return 1')();");

      expect(result.error).toBe('EvalError: Code generation from strings disallowed for this context');
    });

    it('should only hand snippets errors from their own realm', async () => {
      const source = [
        "import path from 'path';",
        'let foreign = 0;',
        'function dive(): void {',
        '  try {',
        "    path.basename('a/b');",
        '    dive();',
        '  } catch (error) {',
        '    if (!(error instanceof Error)) foreign++;',
        '    throw error;',
        '  }',
        '}',
        'try {',
        '  dive();',
        '} catch (error) {',
        '  print(error instanceof Error, foreign);',
        '}',
      ].join('\n');

      const result = await open.execute(source);

      expect(result.error).toBe('');
      expect(result.output).toBe('true 0\n');
    });

    it('should not expose host globals', async () => {
      const result = await open.execute(
        'print(typeof process, typeof Buffer, typeof setTimeout, typeof WebAssembly);',
      );

      expect(result.output).toBe('undefined undefined undefined undefined\n');
    });
  });

  it('should warn about allowed imports that cannot be loaded', () => {
    const logger = winston.createLogger({ silent: true });
    const warn = jest.spyOn(logger, 'warn');

    new ExecutionEngine({ policy: createPolicy({ allowedImports: ['path', 'fs'] }), logger });

    expect(warn).toHaveBeenCalledWith(
      "Allowed import 'fs' has no sandbox module and cannot be loaded",
    );
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
