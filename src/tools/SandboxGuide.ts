import type { SandboxStats } from '../agent/CodingService.js';

export const SANDBOX_DTS_URI = 'file:///sys/sandbox.d.ts';

const MODULE_DECLARATIONS: Record<string, string> = {
  assert: `declare module 'assert' {
  export function ok(value: unknown, message?: string): void;
  export function equal(actual: unknown, expected: unknown, message?: string): void;
  export function strictEqual(actual: unknown, expected: unknown, message?: string): void;
  export function notStrictEqual(actual: unknown, expected: unknown, message?: string): void;
  export function deepStrictEqual(actual: unknown, expected: unknown, message?: string): void;
  export function fail(message?: string): never;
}`,
  crypto: `declare module 'crypto' {
  export function randomUUID(): string;
  export function randomInt(max: number): number;
  export function randomInt(min: number, max: number): number;
  export function hash(algorithm: string, data: string, encoding?: 'hex' | 'base64'): string;
}`,
  path: `declare module 'path' {
  export function join(...segments: string[]): string;
  export function basename(path: string, suffix?: string): string;
  export function dirname(path: string): string;
  export function extname(path: string): string;
  export function normalize(path: string): string;
  export function isAbsolute(path: string): boolean;
  export function relative(from: string, to: string): string;
}`,
  querystring: `declare module 'querystring' {
  export function parse(text: string): Record<string, string | string[]>;
  export function stringify(value: Record<string, unknown>): string;
  export function escape(text: string): string;
  export function unescape(text: string): string;
}`,
  timers: `declare module 'timers' {
  /** Resolves after ms milliseconds. */
  export function sleep(ms?: number): Promise<void>;
}`,
  util: `declare module 'util' {
  export function format(format?: unknown, ...args: unknown[]): string;
  export function inspect(value: unknown, depth?: number): string;
  export function isDeepStrictEqual(a: unknown, b: unknown): boolean;
}`,
};

const GLOBAL_DECLARATIONS = `/** Writes the values, space separated, followed by a newline. */
declare function print(...values: unknown[]): void;
declare const console: {
  log(...values: unknown[]): void;
  info(...values: unknown[]): void;
  debug(...values: unknown[]): void;
  warn(...values: unknown[]): void;
  error(...values: unknown[]): void;
};
declare function require(name: string): unknown;`;

/**
 * Type definitions for the globals and modules a snippet can use.
 */
export function generateSandboxDts(allowedImports: readonly string[]): string {
  const modules = allowedImports
    .map((name) => MODULE_DECLARATIONS[name])
    .filter((declaration): declaration is string => declaration !== undefined);
  return [GLOBAL_DECLARATIONS, ...modules].join('\n\n') + '\n';
}

export function buildPromptContent(stats: SandboxStats): string {
  const modules = stats.allowedImports.map((name) => `\`${name}\``).join(', ');
  return `# Snippet sandbox

Snippets are JavaScript or TypeScript and run in a fresh, restricted context with top-level \`await\`.

## Limits

- Wall clock: ${stats.maxExecutionTime} seconds. Longer runs fail with "Code execution timed out".
- Output: ${stats.maxOutputLength} characters per stream; anything beyond is dropped and \`truncated\` is set.

## Capabilities

- \`print(...values)\` and \`console.log/info/debug\` write to \`output\`; \`console.warn/error\` write to \`stderr\`.
- Importable modules: ${modules}. See \`${SANDBOX_DTS_URI.replace('file://', '')}\` for their functions.
- No file system, network, process, timers other than \`sleep\` from \`timers\`, or code generation from strings.

## Example

\`\`\`javascript
import { join } from 'path';
import { sleep } from 'timers';

await sleep(10);
print(join('reports', 'daily.txt'));
\`\`\`
`;
}
