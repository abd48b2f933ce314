import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CodingService } from '../agent/CodingService.js';
import type { ExecutionResult } from '../sandbox/types.js';
import type { SandboxTool } from './SandboxTool.js';

const executeCodeInputSchema = z.object({
  code: z.string().describe('JavaScript or TypeScript snippet to run in the sandbox'),
});

export type ExecuteCodeResponse = ExecutionResult | { success: false; error: string };

export const EMPTY_CODE_MESSAGE = 'Please provide code to execute';

/**
 * Runs a snippet through the execution engine.
 */
export class ExecuteCodeTool implements SandboxTool {
  public readonly tool: Tool;

  constructor(private readonly service: CodingService) {
    this.tool = this.createToolDefinition();
  }

  private createToolDefinition(): Tool {
    return {
      name: 'execute_code',
      description: this.buildDescription(),
      inputSchema: {
        type: 'object',
        properties: {
          code: {
            type: 'string',
            description:
              'JavaScript or TypeScript snippet. Top-level await is supported; write output with print() or console.log().',
          },
        },
        required: ['code'],
      },
    };
  }

  private buildDescription(): string {
    const stats = this.service.stats();
    return `Execute a JavaScript/TypeScript snippet in a restricted sandbox and return its captured output.

- **Limits**: ${stats.maxExecutionTime}s wall clock, ${stats.maxOutputLength} characters of output per stream.
- **Imports**: only ${stats.allowedImports.map((name) => `\`${name}\``).join(', ')}.
- **Output**: \`print(...)\` and \`console.log/info/debug\` go to \`output\`; \`console.warn/error\` go to \`stderr\`.
- **Type Definitions**: Reference \`/sys/sandbox.d.ts\` for the available globals and modules.`;
  }

  async execute(rawParams: unknown): Promise<ExecuteCodeResponse> {
    const { code } = executeCodeInputSchema.parse(rawParams);
    if (code.trim().length === 0) {
      return { success: false, error: EMPTY_CODE_MESSAGE };
    }
    return this.service.execute(code);
  }
}
