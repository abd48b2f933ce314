import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * An MCP tool backed by the coding service. `execute` validates its own input.
 */
export interface SandboxTool {
  readonly tool: Tool;
  execute(rawParams: unknown): Promise<unknown>;
}
