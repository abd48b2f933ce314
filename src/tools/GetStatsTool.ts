import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CodingService, SandboxStats } from '../agent/CodingService.js';
import type { SandboxTool } from './SandboxTool.js';

const getStatsInputSchema = z.object({}).passthrough();

export class GetStatsTool implements SandboxTool {
  public readonly tool: Tool = {
    name: 'get_stats',
    description: 'Report sandbox limits, allowed imports and whether code generation is available.',
    inputSchema: { type: 'object', properties: {} },
  };

  constructor(private readonly service: CodingService) {}

  async execute(rawParams: unknown): Promise<SandboxStats> {
    getStatsInputSchema.parse(rawParams ?? {});
    return this.service.stats();
  }
}
