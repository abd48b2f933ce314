import type { Logger } from 'winston';
import type { CodingService } from '../agent/CodingService.js';
import type { MCPPlugin, MCPServer, ToolHandler } from '../server/MCPServer.js';
import { ExecuteCodeTool } from '../tools/ExecuteCodeTool.js';
import { GenerateAndExecuteTool } from '../tools/GenerateAndExecuteTool.js';
import { GenerateCodeTool } from '../tools/GenerateCodeTool.js';
import { GetStatsTool } from '../tools/GetStatsTool.js';
import {
  SANDBOX_DTS_URI,
  buildPromptContent,
  generateSandboxDts,
} from '../tools/SandboxGuide.js';
import type { SandboxTool } from '../tools/SandboxTool.js';
import { ValidateTaskTool } from '../tools/ValidateTaskTool.js';

/**
 * Registers the sandbox tools, the `sandbox-guide` prompt and the guest type
 * definitions resource.
 */
export class SandboxToolsPlugin implements MCPPlugin {
  public readonly name = 'SandboxToolsPlugin';

  private logger?: Logger;
  private commands: SandboxTool[] = [];
  private commandMap: Map<string, SandboxTool> = new Map();

  constructor(private readonly service: CodingService) {}

  private createToolInstances(): SandboxTool[] {
    return [
      new ExecuteCodeTool(this.service),
      new GenerateCodeTool(this.service),
      new GenerateAndExecuteTool(this.service),
      new ValidateTaskTool(this.service),
      new GetStatsTool(this.service),
    ];
  }

  async initialize(server: MCPServer): Promise<void> {
    this.logger = server.getLogger();

    try {
      this.commands = this.createToolInstances();
      this.commandMap.clear();
      for (const command of this.commands) {
        this.commandMap.set(command.tool.name, command);
        server.registerTool(command.tool, (params) => command.execute(params));
      }

      const stats = this.service.stats();
      server.registerResource(
        {
          uri: SANDBOX_DTS_URI,
          name: 'Sandbox Type Definitions',
          mimeType: 'application/typescript',
        },
        generateSandboxDts(stats.allowedImports),
      );

      server.registerPrompt({
        name: 'sandbox-guide',
        description: 'Explains the sandbox limits, globals and importable modules.',
        arguments: [],
        getMessages: async () => [
          {
            role: 'user',
            content: { type: 'text', text: buildPromptContent(this.service.stats()) },
          },
        ],
      });

      this.logger.info(`${this.name} initialized with ${this.commands.length} tools.`);
    } catch (error) {
      this.logger.error(`Failed to initialize ${this.name}`, error);
      throw error;
    }
  }

  getToolFunction(toolName: string): ToolHandler | undefined {
    const command = this.commandMap.get(toolName);
    if (!command) return undefined;
    return (params) => command.execute(params);
  }

  async shutdown(): Promise<void> {
    this.commandMap.clear();
    this.commands = [];
  }
}
