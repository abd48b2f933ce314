import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { CodingService } from '../agent/CodingService.js';
import type { TaskValidation } from '../agent/TaskValidator.js';
import { taskInputJsonSchema, taskInputSchema } from './GenerateCodeTool.js';
import type { SandboxTool } from './SandboxTool.js';

export class ValidateTaskTool implements SandboxTool {
  public readonly tool: Tool = {
    name: 'validate_task',
    description: 'Check whether a task description is specific enough for code generation.',
    inputSchema: taskInputJsonSchema,
  };

  constructor(private readonly service: CodingService) {}

  async execute(rawParams: unknown): Promise<TaskValidation> {
    const { taskDescription } = taskInputSchema.parse(rawParams);
    return this.service.validate(taskDescription);
  }
}
