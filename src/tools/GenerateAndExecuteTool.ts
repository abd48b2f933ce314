import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { CodingService } from '../agent/CodingService.js';
import type { ExecutionResult } from '../sandbox/types.js';
import {
  EMPTY_TASK_MESSAGE,
  taskInputJsonSchema,
  taskInputSchema,
  toFailureResponse,
  type GenerationFailureResponse,
} from './GenerateCodeTool.js';
import type { SandboxTool } from './SandboxTool.js';

export type GenerateAndExecuteResponse =
  | {
      success: true;
      code: string;
      explanation: string;
      model: string;
      task: string;
      execution: ExecutionResult;
    }
  | GenerationFailureResponse;

export class GenerateAndExecuteTool implements SandboxTool {
  public readonly tool: Tool = {
    name: 'generate_and_execute',
    description:
      'Generate a JavaScript snippet for a task and run it in the sandbox. Generated code passes the same policy checks as execute_code.',
    inputSchema: taskInputJsonSchema,
  };

  constructor(private readonly service: CodingService) {}

  async execute(rawParams: unknown): Promise<GenerateAndExecuteResponse> {
    const { taskDescription } = taskInputSchema.parse(rawParams);
    const task = taskDescription.trim();
    if (!task) {
      return { success: false, error: EMPTY_TASK_MESSAGE };
    }

    const outcome = await this.service.generateAndExecute(task);
    if (!outcome.success) {
      return toFailureResponse(outcome.error);
    }

    return {
      success: true,
      code: outcome.generation.sourceText,
      explanation: outcome.generation.explanation,
      model: outcome.generation.model,
      task,
      execution: outcome.execution,
    };
  }
}
