import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CodingService, GenerationError } from '../agent/CodingService.js';
import type { SandboxTool } from './SandboxTool.js';

export const taskInputSchema = z.object({
  taskDescription: z.string().describe('Natural language description of the programming task'),
});

export const EMPTY_TASK_MESSAGE = 'Please provide a task description';

export const taskInputJsonSchema: Tool['inputSchema'] = {
  type: 'object',
  properties: {
    taskDescription: {
      type: 'string',
      description: 'Natural language description of the programming task',
    },
  },
  required: ['taskDescription'],
};

export interface GenerationFailureResponse {
  success: false;
  error: string;
  kind?: GenerationError['kind'];
  suggestions?: string[];
}

export function toFailureResponse(error: GenerationError): GenerationFailureResponse {
  return {
    success: false,
    error: error.message,
    kind: error.kind,
    suggestions: error.suggestions,
  };
}

export type GenerateCodeResponse =
  | { success: true; code: string; explanation: string; model: string; task: string }
  | GenerationFailureResponse;

/**
 * Turns a task description into a snippet without running it.
 */
export class GenerateCodeTool implements SandboxTool {
  public readonly tool: Tool = {
    name: 'generate_code',
    description:
      'Generate a JavaScript snippet for a natural language task. The snippet targets the sandbox used by execute_code.',
    inputSchema: taskInputJsonSchema,
  };

  constructor(private readonly service: CodingService) {}

  async execute(rawParams: unknown): Promise<GenerateCodeResponse> {
    const { taskDescription } = taskInputSchema.parse(rawParams);
    const task = taskDescription.trim();
    if (!task) {
      return { success: false, error: EMPTY_TASK_MESSAGE };
    }

    const outcome = await this.service.generate(task);
    if (!outcome.success) {
      return toFailureResponse(outcome.error);
    }

    return {
      success: true,
      code: outcome.generation.sourceText,
      explanation: outcome.generation.explanation,
      model: outcome.generation.model,
      task,
    };
  }
}
