import winston, { type Logger } from 'winston';
import type { ExecutionEngine } from '../sandbox/ExecutionEngine.js';
import { GeneratorUnavailableError } from '../sandbox/errors.js';
import type { ExecutionResult } from '../sandbox/types.js';
import type { CodeGenerator, GenerationResult } from './generator/CodeGenerator.js';
import { validateTaskDescription, type TaskValidation } from './TaskValidator.js';

export interface GenerationError {
  kind: 'GeneratorUnavailable' | 'InvalidTask';
  message: string;
  suggestions: string[];
}

export type GenerationOutcome =
  | { success: true; generation: GenerationResult }
  | { success: false; error: GenerationError };

export type GenerateAndExecuteOutcome =
  | { success: true; generation: GenerationResult; execution: ExecutionResult }
  | { success: false; error: GenerationError };

export interface SandboxStats {
  maxExecutionTime: number;
  maxOutputLength: number;
  allowedImports: string[];
  securityLevel: 'restricted';
  generatorAvailable: boolean;
  timestamp: string;
}

export interface CodingServiceOptions {
  engine: ExecutionEngine;
  generator?: CodeGenerator | null;
  logger?: Logger;
  now?: () => Date;
}

export const GENERATOR_NOT_CONFIGURED_MESSAGE =
  'Coding agent not available. Please check your OpenAI API key configuration.';

/**
 * The operations callers reach through the MCP tools.
 */
export class CodingService {
  private readonly engine: ExecutionEngine;
  private readonly generator: CodeGenerator | null;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CodingServiceOptions) {
    this.engine = options.engine;
    this.generator = options.generator ?? null;
    this.logger = options.logger ?? winston.createLogger({ silent: true });
    this.now = options.now ?? (() => new Date());
  }

  public get generatorAvailable(): boolean {
    return this.generator !== null;
  }

  public validate(taskDescription: string): TaskValidation {
    return validateTaskDescription(taskDescription);
  }

  public execute(sourceText: string): Promise<ExecutionResult> {
    return this.engine.execute(sourceText);
  }

  public async generate(taskDescription: string): Promise<GenerationOutcome> {
    const validation = this.validate(taskDescription);
    if (!validation.valid) {
      return {
        success: false,
        error: {
          kind: 'InvalidTask',
          message: validation.message,
          suggestions: validation.suggestions,
        },
      };
    }

    if (!this.generator) {
      return {
        success: false,
        error: {
          kind: 'GeneratorUnavailable',
          message: GENERATOR_NOT_CONFIGURED_MESSAGE,
          suggestions: [],
        },
      };
    }

    try {
      const generation = await this.generator.generate(taskDescription);
      this.logger.info('Generated code for task', {
        model: generation.model,
        codeLength: generation.sourceText.length,
      });
      return { success: true, generation };
    } catch (error) {
      if (error instanceof GeneratorUnavailableError) {
        return {
          success: false,
          error: {
            kind: 'GeneratorUnavailable',
            message: error.message,
            suggestions: error.suggestions,
          },
        };
      }
      this.logger.error('Unexpected code generator failure', { error });
      return {
        success: false,
        error: {
          kind: 'GeneratorUnavailable',
          message: `Code generation failed: ${error instanceof Error ? error.message : String(error)}`,
          suggestions: [],
        },
      };
    }
  }

  /**
   * Generate a snippet and run it. Generated code gets no special trust: it goes
   * through the same pre-check as any other snippet.
   */
  public async generateAndExecute(taskDescription: string): Promise<GenerateAndExecuteOutcome> {
    const outcome = await this.generate(taskDescription);
    if (!outcome.success) {
      return outcome;
    }
    const execution = await this.engine.execute(outcome.generation.sourceText);
    return { success: true, generation: outcome.generation, execution };
  }

  public stats(): SandboxStats {
    const { policy } = this.engine;
    return {
      maxExecutionTime: policy.maxExecutionSeconds,
      maxOutputLength: policy.maxOutputChars,
      allowedImports: [...policy.allowedImports].sort(),
      securityLevel: 'restricted',
      generatorAvailable: this.generatorAvailable,
      timestamp: this.now().toISOString(),
    };
  }
}
