import OpenAI from 'openai';
import winston, { type Logger } from 'winston';
import { GeneratorUnavailableError } from '../../sandbox/errors.js';
import { parseGenerationResponse } from './ResponseParser.js';

export interface GenerationResult {
  sourceText: string;
  explanation: string;
  model: string;
}

/**
 * Turns a task description into a snippet. Implementations throw
 * GeneratorUnavailableError when they cannot produce one.
 */
export interface CodeGenerator {
  readonly model: string;
  generate(taskDescription: string): Promise<GenerationResult>;
}

export interface ChatRequest {
  system: string;
  user: string;
}

/** One chat-completion round trip returning the reply text. */
export type ChatCompletion = (request: ChatRequest) => Promise<string>;

export interface GeneratorSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  baseUrl?: string;
}

export interface OpenAICodeGeneratorOptions extends GeneratorSettings {
  /** Module names the snippet may import, listed in the system prompt. */
  allowedImports: readonly string[];
  complete: ChatCompletion;
  logger?: Logger;
  maxRetries?: number;
  retryDelayMs?: number;
}

const DEFAULT_MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503]);

export const GENERATOR_SUGGESTIONS = [
  'Check that OPENAI_API_KEY is set and valid',
  'Try again in a few moments',
];

export function buildSystemPrompt(allowedImports: readonly string[]): string {
  const modules = allowedImports.length > 0 ? allowedImports.join(', ') : 'none';
  return `You are an expert JavaScript programmer. Your job is to generate clean, efficient and well-commented JavaScript snippets from natural language descriptions.

The snippet runs in a restricted sandbox:
- Write output with print(...values) or console.log(...values).
- Only these modules can be imported: ${modules}. Import them with require('name') or an import statement.
- There is no file system, network, process or environment access.
- setTimeout and setInterval are unavailable; use \`await require('timers').sleep(ms)\` to wait.
- Top-level await is allowed.

Response format:
\`\`\`javascript
// Your generated JavaScript code here
\`\`\`

Explanation: Brief explanation of what the code does and how it works.`;
}

export function buildUserPrompt(taskDescription: string): string {
  return `Generate JavaScript code for the following task:

Task: ${taskDescription}

Please provide:
1. Clean, working JavaScript code that accomplishes the task and prints its result
2. Appropriate comments explaining the code
3. A brief explanation after the code block`;
}

/**
 * Chat-completion adapter over the official `openai` client.
 */
export function createOpenAIChatCompletion(
  client: OpenAI,
  settings: GeneratorSettings,
): ChatCompletion {
  return async ({ system, user }) => {
    const response = await client.chat.completions.create({
      model: settings.model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      temperature: settings.temperature,
      max_tokens: settings.maxTokens,
    });
    return response.choices[0]?.message?.content ?? '';
  };
}

/**
 * OpenAI client without built-in retries; the generator retries with its own backoff.
 */
export function createOpenAIClient(apiKey: string, baseUrl?: string): OpenAI {
  return new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
}

export class OpenAICodeGenerator implements CodeGenerator {
  public readonly model: string;
  private readonly logger: Logger;
  private readonly systemPrompt: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: OpenAICodeGeneratorOptions) {
    this.model = options.model;
    this.logger = options.logger ?? winston.createLogger({ silent: true });
    this.systemPrompt = buildSystemPrompt(options.allowedImports);
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? BASE_DELAY_MS;
  }

  /**
   * Build a generator backed by the OpenAI API, or null when no API key is configured.
   */
  static fromApiKey(
    apiKey: string | undefined,
    settings: GeneratorSettings,
    allowedImports: readonly string[],
    logger?: Logger,
  ): OpenAICodeGenerator | null {
    if (!apiKey) {
      logger?.warn('OPENAI_API_KEY is not set; code generation is disabled');
      return null;
    }
    const client = createOpenAIClient(apiKey, settings.baseUrl);
    logger?.info('Code generator initialized', { model: settings.model });
    return new OpenAICodeGenerator({
      ...settings,
      allowedImports,
      complete: createOpenAIChatCompletion(client, settings),
      logger,
    });
  }

  public async generate(taskDescription: string): Promise<GenerationResult> {
    const request: ChatRequest = {
      system: this.systemPrompt,
      user: buildUserPrompt(taskDescription),
    };

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        this.logger.debug('Requesting code generation', {
          model: this.model,
          taskLength: taskDescription.length,
          attempt,
        });

        const content = await this.options.complete(request);
        const { sourceText, explanation } = parseGenerationResponse(content);

        this.logger.debug('Received generated code', { codeLength: sourceText.length });
        return { sourceText, explanation, model: this.model };
      } catch (error) {
        const statusCode = getStatusCode(error);
        const isRetryable = statusCode !== null && RETRYABLE_STATUS_CODES.has(statusCode);
        const isLastAttempt = attempt >= this.maxRetries;

        if (!isRetryable || isLastAttempt) {
          this.logger.error('Code generation request failed', { attempt, statusCode });
          throw new GeneratorUnavailableError(
            `Code generation failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
            GENERATOR_SUGGESTIONS,
            { statusCode },
          );
        }

        const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
        this.logger.warn('Code generation request failed, retrying', {
          attempt,
          statusCode,
          delayMs: delay,
        });
        await sleep(delay);
      }
    }

    throw new GeneratorUnavailableError(
      'Code generation failed after all retries',
      GENERATOR_SUGGESTIONS,
    );
  }
}

function getStatusCode(error: unknown): number | null {
  if (error !== null && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') return status;
  }
  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
