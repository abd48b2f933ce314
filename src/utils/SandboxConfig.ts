import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { GeneratorSettings } from '../agent/generator/CodeGenerator.js';
import { ConfigurationError } from '../sandbox/errors.js';
import { PolicySchema, createPolicy, type Policy } from '../sandbox/policy/Policy.js';

export const CONFIG_FILES = ['snippet-sandbox.config.json', 'snippet-sandbox.config.example.json'];

export const SandboxConfigSchema = z.object({
  policy: PolicySchema.default({}),
  generator: z
    .object({
      model: z.string().min(1).default('gpt-3.5-turbo'),
      temperature: z.number().min(0).max(2).default(0.3),
      maxTokens: z.number().int().positive().default(1500),
      baseUrl: z.string().url().optional(),
    })
    .default({}),
});

export type SandboxConfigFile = z.infer<typeof SandboxConfigSchema>;

export interface SandboxConfig {
  policy: Policy;
  generator: GeneratorSettings;
  /** Only ever read from the environment */
  apiKey?: string;
  /** File the settings came from; undefined when defaults were used */
  source?: string;
}

/**
 * Load the sandbox configuration.
 *
 * `SANDBOX_CONFIG` names an explicit file, which must exist. Otherwise the first of
 * CONFIG_FILES found in `cwd` is used, falling back to built-in defaults. Any file
 * that exists but cannot be parsed or validated is a ConfigurationError.
 */
export function loadSandboxConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): SandboxConfig {
  const configPath = resolveConfigPath(cwd, env);
  const raw = configPath ? readConfigFile(configPath) : {};

  const parsed = SandboxConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid sandbox configuration in ${configPath}: ${issues}`, {
      path: configPath,
    });
  }

  return {
    policy: createPolicy(parsed.data.policy),
    generator: parsed.data.generator,
    apiKey: env.OPENAI_API_KEY || undefined,
    source: configPath,
  };
}

function resolveConfigPath(cwd: string, env: NodeJS.ProcessEnv): string | undefined {
  const explicit = env.SANDBOX_CONFIG;
  if (explicit) {
    const configPath = path.resolve(cwd, explicit);
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Sandbox configuration file not found: ${configPath}`, {
        path: configPath,
      });
    }
    return configPath;
  }

  for (const file of CONFIG_FILES) {
    const configPath = path.resolve(cwd, file);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return undefined;
}

function readConfigFile(configPath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read sandbox configuration from ${configPath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { path: configPath },
    );
  }
}
