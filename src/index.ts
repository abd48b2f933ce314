#!/usr/bin/env node
/**
 * Snippet Sandbox MCP Server
 * Main entry point for the Model Context Protocol server
 *
 * Exposes execute_code, generate_code, generate_and_execute, validate_task and
 * get_stats over stdio. Code generation is enabled when OPENAI_API_KEY is set.
 */

import { CodingService } from './agent/CodingService.js';
import { OpenAICodeGenerator } from './agent/generator/CodeGenerator.js';
import { SandboxToolsPlugin } from './plugins/SandboxToolsPlugin.js';
import { ExecutionEngine } from './sandbox/ExecutionEngine.js';
import { MCPServer } from './server/MCPServer.js';
import { loadSandboxConfig, type SandboxConfig } from './utils/SandboxConfig.js';

export { VERSION } from './version.js';

export async function main(): Promise<void> {
  console.error(`Snippet Sandbox MCP Server - Starting...`);

  let config: SandboxConfig;
  try {
    config = loadSandboxConfig();
  } catch (error) {
    console.error('Failed to load sandbox configuration:', error);
    process.exit(1);
  }

  try {
    const server = new MCPServer();
    const logger = server.getLogger();
    logger.info('Sandbox configuration loaded', {
      source: config.source ?? 'defaults',
      maxExecutionSeconds: config.policy.maxExecutionSeconds,
      maxOutputChars: config.policy.maxOutputChars,
      maxMemoryMb: config.policy.maxMemoryMb,
    });

    const engine = new ExecutionEngine({ policy: config.policy, logger });
    const generator = OpenAICodeGenerator.fromApiKey(
      config.apiKey,
      config.generator,
      [...config.policy.allowedImports],
      logger,
    );
    const service = new CodingService({ engine, generator, logger });

    await server.loadPlugin(new SandboxToolsPlugin(service));
    await server.start();
    console.error(`Snippet Sandbox MCP is running. Waiting for connections...`);
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}
