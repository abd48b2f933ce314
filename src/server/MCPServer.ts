import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  Tool,
  Resource,
} from '@modelcontextprotocol/sdk/types.js';
import winston from 'winston';
import { VERSION } from '../version.js';

/**
 * Plugin interface for extending MCP server functionality
 */
export interface MCPPlugin {
  name: string;
  initialize(server: MCPServer): Promise<void>;
  shutdown?(): Promise<void>;
}

export type ToolHandler = (params: unknown) => Promise<unknown>;

/**
 * Tool registry entry
 */
interface ToolEntry {
  tool: Tool;
  handler: ToolHandler;
}

/**
 * Resource registry entry; the text is served as-is on read
 */
interface ResourceEntry {
  resource: Resource;
  text: string;
}

/**
 * Prompt registry entry
 */
export interface PromptEntry {
  name: string;
  description?: string;
  arguments?: Array<{ name: string; description?: string; required?: boolean }>;
  getMessages: (
    args?: Record<string, string>,
  ) => Promise<Array<{ role: 'user' | 'assistant'; content: { type: 'text'; text: string } }>>;
}

export interface MCPServerOptions {
  skipTransportErrorHandling?: boolean;
  skipGracefulShutdown?: boolean;
}

type Listener = (...args: unknown[]) => void;

export const SERVER_NAME = 'snippet-sandbox-mcp';

/**
 * MCP server exposing the snippet sandbox over stdio
 */
export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: winston.Logger;
  private tools: Map<string, ToolEntry> = new Map();
  private resources: Map<string, ResourceEntry> = new Map();
  private plugins: Map<string, MCPPlugin> = new Map();
  private prompts: Map<string, PromptEntry> = new Map();
  private isShuttingDown = false;
  private options: MCPServerOptions;
  private eventListeners: Array<{
    target: NodeJS.EventEmitter;
    event: string;
    handler: Listener;
  }> = [];

  constructor(options: MCPServerOptions = {}) {
    this.options = options;
    // Initialize Winston logger
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
      }),
    ];

    // Optional file logging controlled by env
    const isFileLogEnabled =
      process.env.SANDBOX_LOG_ENABLE === 'true' || process.env.SANDBOX_LOG_ENABLE === '1';
    if (isFileLogEnabled) {
      const logFilePath = process.env.SANDBOX_LOG_FILE || 'snippet-sandbox.log';
      transports.push(
        new winston.transports.File({
          filename: logFilePath,
          format: winston.format.json(),
        }),
      );
    }

    this.logger = winston.createLogger({
      level: process.env.SANDBOX_LOG_LEVEL || 'info',
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports,
    });

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
          prompts: {},
        },
      },
    );

    this.transport = new StdioServerTransport();

    // Add custom error handler to the transport (skip in tests)
    if (!options.skipTransportErrorHandling) {
      this.setupTransportErrorHandling();
    }

    this.setupHandlers();

    // Set up graceful shutdown (skip in tests to avoid process listeners)
    if (!this.options.skipGracefulShutdown) {
      this.setupGracefulShutdown();
    }

    this.logger.info('MCPServer initialized');
  }

  /**
   * Add an event listener and track it for cleanup
   */
  private addTrackedListener(target: NodeJS.EventEmitter, event: string, handler: Listener): void {
    target.on(event, handler);
    this.eventListeners.push({ target, event, handler });
  }

  /**
   * Remove all tracked event listeners
   */
  private removeAllListeners(): void {
    for (const { target, event, handler } of this.eventListeners) {
      target.removeListener(event, handler);
    }
    this.eventListeners = [];
  }

  /**
   * Log transport stream errors instead of crashing; a closed stdin ends the session
   */
  private setupTransportErrorHandling(): void {
    this.addTrackedListener(process.stdin, 'error', (error) => {
      this.logger.error('Transport stdin error:', error);
    });

    this.addTrackedListener(process.stdout, 'error', (error) => {
      this.logger.error('Transport stdout error:', error);
    });

    this.addTrackedListener(process.stdin, 'close', () => {
      this.logger.warn('Transport stdin closed, stopping server');
      this.stop().catch((error: unknown) => {
        this.logger.error('Failed to stop MCP server', error);
      });
    });
  }

  /**
   * Set up request handlers for MCP protocol
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = Array.from(this.tools.values()).map((entry) => entry.tool);
      this.logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolEntry = this.tools.get(request.params.name);

      if (!toolEntry) {
        const error = `Tool not found: ${request.params.name}`;
        this.logger.error(error);
        throw new Error(error);
      }

      this.logger.info(`Executing tool: ${request.params.name}`);

      try {
        const result = await toolEntry.handler(request.params.arguments ?? {});
        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        this.logger.error(`Tool execution failed: ${request.params.name}`, error);
        throw error;
      }
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      const resources = Array.from(this.resources.values()).map((entry) => entry.resource);
      this.logger.debug(`Listing ${resources.length} resources`);
      return { resources };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const entry = this.resources.get(request.params.uri);

      if (!entry) {
        const error = `Resource not found: ${request.params.uri}`;
        this.logger.error(error);
        throw new Error(error);
      }

      this.logger.info(`Reading resource: ${request.params.uri}`);
      return {
        contents: [
          {
            uri: request.params.uri,
            mimeType: entry.resource.mimeType,
            text: entry.text,
          },
        ],
      };
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async () => {
      const prompts = Array.from(this.prompts.values()).map((entry) => ({
        name: entry.name,
        description: entry.description,
        arguments: entry.arguments,
      }));
      this.logger.debug(`Listing ${prompts.length} prompts`);
      return { prompts };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
      const promptEntry = this.prompts.get(request.params.name);
      if (!promptEntry) {
        const error = `Prompt not found: ${request.params.name}`;
        this.logger.error(error);
        throw new Error(error);
      }

      this.logger.info(`Getting prompt: ${request.params.name}`);
      const messages = await promptEntry.getMessages(request.params.arguments);
      return {
        description: promptEntry.description,
        messages,
      };
    });
  }

  /**
   * Register a tool with the MCP server
   */
  public registerTool(tool: Tool, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool already registered: ${tool.name}, overwriting`);
    }

    this.tools.set(tool.name, { tool, handler });
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  /**
   * Get all registered tools
   */
  public getTools(): Tool[] {
    return Array.from(this.tools.values()).map((t) => t.tool);
  }

  /**
   * Execute a registered tool directly, bypassing the transport
   */
  public async executeTool(toolName: string, params: unknown): Promise<unknown> {
    const toolEntry = this.tools.get(toolName);
    if (!toolEntry) {
      throw new Error(`Tool not found: ${toolName}`);
    }
    return toolEntry.handler(params);
  }

  /**
   * Register a text resource with the MCP server
   */
  public registerResource(resource: Resource, text: string): void {
    if (this.resources.has(resource.uri)) {
      this.logger.warn(`Resource already registered: ${resource.uri}, overwriting`);
    }

    this.resources.set(resource.uri, { resource, text });
    this.logger.info(`Registered resource: ${resource.uri}`);
  }

  /**
   * Register a prompt with the MCP server
   */
  public registerPrompt(prompt: PromptEntry): void {
    if (this.prompts.has(prompt.name)) {
      this.logger.warn(`Prompt already registered: ${prompt.name}, overwriting`);
    }

    this.prompts.set(prompt.name, prompt);
    this.logger.info(`Registered prompt: ${prompt.name}`);
  }

  /**
   * Load and initialize a plugin
   */
  public async loadPlugin(plugin: MCPPlugin): Promise<void> {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin already loaded: ${plugin.name}`);
    }

    this.logger.info(`Loading plugin: ${plugin.name}`);

    try {
      await plugin.initialize(this);
      this.plugins.set(plugin.name, plugin);
      this.logger.info(`Plugin loaded successfully: ${plugin.name}`);
    } catch (error) {
      this.logger.error(`Failed to load plugin: ${plugin.name}`, error);
      throw error;
    }
  }

  /**
   * Start the MCP server
   */
  public async start(): Promise<void> {
    this.logger.info('Starting MCP server...');

    try {
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  /**
   * Stop the MCP server
   */
  public async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Stopping MCP server...');

    this.removeAllListeners();

    for (const [name, plugin] of this.plugins) {
      if (plugin.shutdown) {
        try {
          await plugin.shutdown();
          this.logger.info(`Plugin shutdown complete: ${name}`);
        } catch (error) {
          this.logger.error(`Plugin shutdown failed: ${name}`, error);
        }
      }
    }

    await this.server.close();
    this.logger.info('MCP server stopped');
  }

  /**
   * Set up graceful shutdown handling
   */
  private setupGracefulShutdown(): void {
    const shutdown = (signal: string): void => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      void this.stop()
        .catch((error: unknown) => {
          this.logger.error('Graceful shutdown failed', error);
        })
        .finally(() => process.exit(0));
    };

    this.addTrackedListener(process, 'SIGINT', () => shutdown('SIGINT'));
    this.addTrackedListener(process, 'SIGTERM', () => shutdown('SIGTERM'));

    this.addTrackedListener(process, 'uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', error);
      shutdown('uncaughtException');
    });

    // Logged only; shutdown is reserved for signals and uncaught exceptions
    this.addTrackedListener(process, 'unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', reason);
    });
  }

  /**
   * Get the logger instance
   */
  public getLogger(): winston.Logger {
    return this.logger;
  }

  /**
   * Get the underlying MCP server instance
   */
  public getServer(): Server {
    return this.server;
  }

  /**
   * Clean up resources and event listeners (useful for tests)
   */
  public cleanup(): void {
    this.removeAllListeners();
  }
}
