import { jest } from '@jest/globals';
import { MCPServer, MCPPlugin } from '../../src/server/MCPServer';
import { Tool } from '@modelcontextprotocol/sdk/types.js';

// Mock winston to avoid file system operations in tests
jest.mock('winston', () => {
  const mockLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  };

  return {
    createLogger: jest.fn(() => mockLogger),
    format: {
      combine: jest.fn(),
      timestamp: jest.fn(),
      json: jest.fn(),
      colorize: jest.fn(),
      simple: jest.fn(),
    },
    transports: {
      Console: jest.fn(),
      File: jest.fn(),
    },
  };
});

// Mock the MCP SDK
jest.mock('@modelcontextprotocol/sdk/server/index.js', () => ({
  Server: jest.fn().mockImplementation(() => ({
    setRequestHandler: jest.fn(),
    connect: jest.fn(),
    close: jest.fn(),
  })),
}));

jest.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: jest.fn(),
}));

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('MCPServer', () => {
  let server: MCPServer;
  let mockConsoleLog: jest.SpiedFunction<typeof console.log>;
  let mockConsoleError: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    jest.clearAllMocks();
    server = new MCPServer({
      skipTransportErrorHandling: true,
      skipGracefulShutdown: true,
    });
    mockConsoleLog = jest.spyOn(console, 'log').mockImplementation(() => {});
    mockConsoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    mockConsoleLog.mockRestore();
    mockConsoleError.mockRestore();

    // Cleanup server resources
    if (server) {
      server.cleanup();
      await server.stop();
    }
  });

  describe('constructor', () => {
    it('should initialize the MCP server correctly', () => {
      expect(server).toBeDefined();
      expect(server.getLogger()).toBeDefined();
      expect(server.getServer()).toBeDefined();
      expect(server.getTools()).toEqual([]);
    });
  });

  describe('registerTool', () => {
    const tool: Tool = {
      name: 'test-tool',
      description: 'A test tool',
      inputSchema: {
        type: 'object',
        properties: {
          param: { type: 'string' },
        },
      },
    };

    it('should register a tool successfully', () => {
      const handler = jest
        .fn<() => Promise<{ result: string }>>()
        .mockResolvedValue({ result: 'success' });

      server.registerTool(tool, handler);

      expect(server.getTools()).toEqual([tool]);
      expect(server.getLogger().info).toHaveBeenCalledWith('Registered tool: test-tool');
    });

    it('should warn when overwriting an existing tool', () => {
      const handler = jest.fn<() => Promise<unknown>>();

      server.registerTool(tool, handler);
      server.registerTool(tool, handler);

      expect(server.getTools()).toHaveLength(1);
      expect(server.getLogger().warn).toHaveBeenCalledWith(
        'Tool already registered: test-tool, overwriting',
      );
    });

    it('should execute a registered tool directly', async () => {
      const handler = jest
        .fn<(params: unknown) => Promise<unknown>>()
        .mockResolvedValue({ result: 'success' });
      server.registerTool(tool, handler);

      await expect(server.executeTool('test-tool', { param: 'x' })).resolves.toEqual({
        result: 'success',
      });
      expect(handler).toHaveBeenCalledWith({ param: 'x' });
    });

    it('should reject unknown tools', async () => {
      await expect(server.executeTool('missing-tool', {})).rejects.toThrow(
        'Tool not found: missing-tool',
      );
    });
  });

  describe('registerResource', () => {
    const resource = {
      uri: 'test://resource',
      name: 'Test Resource',
      description: 'A test resource',
      mimeType: 'text/plain',
    };

    it('should register a resource successfully', () => {
      server.registerResource(resource, 'hello');

      expect(server.getLogger().info).toHaveBeenCalledWith('Registered resource: test://resource');
    });

    it('should warn when overwriting an existing resource', () => {
      server.registerResource(resource, 'hello');
      server.registerResource(resource, 'hello again');

      expect(server.getLogger().warn).toHaveBeenCalledWith(
        'Resource already registered: test://resource, overwriting',
      );
    });
  });

  describe('registerPrompt', () => {
    it('should warn when overwriting an existing prompt', () => {
      const prompt = {
        name: 'test-prompt',
        getMessages: jest.fn(async () => []),
      };

      server.registerPrompt(prompt);
      server.registerPrompt(prompt);

      expect(server.getLogger().info).toHaveBeenCalledWith('Registered prompt: test-prompt');
      expect(server.getLogger().warn).toHaveBeenCalledWith(
        'Prompt already registered: test-prompt, overwriting',
      );
    });
  });

  describe('loadPlugin', () => {
    it('should load a plugin successfully', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'test-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
      };

      await server.loadPlugin(mockPlugin);

      expect(mockPlugin.initialize).toHaveBeenCalledWith(server);
      expect(server.getLogger().info).toHaveBeenCalledWith('Loading plugin: test-plugin');
      expect(server.getLogger().info).toHaveBeenCalledWith(
        'Plugin loaded successfully: test-plugin',
      );
    });

    it('should throw error when loading duplicate plugin', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'test-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
      };

      await server.loadPlugin(mockPlugin);

      await expect(server.loadPlugin(mockPlugin)).rejects.toThrow(
        'Plugin already loaded: test-plugin',
      );
    });

    it('should handle plugin initialization failure', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'failing-plugin',
        initialize: jest
          .fn<(server: MCPServer) => Promise<void>>()
          .mockRejectedValue(new Error('Plugin init failed')),
      };

      await expect(server.loadPlugin(mockPlugin)).rejects.toThrow('Plugin init failed');

      expect(server.getLogger().error).toHaveBeenCalledWith(
        'Failed to load plugin: failing-plugin',
        expect.any(Error),
      );
    });
  });

  describe('start', () => {
    it('should start the server successfully', async () => {
      await server.start();

      expect(server.getServer().connect).toHaveBeenCalled();
      expect(server.getLogger().info).toHaveBeenCalledWith('Starting MCP server...');
      expect(server.getLogger().info).toHaveBeenCalledWith('MCP server started successfully');
    });

    it('should handle start failure', async () => {
      jest.mocked(server.getServer().connect).mockRejectedValue(new Error('Connection failed'));

      await expect(server.start()).rejects.toThrow('Connection failed');

      expect(server.getLogger().error).toHaveBeenCalledWith(
        'Failed to start MCP server',
        expect.any(Error),
      );
    });
  });

  describe('stop', () => {
    it('should stop the server successfully', async () => {
      await server.stop();

      expect(server.getServer().close).toHaveBeenCalled();
      expect(server.getLogger().info).toHaveBeenCalledWith('Stopping MCP server...');
      expect(server.getLogger().info).toHaveBeenCalledWith('MCP server stopped');
    });

    it('should shutdown plugins on stop', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'test-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
        shutdown: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
      };

      await server.loadPlugin(mockPlugin);
      await server.stop();

      expect(mockPlugin.shutdown).toHaveBeenCalled();
      expect(server.getLogger().info).toHaveBeenCalledWith('Plugin shutdown complete: test-plugin');
    });

    it('should handle plugin shutdown failure gracefully', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'failing-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
        shutdown: jest.fn<() => Promise<void>>().mockRejectedValue(new Error('Shutdown failed')),
      };

      await server.loadPlugin(mockPlugin);
      await server.stop();

      expect(server.getLogger().error).toHaveBeenCalledWith(
        'Plugin shutdown failed: failing-plugin',
        expect.any(Error),
      );
    });

    it('should prevent multiple stop calls', async () => {
      await server.stop();
      await server.stop();

      expect(server.getServer().close).toHaveBeenCalledTimes(1);
    });
  });

  describe('graceful shutdown', () => {
    let mockExit: jest.SpiedFunction<typeof process.exit>;

    beforeEach(() => {
      mockExit = jest.spyOn(process, 'exit').mockImplementation(() => undefined as never);

      // Create a new server to register handlers (allow graceful shutdown for testing)
      server = new MCPServer({ skipTransportErrorHandling: true });
    });

    afterEach(() => {
      mockExit.mockRestore();
    });

    it('should handle SIGINT gracefully', async () => {
      const sigintHandler = process.listeners('SIGINT').at(-1);
      expect(sigintHandler).toBeDefined();

      sigintHandler?.('SIGINT');
      await flush();

      expect(server.getLogger().info).toHaveBeenCalledWith(
        'Received SIGINT, initiating graceful shutdown...',
      );
      expect(server.getServer().close).toHaveBeenCalled();
      expect(mockExit).toHaveBeenCalledWith(0);
    });

    it('should handle SIGTERM gracefully', async () => {
      const sigtermHandler = process.listeners('SIGTERM').at(-1);
      expect(sigtermHandler).toBeDefined();

      sigtermHandler?.('SIGTERM');
      await flush();

      expect(server.getLogger().info).toHaveBeenCalledWith(
        'Received SIGTERM, initiating graceful shutdown...',
      );
      expect(mockExit).toHaveBeenCalledWith(0);
    });

    it('should only log unhandled rejections', async () => {
      const rejectionHandler = process.listeners('unhandledRejection').at(-1);
      const reason = new Error('late rejection');

      rejectionHandler?.(reason, Promise.resolve());
      await flush();

      expect(server.getLogger().error).toHaveBeenCalledWith('Unhandled rejection:', reason);
      expect(mockExit).not.toHaveBeenCalled();
    });

    it('should remove its process listeners on cleanup', () => {
      const before = process.listenerCount('SIGINT');

      server.cleanup();

      expect(process.listenerCount('SIGINT')).toBe(before - 1);
    });
  });
});
