#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';

import { LibraryManager } from './LibraryManager.js';
import { errorMessage } from './errors.js';
import { callTool, listTools } from './tools.js';
import { logger } from './utils/logger.js';

const SERVER_NAME = 'smart-library';
const SERVER_VERSION = '1.0.0';

const RESOURCES = [
  { uri: 'library://stats', name: 'Library statistics', mimeType: 'application/json' },
  { uri: 'library://tasks', name: 'Task queue in serving order', mimeType: 'application/json' },
  { uri: 'library://recent', name: 'Recently viewed items', mimeType: 'application/json' },
];

export function readResource(manager: LibraryManager, uri: string): unknown {
  switch (uri) {
    case 'library://stats':
      return manager.getStatistics();
    case 'library://tasks':
      return manager.listTasks();
    case 'library://recent':
      return manager.listRecentlyViewed();
    default:
      throw new McpError(ErrorCode.InvalidRequest, `Unknown resource: ${uri}`);
  }
}

class SmartLibraryServer {
  private server: Server;
  private library: LibraryManager;
  private isShuttingDown = false;

  constructor() {
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {}, resources: {} } }
    );

    logger.info('Initializing smart-library MCP server');
    this.library = LibraryManager.open({ dataDir: process.env.SMART_LIBRARY_DIR });
    this.setupServerEventLogging();
    this.setupGracefulShutdown();
    this.setupHandlers();
    logger.info(`Server initialization complete (data dir: ${this.library.dataDir})`);
  }

  private setupServerEventLogging(): void {
    this.server.onclose = () => {
      logger.info('MCP client disconnected');
    };
    this.server.onerror = (error: Error) => {
      logger.error(`MCP server error: ${error.message}`);
    };
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string, exitCode = 0) => {
      if (this.isShuttingDown) return;
      this.isShuttingDown = true;
      logger.info(`Received ${signal}, saving library before exit`);
      try {
        this.library.save();
        process.exit(exitCode);
      } catch (error) {
        logger.error(`Error during shutdown: ${errorMessage(error)}`);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    process.on('uncaughtException', error => {
      logger.error(`Uncaught exception: ${error.message}`, error.stack);
      shutdown('uncaughtException', 1);
    });
    process.on('unhandledRejection', reason => {
      logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
      shutdown('unhandledRejection', 1);
    });
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: listTools() }));

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      const startTime = Date.now();
      logger.debug(`Tool called: ${name}`);
      const result = callTool({ manager: this.library, autoSave: true }, name, args);
      logger.debug(`Tool ${name} completed in ${Date.now() - startTime}ms`);
      return result;
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: RESOURCES }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async request => {
      const { uri } = request.params;
      try {
        const body = readResource(this.library, uri);
        return { contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(body, null, 2) }] };
      } catch (error) {
        if (error instanceof McpError) throw error;
        logger.error(`Resource access failed (${uri}): ${errorMessage(error)}`);
        throw new McpError(ErrorCode.InternalError, `Resource access failed: ${errorMessage(error)}`);
      }
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    logger.info('Connecting to MCP transport (stdio)');
    await this.server.connect(transport);
    logger.info('smart-library MCP server is ready');
  }
}

if (require.main === module) {
  const server = new SmartLibraryServer();
  server.run().catch(error => {
    logger.error(`Failed to start MCP server: ${errorMessage(error)}`);
    process.exit(1);
  });
}
