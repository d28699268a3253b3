import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { registerTools, handleToolCall } from './tools/index.js';
import { SERVER_VERSION } from './tools/health.js';
import { type ServiceContainer, getContainer } from './services/container.js';
import { logger } from './utils/logger.js';

/**
 * Design Refiner MCP Server
 *
 * Iteratively refines UML diagrams and requirements documents with an LLM in the loop.
 */
export class DesignRefinerServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(container: ServiceContainer = getContainer()) {
    this.server = new Server(
      {
        name: 'design-refiner',
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.container = container;
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: registerTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(name, args ?? {}, this.container.getAll());
    });
  }

  async start(): Promise<void> {
    // Config errors should surface at startup, not on the first tool call
    const { config } = this.container.getAll();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('Design refiner MCP server started', {
      version: SERVER_VERSION,
      outputDir: config.outputDir,
      model: config.model,
    });
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
