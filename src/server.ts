/**
 * Senso MCP Server
 * Exposes the Senso knowledge base to MCP hosts over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { SensoConfig } from './config.js';
import { handleToolCall } from './dispatcher.js';
import { logger, logStartup } from './logger.js';
import { SensoClient } from './senso-client.js';
import { TOOLS } from './tools.js';

export class SensoServer {
  private server: Server;
  private client: SensoClient;

  constructor(private readonly config: SensoConfig, client?: SensoClient) {
    this.client = client ?? new SensoClient(config);
    this.server = new Server(
      {
        name: config.serverName,
        version: config.serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers() {
    // Handle tool list requests
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    // Handle tool execution
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(name, args, { client: this.client });
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    logStartup({
      server: this.config.serverName,
      version: this.config.serverVersion,
      api_base: this.config.apiBase,
      timeout_ms: this.config.timeoutMs
    });

    await this.connect(new StdioServerTransport());
    logger.info({ action: 'transport_ready', transport: 'stdio' }, `${this.config.serverName} running on stdio transport`);
  }
}

export default SensoServer;
