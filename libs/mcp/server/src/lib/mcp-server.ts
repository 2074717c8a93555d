import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createToolRegistry, ToolRegistry } from '@business-consultant/mcp/tools';

/**
 * Business Metrics MCP Server
 *
 * Provides the metrics engine via Model Context Protocol:
 * - calculate_financial_ratios: CFO ratio set from one period of statements
 * - calculate_marketing_metrics: unit economics from cohort and spend figures
 *
 * stdout carries the protocol, so all logging goes to stderr.
 */
export class BusinessMetricsMCPServer {
  private server: Server;

  constructor(private toolRegistry: ToolRegistry = createToolRegistry()) {
    this.server = new Server(
      {
        name: 'business-metrics-mcp',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
    this.setupErrorHandlers();
  }

  private setupHandlers(): void {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.toolRegistry.getTools(),
    }));

    // Execute tool
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  /**
   * Run a tool, turning failures into `Error: <message>` text content
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    try {
      return await this.toolRegistry.executeTool(name, args);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
      console.error(`[MCP Server] ${name} failed: ${errorMessage}`);
      return {
        content: [
          {
            type: 'text',
            text: `Error: ${errorMessage}`,
          },
        ],
        isError: true,
      };
    }
  }

  private setupErrorHandlers(): void {
    this.server.onerror = (error) => {
      console.error('[MCP Server Error]', error);
    };

    const onSignal = () => {
      this.shutdown().catch((error) => {
        console.error('[MCP Server] Shutdown failed', error);
        process.exit(1);
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  private async shutdown(): Promise<void> {
    console.error('Shutting down MCP server...');
    await this.server.close();
    process.exit(0);
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('Business Metrics MCP Server running on stdio');
  }
}
