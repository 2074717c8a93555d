import { BusinessMetricsMCPServer } from '@business-consultant/mcp/server';

// Bootstrap and run the MCP server
const server = new BusinessMetricsMCPServer();
server.run().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
