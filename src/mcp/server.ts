import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export const MCP_SERVER_NAME = 'docs-edit-gateway';
export const MCP_SERVER_VERSION = '1.0.0';

export function createMcpServer(): McpServer {
  return new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION
  });
}
