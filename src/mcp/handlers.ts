import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerDocsHandlers, type DocsContextFactory } from '../docs/handlers.js';
import { createMcpServer } from './server.js';

/**
 * Register MCP tool handlers
 */
export function registerMcpHandlers(server: McpServer, createContext?: DocsContextFactory): void {
  registerDocsHandlers(server, createContext);
}

/**
 * New MCP server with every tool registered
 */
export function buildMcpServer(createContext?: DocsContextFactory): McpServer {
  const server = createMcpServer();
  registerMcpHandlers(server, createContext);
  return server;
}
