import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { requireAuth } from '../auth/middleware.js';
import { buildMcpServer } from '../mcp/handlers.js';

function methodNotAllowed(reply: FastifyReply): void {
  reply.code(405).header('Allow', 'POST').send({
    jsonrpc: '2.0',
    error: {
      code: -32000,
      message: 'Method not allowed. This server is stateless; send requests with POST.'
    },
    id: null
  });
}

// Stateless Streamable HTTP: every POST gets its own MCP server and
// transport, both closed when the response ends
async function handleStreamableHttpPost(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  const userContext = request.userContext;
  if (!userContext) {
    reply.code(401).send({ error: 'authentication_required', message: 'Missing user context' });
    return;
  }

  const authInfo: AuthInfo = {
    token: userContext.accessToken,
    clientId: 'bearer',
    scopes: []
  };

  const server = buildMcpServer();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined
  });

  reply.raw.on('close', () => {
    void transport.close();
    void server.close();
  });

  reply.hijack();

  try {
    await server.connect(transport);
    await transport.handleRequest(Object.assign(request.raw, { auth: authInfo }), reply.raw, request.body);
  } catch (error) {
    console.error('[MCP] Error handling request:', error);
    if (!reply.raw.headersSent) {
      reply.raw.writeHead(500, { 'Content-Type': 'application/json' });
      reply.raw.end(JSON.stringify({
        jsonrpc: '2.0',
        error: { code: -32603, message: 'Request handling failed' },
        id: null
      }));
    }
  }
}

export async function mcpRoutes(app: FastifyInstance): Promise<void> {
  app.post('/mcp', { preHandler: requireAuth }, handleStreamableHttpPost);

  app.get('/mcp', async (request, reply) => methodNotAllowed(reply));
  app.delete('/mcp', async (request, reply) => methodNotAllowed(reply));
}
