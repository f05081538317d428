import 'dotenv/config';

import Fastify from 'fastify';
import { serverConfig } from './config/server.js';
import { mcpRoutes } from './routes/mcp.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './mcp/server.js';
import { startMetricsPublishing, stopMetricsPublishing } from './metrics/cloudwatch.js';

const app = Fastify({
  logger: {
    level: serverConfig.logLevel
  }
});

await app.register(mcpRoutes);

app.get('/health', async () => {
  return {
    status: 'ok',
    server: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    timestamp: new Date().toISOString()
  };
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[Server] ${signal} received, shutting down`);
  await app.close();
  await stopMetricsPublishing();
  process.exit(0);
}

process.once('SIGTERM', () => void shutdown('SIGTERM'));
process.once('SIGINT', () => void shutdown('SIGINT'));

try {
  await app.listen({ port: serverConfig.port, host: serverConfig.host });
  startMetricsPublishing();
  console.log(`Server listening on http://${serverConfig.host}:${serverConfig.port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
