import 'dotenv/config'; // Load environment variables from .env file
import { loadConfig } from './config.js';
import { buildServer } from './server.js';
import { getErrorMessage } from './utils/error-utils.js';

async function start(): Promise<void> {
  const config = loadConfig(process.env);
  const { server } = await buildServer(config);

  const shutdown = async (signal: string) => {
    server.log.info(`${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      process.exit(0);
    } catch (error) {
      server.log.error(`Failed to close server: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await server.listen({ port: config.port, host: config.host });

    server.log.info(`Potion Exchange running on ${config.host}:${config.port}`);
    server.log.info(`REST API: http://${config.host}:${config.port}/api`);
    server.log.info(`API Documentation: http://${config.host}:${config.port}/docs`);
  } catch (error) {
    server.log.error(`Failed to start server: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

start().catch((error: unknown) => {
  console.error(`Failed to start server: ${getErrorMessage(error)}`);
  process.exit(1);
});
