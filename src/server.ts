import fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { registerRoutes } from './api/routes.js';
import { GameLogger } from './services/game-logger.js';
import { GameRegistry } from './services/game-registry.js';
import type { AppConfig } from './config.js';

export interface AppServer {
  server: FastifyInstance;
  registry: GameRegistry;
  gameLogger: GameLogger;
}

/**
 * Creates the Fastify instance with every plugin and route registered
 * Listening is left to the caller
 */
export async function buildServer(config: AppConfig): Promise<AppServer> {
  const server = fastify({
    logger: {
      level: config.logLevel,
      ...(config.prettyLogs ? { transport: { target: 'pino-pretty' } } : {})
    }
  });

  const gameLogger = new GameLogger();
  const registry = new GameRegistry(gameLogger, {
    defaultSeed: config.gameSeed,
    logger: server.log
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    credentials: true
  });
  server.log.debug('CORS registered');

  // Applied per route through route config
  await server.register(rateLimit, {
    global: false,
    max: config.rateLimitMax,
    timeWindow: '1 minute'
  });
  server.log.debug('Rate limiting registered');

  await server.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Potion Exchange API',
        description: 'Potion trading game backed by an order-statistics AVL tree and a linear probing hash table',
        version: '1.0.0',
        license: {
          name: 'MIT',
          url: 'https://opensource.org/licenses/MIT'
        }
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: 'Development server'
        }
      ],
      tags: [
        { name: 'Games', description: 'Game session management' },
        { name: 'Potions', description: 'Potion catalogue' },
        { name: 'Inventory', description: 'Stocked potions' },
        { name: 'Game', description: 'Vendor selection, solving and logs' },
        { name: 'System', description: 'System health' }
      ],
      components: {
        securitySchemes: {
          apiKey: {
            type: 'apiKey',
            in: 'header',
            name: 'X-API-Key'
          }
        }
      }
    }
  });
  server.log.debug('Swagger registered');

  await server.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false
    },
    staticCSP: true
  });
  server.log.debug('Swagger UI registered');

  registerRoutes(server, registry, gameLogger, {
    apiKey: config.apiKey,
    rateLimitMax: config.rateLimitMax
  });
  server.log.debug('Routes registered');

  return { server, registry, gameLogger };
}
