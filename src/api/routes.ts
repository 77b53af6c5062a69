import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  DuplicateKeyError,
  InvalidArgumentError,
  KeyNotFoundError,
  OutOfRangeError,
  TableFullError
} from '../core/errors.js';
import { GameNotFoundError, GameRegistry } from '../services/game-registry.js';
import { GameLogger } from '../services/game-logger.js';
import { getErrorMessage } from '../utils/error-utils.js';
import type { PotionDefinition, PotionStock, PotionValuation } from '../types/potion.js';

interface GameParams {
  id: string;
}

interface RankParams extends GameParams {
  k: number;
}

interface CreateGameBody {
  seed?: number;
}

interface LoadPotionsBody {
  potions: PotionDefinition[];
}

interface StockBody {
  stock: PotionStock[];
}

interface VendorsBody {
  count: number;
}

interface SolveBody {
  valuations: PotionValuation[];
  startingMoney: number[];
}

export interface RouteOptions {
  apiKey?: string | undefined;   // Required on mutating routes when set
  rateLimitMax?: number;         // Requests per minute on public routes
}

/**
 * Maps domain errors to HTTP status codes
 */
export function statusForError(error: unknown): number {
  if (error instanceof GameNotFoundError || error instanceof KeyNotFoundError) return 404;
  if (error instanceof DuplicateKeyError) return 409;
  if (
    error instanceof OutOfRangeError ||
    error instanceof InvalidArgumentError ||
    error instanceof TableFullError
  ) {
    return 400;
  }
  return 500;
}

// API key authentication hook; open when no key is configured
function createApiKeyValidator(apiKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!apiKey) return;
    if (request.headers['x-api-key'] !== apiKey) {
      return reply.code(401).send({ error: 'Invalid or missing API key' });
    }
  };
}

export function registerRoutes(
  fastify: FastifyInstance,
  registry: GameRegistry,
  gameLogger: GameLogger,
  options: RouteOptions = {}
): void {
  const validateApiKey = createApiKeyValidator(options.apiKey);

  const publicRateLimit = {
    max: options.rateLimitMax ?? 100,
    timeWindow: '1 minute'
  };

  const sendError = (reply: FastifyReply, error: unknown, fallback: string) => {
    const status = statusForError(error);
    if (status === 500) {
      fastify.log.error(`${fallback}: ${getErrorMessage(error)}`);
      return reply.code(500).send({ error: fallback });
    }
    fastify.log.warn(getErrorMessage(error));
    return reply.code(status).send({ error: getErrorMessage(error) });
  };

  // Schema definitions for OpenAPI
  const errorSchema = {
    type: 'object',
    properties: {
      error: { type: 'string', description: 'Error message' },
      message: { type: 'string', description: 'Validation detail' }
    }
  };

  const gameParamsSchema = {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'string', description: 'Game identifier' }
    }
  };

  const gameSummarySchema = {
    type: 'object',
    properties: {
      id: { type: 'string', description: 'Game identifier' },
      seed: { type: 'integer', description: 'Random generator seed' },
      createdAt: { type: 'number', description: 'Creation timestamp' },
      potionCount: { type: 'integer', description: 'Potions in the catalogue' },
      inventorySize: { type: 'integer', description: 'Potions in stock' }
    }
  };

  const potionStockSchema = {
    type: 'object',
    required: ['name', 'litres'],
    properties: {
      name: { type: 'string', description: 'Potion name' },
      litres: { type: 'number', description: 'Litres in stock' }
    }
  };

  const inventoryEntrySchema = {
    type: 'object',
    properties: {
      buyPrice: { type: 'number', description: 'Buy price per litre' },
      name: { type: 'string', description: 'Potion name' },
      litres: { type: 'number', description: 'Litres in stock' }
    }
  };

  const inventorySchema = {
    type: 'object',
    properties: {
      inventory: { type: 'array', items: inventoryEntrySchema, description: 'Stock, cheapest first' }
    }
  };

  const gameScopedErrors = {
    400: errorSchema,
    401: errorSchema,
    404: errorSchema,
    500: errorSchema
  };

  fastify.get('/api/health', {
    config: { rateLimit: publicRateLimit },
    schema: {
      tags: ['System'],
      summary: 'Health check',
      description: 'Check system health status',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['ok'], description: 'Health status' },
            timestamp: { type: 'number', description: 'Check timestamp' },
            games: { type: 'integer', description: 'Live games' }
          }
        }
      }
    }
  }, async (_request, reply) => {
    return reply.status(200).send({
      status: 'ok',
      timestamp: Date.now(),
      games: registry.getGameCount()
    });
  });

  fastify.post<{ Body: CreateGameBody | undefined }>('/api/games', {
    preHandler: validateApiKey,
    schema: {
      tags: ['Games'],
      summary: 'Create a game',
      description: 'Start a new game session with its own random generator (requires API key when configured)',
      security: [{ apiKey: [] }],
      // Optional body; a missing one uses the default seed
      body: {
        properties: {
          seed: { type: 'integer', minimum: 0, description: 'Random generator seed' }
        }
      },
      response: {
        201: {
          type: 'object',
          properties: {
            game: gameSummarySchema
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      const session = registry.createGame(request.body?.seed);
      return reply.code(201).send({ game: registry.summarize(session) });
    } catch (error) {
      return sendError(reply, error, 'Failed to create game');
    }
  });

  fastify.get('/api/games', {
    config: { rateLimit: publicRateLimit },
    schema: {
      tags: ['Games'],
      summary: 'List games',
      response: {
        200: {
          type: 'object',
          properties: {
            games: { type: 'array', items: gameSummarySchema }
          }
        }
      }
    }
  }, async (_request, reply) => {
    return reply.send({ games: registry.listGames() });
  });

  fastify.delete<{ Params: GameParams }>('/api/games/:id', {
    preHandler: validateApiKey,
    schema: {
      tags: ['Games'],
      summary: 'Remove a game',
      description: 'Remove a game and its logs',
      security: [{ apiKey: [] }],
      params: gameParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            message: { type: 'string', description: 'Success message' }
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      registry.removeGame(request.params.id);
      return reply.send({ message: 'Game removed' });
    } catch (error) {
      return sendError(reply, error, 'Failed to remove game');
    }
  });

  fastify.put<{ Params: GameParams; Body: LoadPotionsBody }>('/api/games/:id/potions', {
    preHandler: validateApiKey,
    schema: {
      tags: ['Potions'],
      summary: 'Load the potion catalogue',
      description: 'Replace every potion available over the course of the game',
      security: [{ apiKey: [] }],
      params: gameParamsSchema,
      body: {
        type: 'object',
        required: ['potions'],
        properties: {
          potions: {
            type: 'array',
            items: {
              type: 'object',
              required: ['category', 'name', 'buyPrice'],
              properties: {
                category: { type: 'string', description: 'Potion category' },
                name: { type: 'string', description: 'Potion name' },
                buyPrice: { type: 'number', description: 'Price vendors pay per litre' }
              }
            }
          }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            loaded: { type: 'integer', description: 'Potions loaded' },
            tableSize: { type: 'integer', description: 'Hash table size' }
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      const game = registry.getGame(request.params.id);
      game.setTotalPotionData(request.body.potions);
      return reply.send({
        loaded: request.body.potions.length,
        tableSize: game.getTableStatistics().tableSize
      });
    } catch (error) {
      return sendError(reply, error, 'Failed to load potions');
    }
  });

  fastify.get<{ Params: GameParams }>('/api/games/:id/potions/statistics', {
    config: { rateLimit: publicRateLimit },
    schema: {
      tags: ['Potions'],
      summary: 'Catalogue hash table statistics',
      params: gameParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            conflictCount: { type: 'integer', description: 'Probes that met a foreign key' },
            probeTotal: { type: 'integer', description: 'Slots stepped over in total' },
            probeMax: { type: 'integer', description: 'Longest probe chain' },
            entryCount: { type: 'integer', description: 'Potions stored' },
            tableSize: { type: 'integer', description: 'Hash table size' }
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(registry.getGame(request.params.id).getTableStatistics());
    } catch (error) {
      return sendError(reply, error, 'Failed to get statistics');
    }
  });

  fastify.post<{ Params: GameParams; Body: StockBody }>('/api/games/:id/inventory', {
    preHandler: validateApiKey,
    schema: {
      tags: ['Inventory'],
      summary: 'Stock the inventory',
      description: 'Add litres of catalogue potions; a potion replaces any stocked potion with the same buy price',
      security: [{ apiKey: [] }],
      params: gameParamsSchema,
      body: {
        type: 'object',
        required: ['stock'],
        properties: {
          stock: { type: 'array', items: potionStockSchema }
        }
      },
      response: {
        200: inventorySchema,
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      const game = registry.getGame(request.params.id);
      game.addPotionsToInventory(request.body.stock);
      return reply.send({ inventory: game.getInventory() });
    } catch (error) {
      return sendError(reply, error, 'Failed to stock inventory');
    }
  });

  fastify.get<{ Params: GameParams }>('/api/games/:id/inventory', {
    config: { rateLimit: publicRateLimit },
    schema: {
      tags: ['Inventory'],
      summary: 'Get the inventory',
      params: gameParamsSchema,
      response: {
        200: inventorySchema,
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send({ inventory: registry.getGame(request.params.id).getInventory() });
    } catch (error) {
      return sendError(reply, error, 'Failed to get inventory');
    }
  });

  fastify.get<{ Params: RankParams }>('/api/games/:id/inventory/rank/:k', {
    config: { rateLimit: publicRateLimit },
    schema: {
      tags: ['Inventory'],
      summary: 'Get the k-th most expensive potion in stock',
      params: {
        type: 'object',
        required: ['id', 'k'],
        properties: {
          id: { type: 'string', description: 'Game identifier' },
          k: { type: 'integer', description: 'Rank, 1 is the most expensive' }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            entry: {
              type: 'object',
              properties: {
                rank: { type: 'integer', description: 'Rank, 1 is the most expensive' },
                ...inventoryEntrySchema.properties
              }
            }
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      const { id, k } = request.params;
      return reply.send({ entry: registry.getGame(id).getInventoryEntryByRank(k) });
    } catch (error) {
      return sendError(reply, error, 'Failed to get inventory entry');
    }
  });

  fastify.post<{ Params: GameParams; Body: VendorsBody }>('/api/games/:id/vendors', {
    preHandler: validateApiKey,
    schema: {
      tags: ['Game'],
      summary: 'Choose potions for vendors',
      description: 'Each vendor picks a random rank of the remaining stock',
      security: [{ apiKey: [] }],
      params: gameParamsSchema,
      body: {
        type: 'object',
        required: ['count'],
        properties: {
          count: { type: 'integer', description: 'Number of vendors' }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            selling: { type: 'array', items: potionStockSchema, description: 'Potion chosen by each vendor' }
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      const selling = registry.getGame(request.params.id).choosePotionsForVendors(request.body.count);
      return reply.send({ selling });
    } catch (error) {
      return sendError(reply, error, 'Failed to choose vendors');
    }
  });

  fastify.post<{ Params: GameParams; Body: SolveBody }>('/api/games/:id/solve', {
    preHandler: validateApiKey,
    schema: {
      tags: ['Game'],
      summary: 'Solve the game',
      description: 'Best money reachable by trading for each starting amount',
      security: [{ apiKey: [] }],
      params: gameParamsSchema,
      body: {
        type: 'object',
        required: ['valuations', 'startingMoney'],
        properties: {
          valuations: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name', 'sellPrice'],
              properties: {
                name: { type: 'string', description: 'Potion name' },
                sellPrice: { type: 'number', description: 'Price adventurers pay per litre' }
              }
            }
          },
          startingMoney: { type: 'array', items: { type: 'number' }, description: 'Money at the start of each day' }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            results: { type: 'array', items: { type: 'number' }, description: 'Money at the end of each day' }
          }
        },
        ...gameScopedErrors
      }
    }
  }, async (request, reply) => {
    try {
      const { valuations, startingMoney } = request.body;
      const results = registry.getGame(request.params.id).solveGame(valuations, startingMoney);
      return reply.send({ results });
    } catch (error) {
      return sendError(reply, error, 'Failed to solve game');
    }
  });

  fastify.get<{ Params: GameParams }>('/api/games/:id/logs', {
    config: { rateLimit: publicRateLimit },
    schema: {
      tags: ['Game'],
      summary: 'Get game logs',
      description: 'Retrieve the event log of a game in CSV format',
      params: gameParamsSchema,
      response: {
        200: {
          type: 'string',
          description: 'Game logs in CSV format'
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { id } = request.params;
    const logs = gameLogger.getLogsForGameAsCSV(id);

    if (!logs) {
      return reply.code(404).send({ error: 'Logs not found for this game' });
    }

    reply.header('Content-Type', 'text/csv');
    reply.header('Content-Disposition', `attachment; filename=game-${id}-logs.csv`);
    return reply.send(logs);
  });
}
