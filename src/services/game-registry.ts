import { nanoid } from 'nanoid';
import type { FastifyBaseLogger } from 'fastify';
import { PotionGame } from '../core/potion-game.js';
import { GameLogger } from './game-logger.js';
import type { HashStrategy } from '../types/potion.js';

export class GameNotFoundError extends Error {
  readonly gameId: string;

  constructor(gameId: string) {
    super(`Game ${gameId} not found`);
    this.name = 'GameNotFoundError';
    this.gameId = gameId;
  }
}

export interface GameSession {
  id: string;
  createdAt: number;
  game: PotionGame;
}

export interface GameSummary {
  id: string;
  seed: number;
  createdAt: number;
  potionCount: number;
  inventorySize: number;
}

export interface GameRegistryOptions {
  defaultSeed?: number;
  hashStrategy?: HashStrategy;
  logger?: FastifyBaseLogger;
}

/**
 * Owns every live game and mirrors their events into the GameLogger
 */
export class GameRegistry {
  private readonly games = new Map<string, GameSession>();
  private readonly gameLogger: GameLogger;
  private readonly defaultSeed: number;
  private readonly hashStrategy: HashStrategy;
  private readonly logger: FastifyBaseLogger | undefined;

  constructor(gameLogger: GameLogger, options: GameRegistryOptions = {}) {
    this.gameLogger = gameLogger;
    this.defaultSeed = options.defaultSeed ?? 0;
    this.hashStrategy = options.hashStrategy ?? 'good';
    this.logger = options.logger;
  }

  /**
   * @param seed - Generator seed; the registry default when omitted
   */
  createGame(seed?: number): GameSession {
    const game = new PotionGame({
      seed: seed ?? this.defaultSeed,
      hashStrategy: this.hashStrategy,
      logger: this.logger
    });
    const session: GameSession = { id: nanoid(), createdAt: Date.now(), game };

    this.subscribe(session.id, game);
    this.games.set(session.id, session);

    this.gameLogger.log(session.id, 'GameCreated', { seed: game.getSeed() });
    this.logger?.info(`Created game ${session.id} with seed ${game.getSeed()}`);
    return session;
  }

  /**
   * @throws GameNotFoundError
   */
  getGame(id: string): PotionGame {
    return this.getSession(id).game;
  }

  getSession(id: string): GameSession {
    const session = this.games.get(id);
    if (!session) {
      throw new GameNotFoundError(id);
    }
    return session;
  }

  listGames(): GameSummary[] {
    return Array.from(this.games.values(), session => this.summarize(session));
  }

  summarize(session: GameSession): GameSummary {
    return {
      id: session.id,
      seed: session.game.getSeed(),
      createdAt: session.createdAt,
      potionCount: session.game.getTableStatistics().entryCount,
      inventorySize: session.game.getInventorySize()
    };
  }

  /**
   * Removes a game together with its logs
   * @throws GameNotFoundError
   */
  removeGame(id: string): void {
    const { game } = this.getSession(id);
    game.removeAllListeners();
    this.games.delete(id);
    this.gameLogger.cleanup(id);
    this.logger?.info(`Removed game ${id}`);
  }

  getGameCount(): number {
    return this.games.size;
  }

  private subscribe(id: string, game: PotionGame): void {
    game.on('potionsLoaded', count => {
      this.gameLogger.log(id, 'PotionsLoaded', { count });
    });

    game.on('inventoryUpdated', size => {
      this.gameLogger.log(id, 'InventoryUpdated', { inventorySize: size });
    });

    game.on('vendorsChosen', selling => {
      this.gameLogger.log(id, 'VendorsChosen', { vendors: selling.length, selling });
      this.logger?.debug(`Game ${id}: ${selling.length} vendors chosen`);
    });

    game.on('gameSolved', results => {
      this.gameLogger.log(id, 'GameSolved', { days: results.length, results });
      this.logger?.debug(`Game ${id}: solved ${results.length} days`);
    });
  }
}
