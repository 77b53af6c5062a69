import { EventEmitter } from 'events';
import type { FastifyBaseLogger } from 'fastify';
import { InvalidArgumentError, KeyNotFoundError, OutOfRangeError } from './errors.js';
import { LinearProbeTable } from './linear-probe-table.js';
import { OrderStatisticsTree } from './order-statistics-tree.js';
import { RandomGen } from './random-gen.js';
import {
  addStrings,
  compareStrings,
  divideStrings,
  isPositive,
  multiplyStrings,
  numberToString,
  subtractStrings
} from '../utils/precision.js';
import type {
  HashStrategy,
  InventoryEntry,
  Potion,
  PotionDefinition,
  PotionStock,
  PotionValuation,
  RankedInventoryEntry,
  TableStatistics,
  TradeOpportunity
} from '../types/potion.js';

const DEFAULT_CATALOGUE_SIZE = 100;

/**
 * Events emitted by a PotionGame, used for session logging
 */
export interface PotionGameEvents {
  potionsLoaded: (count: number) => void;            // Catalogue replaced
  inventoryUpdated: (size: number) => void;          // Stock added or returned after vendor selection
  vendorsChosen: (selling: PotionStock[]) => void;   // Vendors picked their potions
  gameSolved: (results: number[]) => void;           // Final money per starting amount
}

export interface PotionGameOptions {
  seed?: number;
  logger?: FastifyBaseLogger;
  hashStrategy?: HashStrategy;
}

/**
 * Potion trading game
 *
 * - The catalogue lives in a linear probe table keyed by potion name
 * - The inventory lives in an order-statistics tree keyed by buy price, so
 *   vendors can pick "the k-th most expensive potion" in O(log n)
 * - The solver ranks trades by return per dollar in a second tree and walks
 *   it from the best trade down
 *
 * One RandomGen is created per game and kept for its lifetime.
 */
export class PotionGame extends EventEmitter {
  private readonly seed: number;
  private readonly rand: RandomGen;
  private readonly hashStrategy: HashStrategy;
  private readonly logger: FastifyBaseLogger | undefined;
  private potionTable: LinearProbeTable<Potion>;
  private readonly inventory: OrderStatisticsTree<number, PotionStock>;

  constructor(options: PotionGameOptions = {}) {
    super();
    this.seed = options.seed ?? 0;
    this.rand = new RandomGen(this.seed);
    this.hashStrategy = options.hashStrategy ?? 'good';
    this.logger = options.logger;
    this.potionTable = new LinearProbeTable<Potion>(DEFAULT_CATALOGUE_SIZE, this.hashStrategy);
    this.inventory = new OrderStatisticsTree<number, PotionStock>((a, b) => a - b);
  }

  override on<K extends keyof PotionGameEvents>(event: K, listener: PotionGameEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof PotionGameEvents>(
    event: K,
    ...args: Parameters<PotionGameEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  getSeed(): number {
    return this.seed;
  }

  /**
   * Replaces the catalogue with every potion available over the game
   * Potions start with zero quantity. The inventory is keyed by the old
   * catalogue's buy prices, so replacing the catalogue empties it
   * Time complexity: O(C) for C definitions
   */
  setTotalPotionData(definitions: PotionDefinition[]): void {
    for (const definition of definitions) {
      if (!Number.isFinite(definition.buyPrice) || definition.buyPrice <= 0) {
        this.logger?.warn(`Rejected catalogue due to invalid buy price for ${definition.name}: ${definition.buyPrice}`);
        throw new InvalidArgumentError(`Buy price of ${definition.name} must be positive, got ${definition.buyPrice}`);
      }
    }

    const table = new LinearProbeTable<Potion>(Math.max(definitions.length, 2), this.hashStrategy);
    for (const { category, name, buyPrice } of definitions) {
      table.set(name, { category, name, buyPrice, quantity: 0 });
    }
    this.potionTable = table;

    this.logger?.debug(`Loaded ${definitions.length} potions into a table of size ${table.getTableSize()}`);
    this.emit('potionsLoaded', definitions.length);

    if (!this.inventory.isEmpty()) {
      this.inventory.clear();
      this.logger?.debug('Cleared inventory stocked against the previous catalogue');
      this.emit('inventoryUpdated', 0);
    }
  }

  /**
   * Stocks the inventory, keyed by each potion's buy price
   * A potion sharing a buy price with a stocked one replaces it
   * Time complexity: O(C log N)
   * @throws KeyNotFoundError for a potion missing from the catalogue; nothing is stocked then
   */
  addPotionsToInventory(stock: PotionStock[]): void {
    const resolved = stock.map(({ name, litres }) => {
      if (!Number.isFinite(litres) || litres < 0) {
        this.logger?.warn(`Rejected stock due to invalid litres for ${name}: ${litres}`);
        throw new InvalidArgumentError(`Litres of ${name} must be a non-negative number, got ${litres}`);
      }
      return { buyPrice: this.potionTable.get(name).buyPrice, name, litres };
    });

    for (const { buyPrice, name, litres } of resolved) {
      this.inventory.set(buyPrice, { name, litres });
    }

    this.logger?.debug(`Inventory now holds ${this.inventory.getSize()} potions`);
    this.emit('inventoryUpdated', this.inventory.getSize());
  }

  /**
   * Each vendor takes the k-th most expensive remaining potion for a random k
   * Chosen potions go back into the inventory under their original buy
   * price once every vendor has picked
   * Time complexity: O(V log N)
   * @throws OutOfRangeError if there are more vendors than stocked potions
   */
  choosePotionsForVendors(numVendors: number): PotionStock[] {
    const available = this.inventory.getSize();
    if (!Number.isInteger(numVendors) || numVendors < 0 || numVendors > available) {
      this.logger?.warn(`Rejected ${numVendors} vendors for ${available} stocked potions`);
      throw new OutOfRangeError(numVendors, available, 0);
    }

    const chosen: { buyPrice: number; stock: PotionStock }[] = [];
    for (let i = 0; i < numVendors; i++) {
      const rank = this.rand.randint(this.inventory.getSize());
      const { key, value } = this.inventory.kthLargest(rank);
      chosen.push({ buyPrice: key, stock: value });
      this.inventory.remove(key);
    }

    for (const { buyPrice, stock } of chosen) {
      this.inventory.insert(buyPrice, stock);
    }
    this.emit('inventoryUpdated', this.inventory.getSize());

    const selling = chosen.map(({ stock }) => ({ name: stock.name, litres: stock.litres }));

    this.logger?.debug(`${numVendors} vendors chose ${selling.map(p => p.name).join(', ')}`);
    this.emit('vendorsChosen', selling);
    return selling;
  }

  /**
   * Greedy best-return trading for each starting amount of money
   *
   * Trades are ranked by profit per dollar spent, (sell - buy) / buy, and
   * capped by the money needed to buy out the vendor's stock. Trades with an
   * equal return merge into one. Each day walks the ranking from the top:
   * a trade the remaining money cannot cover ends the day, and losing
   * trades are never taken.
   *
   * Time complexity: O(P log P + M * P log P) for P valuations, M starting amounts
   * @returns The money held at the end of each day
   */
  solveGame(valuations: PotionValuation[], startingMoney: number[]): number[] {
    for (const money of startingMoney) {
      if (!Number.isFinite(money) || money < 0) {
        this.logger?.warn(`Rejected starting money: ${money}`);
        throw new InvalidArgumentError(`Starting money must be a non-negative number, got ${money}`);
      }
    }

    const trades = new OrderStatisticsTree<string, TradeOpportunity>(compareStrings);

    for (const { name, sellPrice } of valuations) {
      if (!Number.isFinite(sellPrice) || sellPrice < 0) {
        throw new InvalidArgumentError(`Sell price of ${name} must be a non-negative number, got ${sellPrice}`);
      }
      const { buyPrice } = this.potionTable.get(name);
      const stocked = this.inventory.find(buyPrice);
      if (!stocked || stocked.name !== name) {
        throw new KeyNotFoundError(name);
      }

      const buy = numberToString(buyPrice);
      const profitPerDollar = divideStrings(subtractStrings(numberToString(sellPrice), buy), buy);
      const maxSpend = multiplyStrings(numberToString(stocked.litres), buy);

      const existing = trades.find(profitPerDollar);
      trades.set(profitPerDollar, {
        profitPerDollar,
        maxSpend: existing ? addStrings(existing.maxSpend, maxSpend) : maxSpend
      });
    }

    const results = startingMoney.map(money => {
      let remaining = numberToString(money);
      let earnings = remaining;

      for (let k = 1; k <= trades.getSize(); k++) {
        const trade = trades.kthLargest(k).value;
        if (!isPositive(trade.profitPerDollar)) break;

        if (compareStrings(remaining, trade.maxSpend) <= 0) {
          earnings = addStrings(earnings, multiplyStrings(remaining, trade.profitPerDollar));
          break;
        }

        earnings = addStrings(earnings, multiplyStrings(trade.maxSpend, trade.profitPerDollar));
        remaining = subtractStrings(remaining, trade.maxSpend);
      }

      return Number(earnings);
    });

    this.logger?.debug(`Solved ${startingMoney.length} days over ${trades.getSize()} trades`);
    this.emit('gameSolved', results);
    return results;
  }

  /**
   * @throws KeyNotFoundError if the potion is not in the catalogue
   */
  getPotion(name: string): Potion {
    return { ...this.potionTable.get(name) };
  }

  /**
   * Stocked potions, cheapest first
   */
  getInventory(): InventoryEntry[] {
    return Array.from(this.inventory.inOrderTraversal(), ({ key, value }) => ({
      buyPrice: key,
      name: value.name,
      litres: value.litres
    }));
  }

  /**
   * @param rank - 1 is the most expensive stocked potion
   * @throws OutOfRangeError unless 1 <= rank <= inventory size
   */
  getInventoryEntryByRank(rank: number): RankedInventoryEntry {
    const { key, value } = this.inventory.kthLargest(rank);
    return { rank, buyPrice: key, name: value.name, litres: value.litres };
  }

  getInventorySize(): number {
    return this.inventory.getSize();
  }

  getTableStatistics(): TableStatistics {
    return {
      ...this.potionTable.statistics(),
      entryCount: this.potionTable.getSize(),
      tableSize: this.potionTable.getTableSize()
    };
  }
}
