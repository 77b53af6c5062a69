/**
 * GameLogger - In-memory event log for potion game sessions
 *
 * Every game event is recorded with its game id so a session can be exported
 * as CSV and dropped when the game is removed.
 */

export interface GameLogEntry {
  timestamp: number;
  gameId: string;
  // Event type (e.g. "PotionsLoaded", "VendorsChosen")
  event: string;
  details: Record<string, unknown>;
}

const FIXED_COLUMNS = ['timestamp', 'gameId', 'event'];

function toCsvCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return `"${JSON.stringify(value).replace(/"/g, '""')}"`;
  const text = String(value);
  // Quote plain values that would break the row
  if (/[",\n]/.test(text)) return `"${text.replace(/"/g, '""')}"`;
  return text;
}

export class GameLogger {
  private logs: GameLogEntry[] = [];
  private readonly now: () => number;

  /**
   * @param now - Clock used for entry timestamps
   */
  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  log(gameId: string, event: string, details: Record<string, unknown> = {}): void {
    this.logs.push({
      timestamp: this.now(),
      gameId,
      event,
      details
    });
  }

  /**
   * Returns a copy of every entry in recording order
   */
  getLogs(): GameLogEntry[] {
    return [...this.logs];
  }

  /**
   * Exports one game's entries as CSV
   *
   * Columns are the fixed ones followed by every detail key seen across the
   * game's entries, in first-seen order. Objects are JSON encoded and quoted.
   *
   * @returns CSV text, or null if the game has no entries
   */
  getLogsForGameAsCSV(gameId: string): string | null {
    const gameLogs = this.logs.filter(log => log.gameId === gameId);

    if (gameLogs.length === 0) {
      return null;
    }

    const detailKeys = new Set<string>();
    for (const log of gameLogs) {
      Object.keys(log.details).forEach(key => detailKeys.add(key));
    }
    const detailHeaders = Array.from(detailKeys);

    const rows = [[...FIXED_COLUMNS, ...detailHeaders].join(',')];
    for (const log of gameLogs) {
      const values = [
        toCsvCell(log.timestamp),
        toCsvCell(log.gameId),
        toCsvCell(log.event),
        ...detailHeaders.map(header => toCsvCell(log.details[header]))
      ];
      rows.push(values.join(','));
    }

    return rows.join('\n');
  }

  clear(): void {
    this.logs = [];
  }

  /**
   * Drops every entry of one game
   */
  cleanup(gameId: string): void {
    this.logs = this.logs.filter(log => log.gameId !== gameId);
  }
}
