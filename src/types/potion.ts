/**
 * Domain types for the potion trading game
 *
 * Prices are dollars per litre, quantities are litres.
 */

export type HashStrategy = 'good' | 'bad';

// A catalogue entry: every potion that can appear over the course of a game
export interface PotionDefinition {
  category: string;
  name: string;
  buyPrice: number;   // What vendors pay PotionCorp per litre
}

export interface Potion extends PotionDefinition {
  quantity: number;
}

// Litres of a named potion held in stock or handed to a vendor
export interface PotionStock {
  name: string;
  litres: number;
}

// What adventurers will pay per litre for a potion
export interface PotionValuation {
  name: string;
  sellPrice: number;
}

export interface InventoryEntry extends PotionStock {
  buyPrice: number;
}

export interface RankedInventoryEntry extends InventoryEntry {
  rank: number;
}

export interface ProbeStatistics {
  conflictCount: number;
  probeTotal: number;
  probeMax: number;
}

// A merged trading opportunity: every potion with the same return per dollar
export interface TradeOpportunity {
  profitPerDollar: string;
  maxSpend: string;
}

export interface TableStatistics extends ProbeStatistics {
  entryCount: number;
  tableSize: number;
}
