import { SeedEntry } from './types';

/**
 * Supplies the initial ordered sequence of seed entries
 */
export interface ISeedSource {
  load(): Promise<SeedEntry[]>;
}
