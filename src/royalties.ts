/**
 * Royalty schedules, selected by `GameRules.royaltyTable`.
 *
 * Top row royalties depend on the pair or trips rank; Middle and Bottom
 * royalties depend on hand type alone, with a separate entry for a royal
 * flush (ace-high straight flush).
 */

import type { Rank, RoyaltyTable } from './types.js';
import { HandType } from './types.js';

export interface FiveCardRoyalties {
  byHandType: Partial<Record<HandType, number>>;
  royalFlush: number;
}

export interface RoyaltySchedule {
  /** Royalty for a Top pair of the given rank (0 below the threshold). */
  topPair(rank: Rank): number;
  /** Royalty for Top trips of the given rank. */
  topTrips(rank: Rank): number;
  middle: FiveCardRoyalties;
  bottom: FiveCardRoyalties;
}

/** Lowest pair that earns a Top royalty (66 = 1 ... AA = 9). */
export const TOP_PAIR_THRESHOLD: Rank = 6;

function topPairRoyalty(rank: Rank): number {
  return rank >= TOP_PAIR_THRESHOLD ? rank - 5 : 0;
}

const BOTTOM_ROYALTIES: FiveCardRoyalties = {
  byHandType: {
    [HandType.Straight]: 2,
    [HandType.Flush]: 4,
    [HandType.FullHouse]: 6,
    [HandType.Quads]: 10,
    [HandType.StraightFlush]: 15,
  },
  royalFlush: 25,
};

const PINEAPPLE_MIDDLE_ROYALTIES: FiveCardRoyalties = {
  byHandType: {
    [HandType.Trips]: 2,
    [HandType.Straight]: 4,
    [HandType.Flush]: 8,
    [HandType.FullHouse]: 12,
    [HandType.Quads]: 20,
    [HandType.StraightFlush]: 30,
  },
  royalFlush: 50,
};

export const ROYALTY_SCHEDULES: Record<RoyaltyTable, RoyaltySchedule> = {
  standard: {
    topPair: topPairRoyalty,
    topTrips: () => 10,
    middle: BOTTOM_ROYALTIES,
    bottom: BOTTOM_ROYALTIES,
  },
  // 222 = 10, 333 = 11, ... AAA = 22
  pineapple: {
    topPair: topPairRoyalty,
    topTrips: rank => 10 + (rank - 2),
    middle: PINEAPPLE_MIDDLE_ROYALTIES,
    bottom: BOTTOM_ROYALTIES,
  },
};
