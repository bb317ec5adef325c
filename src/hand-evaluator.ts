/**
 * Hand evaluation: ranks 3- and 5-card sets, looks up row royalties, and
 * checks OFC row progression (bottom > middle > top).
 *
 * Rankings of 3-card and 5-card sets share a single strength scale:
 *
 *   strengthValue = handType * 15^5 + sum(key[i] * 15^(4 - i))
 *
 * where the tiebreak key is right-padded with zeros to five entries. A Top
 * row of QQK therefore beats a Middle of QQ432 and loses to QQA98, which is
 * how rows are compared for fouling.
 *
 * The evaluator holds only its royalty schedule and is safe to share.
 */

import type { Card, HandRanking, Rank, Row, RoyaltyTable } from './types.js';
import { HandType, ROW_CAPACITY } from './types.js';
import { hasDuplicateCards } from './cards.js';
import { InvalidHandError } from './errors.js';
import type { FiveCardRoyalties, RoyaltySchedule } from './royalties.js';
import { ROYALTY_SCHEDULES } from './royalties.js';

const KEY_BASE = 15;
const KEY_LENGTH = 5;
const TYPE_WEIGHT = KEY_BASE ** KEY_LENGTH;

const RANK_NAMES: Record<Rank, string> = {
  2: 'Two',
  3: 'Three',
  4: 'Four',
  5: 'Five',
  6: 'Six',
  7: 'Seven',
  8: 'Eight',
  9: 'Nine',
  10: 'Ten',
  11: 'Jack',
  12: 'Queen',
  13: 'King',
  14: 'Ace',
};

interface HandShape {
  handType: HandType;
  key: Rank[];
}

export class HandEvaluator {
  private readonly schedule: RoyaltySchedule;

  constructor(schedule: RoyaltySchedule = ROYALTY_SCHEDULES.standard) {
    this.schedule = schedule;
  }

  /**
   * Rank a 3- or 5-card set. The attached royalty is the Top royalty for
   * three cards and the Bottom royalty for five; use `evaluateRow` for a
   * Middle row.
   */
  evaluate(cards: readonly Card[]): HandRanking {
    assertRankable(cards);
    const shape = analyzeHand(cards);
    const ranking: HandRanking = {
      handType: shape.handType,
      tiebreakKey: [...shape.key],
      strengthValue: encodeStrength(shape),
      royaltyBonus: 0,
      cards: [...cards],
      description: describeHand(shape),
    };
    ranking.royaltyBonus = this.royaltyBonus(ranking, cards.length === 3 ? 'top' : 'bottom');
    return ranking;
  }

  /** Rank the cards of a complete row, with that row's royalty attached. */
  evaluateRow(cards: readonly Card[], row: Row): HandRanking {
    if (cards.length !== ROW_CAPACITY[row]) {
      throw new InvalidHandError(
        `The ${row} row needs ${ROW_CAPACITY[row]} cards, got ${cards.length}`,
      );
    }
    const ranking = this.evaluate(cards);
    return { ...ranking, royaltyBonus: this.royaltyBonus(ranking, row) };
  }

  /**
   * Royalty earned by a ranking in the given row; 0 below the row's
   * qualifying hand or when the card count does not fit the row.
   */
  royaltyBonus(ranking: HandRanking, row: Row): number {
    if (ranking.cards.length !== ROW_CAPACITY[row]) return 0;

    const primary = ranking.tiebreakKey[0];
    if (row === 'top') {
      if (!isRank(primary)) return 0;
      if (ranking.handType === HandType.Trips) return this.schedule.topTrips(primary);
      if (ranking.handType === HandType.Pair) return this.schedule.topPair(primary);
      return 0;
    }

    return fiveCardRoyalty(this.schedule[row], ranking);
  }

  /** 1 if `a` is stronger, -1 if `b` is stronger, 0 on a tie. */
  compare(a: HandRanking, b: HandRanking): -1 | 0 | 1 {
    if (a.strengthValue === b.strengthValue) return 0;
    return a.strengthValue > b.strengthValue ? 1 : -1;
  }

  /**
   * True iff all rows are full and strictly ordered bottom > middle > top.
   * Equal strength between two rows fouls.
   */
  validateOfcProgression(
    top: readonly Card[],
    middle: readonly Card[],
    bottom: readonly Card[],
  ): boolean {
    if (
      top.length !== ROW_CAPACITY.top ||
      middle.length !== ROW_CAPACITY.middle ||
      bottom.length !== ROW_CAPACITY.bottom
    ) {
      return false;
    }

    const topHand = this.evaluate(top);
    const middleHand = this.evaluate(middle);
    const bottomHand = this.evaluate(bottom);

    return this.compare(bottomHand, middleHand) > 0 && this.compare(middleHand, topHand) > 0;
  }

  /** Whether a complete layout is fouled. Partial layouts are rejected. */
  isFouledHand(top: readonly Card[], middle: readonly Card[], bottom: readonly Card[]): boolean {
    if (
      top.length !== ROW_CAPACITY.top ||
      middle.length !== ROW_CAPACITY.middle ||
      bottom.length !== ROW_CAPACITY.bottom
    ) {
      throw new InvalidHandError(
        `Fouling is only defined for complete layouts (3/5/5), got ${top.length}/${middle.length}/${bottom.length}`,
      );
    }
    return !this.validateOfcProgression(top, middle, bottom);
  }

  /** Strongest three-card ranking among the subsets of 3-5 cards. */
  bestThreeCardRanking(cards: readonly Card[]): HandRanking {
    if (cards.length < 3 || cards.length > 5) {
      throw new InvalidHandError(`Need 3-5 cards to pick three from, got ${cards.length}`);
    }

    let best: HandRanking | null = null;
    for (let i = 0; i < cards.length - 2; i++) {
      for (let j = i + 1; j < cards.length - 1; j++) {
        for (let k = j + 1; k < cards.length; k++) {
          const ranking = this.evaluate([cards[i], cards[j], cards[k]]);
          if (best === null || ranking.strengthValue > best.strengthValue) {
            best = ranking;
          }
        }
      }
    }
    if (best === null) {
      throw new InvalidHandError('No three-card subset found');
    }
    return best;
  }
}

const sharedEvaluators = new Map<RoyaltyTable, HandEvaluator>();

/** Shared evaluator for a royalty table. */
export function handEvaluatorFor(table: RoyaltyTable): HandEvaluator {
  let evaluator = sharedEvaluators.get(table);
  if (!evaluator) {
    evaluator = new HandEvaluator(ROYALTY_SCHEDULES[table]);
    sharedEvaluators.set(table, evaluator);
  }
  return evaluator;
}

// -- Analysis --

function assertRankable(cards: readonly Card[]): void {
  if (cards.length !== 3 && cards.length !== 5) {
    throw new InvalidHandError(`Hand must have exactly 3 or 5 cards, got ${cards.length}`);
  }
  if (hasDuplicateCards(cards)) {
    throw new InvalidHandError('Hand contains duplicate cards');
  }
}

/**
 * Classify by multiplicity pattern combined with straight/flush flags,
 * strongest pattern first.
 */
function analyzeHand(cards: readonly Card[]): HandShape {
  const ranks = cards.map(c => c.rank).sort((a, b) => b - a);

  const counts = new Map<Rank, number>();
  for (const rank of ranks) {
    counts.set(rank, (counts.get(rank) ?? 0) + 1);
  }
  const groups = [...counts.entries()]
    .map(([rank, count]) => ({ rank, count }))
    .sort((a, b) => (b.count !== a.count ? b.count - a.count : b.rank - a.rank));

  const isFlush = cards.length === 5 && cards.every(c => c.suit === cards[0].suit);
  const straightHigh = findStraightHigh(ranks);
  const kickers = groups.slice(1).map(g => g.rank);

  if (straightHigh !== null && isFlush) {
    return { handType: HandType.StraightFlush, key: [straightHigh] };
  }
  if (groups[0].count === 4) {
    return { handType: HandType.Quads, key: [groups[0].rank, ...kickers] };
  }
  if (groups[0].count === 3 && groups.length > 1 && groups[1].count === 2) {
    return { handType: HandType.FullHouse, key: [groups[0].rank, groups[1].rank] };
  }
  if (isFlush) {
    return { handType: HandType.Flush, key: ranks };
  }
  if (straightHigh !== null) {
    return { handType: HandType.Straight, key: [straightHigh] };
  }
  if (groups[0].count === 3) {
    return { handType: HandType.Trips, key: [groups[0].rank, ...kickers] };
  }
  if (groups[0].count === 2 && groups.length > 1 && groups[1].count === 2) {
    return { handType: HandType.TwoPair, key: [groups[0].rank, ...kickers] };
  }
  if (groups[0].count === 2) {
    return { handType: HandType.Pair, key: [groups[0].rank, ...kickers] };
  }
  return { handType: HandType.HighCard, key: ranks };
}

/**
 * High card of a 5-card straight, or null. The wheel (A-2-3-4-5) plays
 * the ace low and is five-high.
 */
function findStraightHigh(ranksDesc: readonly Rank[]): Rank | null {
  if (ranksDesc.length !== 5) return null;
  if (new Set(ranksDesc).size !== 5) return null;

  if (ranksDesc[0] - ranksDesc[4] === 4) return ranksDesc[0];
  if (ranksDesc[0] === 14 && ranksDesc[1] === 5 && ranksDesc[4] === 2) return 5;
  return null;
}

function encodeStrength(shape: HandShape): number {
  let value = shape.handType * TYPE_WEIGHT;
  for (let i = 0; i < KEY_LENGTH; i++) {
    value += (shape.key[i] ?? 0) * KEY_BASE ** (KEY_LENGTH - 1 - i);
  }
  return value;
}

function fiveCardRoyalty(table: FiveCardRoyalties, ranking: HandRanking): number {
  if (ranking.handType === HandType.StraightFlush && ranking.tiebreakKey[0] === 14) {
    return table.royalFlush;
  }
  return table.byHandType[ranking.handType] ?? 0;
}

function describeHand({ handType, key }: HandShape): string {
  const [first, second] = key;
  switch (handType) {
    case HandType.HighCard:
      return `${RANK_NAMES[first]} High`;
    case HandType.Pair:
      return `Pair of ${plural(first)}`;
    case HandType.TwoPair:
      return `${plural(first)} and ${plural(second)}`;
    case HandType.Trips:
      return `Three ${plural(first)}`;
    case HandType.Straight:
      return `Straight (${RANK_NAMES[first]} High)`;
    case HandType.Flush:
      return `Flush (${RANK_NAMES[first]} High)`;
    case HandType.FullHouse:
      return `${plural(first)} full of ${plural(second)}`;
    case HandType.Quads:
      return `Four ${plural(first)}`;
    case HandType.StraightFlush:
      return first === 14 ? 'Royal Flush' : `Straight Flush (${RANK_NAMES[first]} High)`;
  }
}

function plural(rank: Rank): string {
  return rank === 6 ? 'Sixes' : `${RANK_NAMES[rank]}s`;
}

function isRank(value: number | undefined): value is Rank {
  return value !== undefined && Number.isInteger(value) && value >= 2 && value <= 14;
}
