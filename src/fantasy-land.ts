/**
 * Fantasy Land: qualification checks, deal sizes, layout checks, and the
 * per-player state that carries across hands.
 */

import type {
  Card,
  CardPlacement,
  FantasyLandState,
  PlayerId,
  Row,
  ValidationResult,
  Variant,
} from './types.js';
import { HandType, LAYOUT_SIZE, ROWS, ROW_CAPACITY } from './types.js';
import { containsCard, formatCard, hasDuplicateCards } from './cards.js';
import type { HandEvaluator } from './hand-evaluator.js';

/** Lowest Top pair that qualifies for Fantasy Land (Queens). */
export const FANTASY_LAND_PAIR_RANK = 12;

const FANTASY_LAND_CARD_COUNT: Record<Variant, number> = {
  standard: 13,
  pineapple: 14,
};

export class FantasyLandManager {
  private readonly evaluator: HandEvaluator;

  constructor(evaluator: HandEvaluator) {
    this.evaluator = evaluator;
  }

  /** Top row holds QQ or better, or any trips. */
  checkEntryQualification(top: readonly Card[]): boolean {
    if (top.length !== ROW_CAPACITY.top) return false;
    const ranking = this.evaluator.evaluate(top);
    if (ranking.handType === HandType.Trips) return true;
    return ranking.handType === HandType.Pair && ranking.tiebreakKey[0] >= FANTASY_LAND_PAIR_RANK;
  }

  /**
   * Top trips, a Middle full house or better, or Bottom quads or better.
   * Only complete layouts can stay.
   */
  checkStayQualification(
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
    return (
      this.evaluator.evaluate(top).handType === HandType.Trips ||
      this.evaluator.evaluate(middle).handType >= HandType.FullHouse ||
      this.evaluator.evaluate(bottom).handType >= HandType.Quads
    );
  }

  getFantasyLandCardCount(variant: Variant): number {
    return FANTASY_LAND_CARD_COUNT[variant];
  }

  /**
   * A Fantasy Land layout sets all 13 cards at once from the dealt pool:
   * distinct cards, every one dealt, rows filled exactly.
   */
  validateFantasyPlacement(
    placements: readonly CardPlacement[],
    dealt: readonly Card[],
    variant: Variant,
  ): ValidationResult {
    const expectedDealt = this.getFantasyLandCardCount(variant);
    if (dealt.length !== expectedDealt) {
      return { isValid: false, errorMessage: `Fantasy Land deals ${expectedDealt} cards, got ${dealt.length}` };
    }
    if (placements.length !== LAYOUT_SIZE) {
      return {
        isValid: false,
        errorMessage: `Fantasy Land layout must place ${LAYOUT_SIZE} cards, got ${placements.length}`,
      };
    }

    const cards = placements.map(p => p.card);
    if (hasDuplicateCards(cards)) {
      return { isValid: false, errorMessage: 'Fantasy Land layout places a card twice' };
    }
    const foreign = cards.find(c => !containsCard(dealt, c));
    if (foreign) {
      return { isValid: false, errorMessage: `Card ${formatCard(foreign)} was not dealt to this player` };
    }

    const counts = countByRow(placements);
    for (const row of ROWS) {
      if (counts[row] !== ROW_CAPACITY[row]) {
        return {
          isValid: false,
          errorMessage: `The ${row} row needs ${ROW_CAPACITY[row]} cards, got ${counts[row]}`,
        };
      }
    }

    const leftover = dealt.filter(c => !containsCard(cards, c));
    if (leftover.length > 0) {
      return {
        isValid: true,
        warningMessage: `Discarding ${leftover.map(formatCard).join(' ')}`,
      };
    }
    return { isValid: true };
  }
}

function countByRow(placements: readonly CardPlacement[]): Record<Row, number> {
  const counts: Record<Row, number> = { top: 0, middle: 0, bottom: 0 };
  for (const { row } of placements) {
    counts[row]++;
  }
  return counts;
}

// -- State --

export function createInitialFantasyLandState(playerId: PlayerId): FantasyLandState {
  return { playerId, isActive: false, entryHand: null, consecutiveCount: 0 };
}

/**
 * Activate Fantasy Land for `handNumber`. A run continues (count + 1) only
 * when the state is already active and this hand directly follows the
 * last one played from Fantasy Land.
 */
export function enterFantasyLandState(state: FantasyLandState, handNumber: number): FantasyLandState {
  const lastHand = state.entryHand === null ? null : state.entryHand + state.consecutiveCount - 1;
  const continues = state.isActive && lastHand !== null && handNumber === lastHand + 1;

  return {
    playerId: state.playerId,
    isActive: true,
    entryHand: continues ? state.entryHand : handNumber,
    consecutiveCount: continues ? state.consecutiveCount + 1 : 1,
  };
}

/** Deactivate, keeping the last run for history. */
export function exitFantasyLandState(state: FantasyLandState): FantasyLandState {
  return { ...state, isActive: false };
}
