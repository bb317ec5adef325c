/**
 * One seat's layout: three rows plus the pool of dealt-but-unplaced cards.
 *
 * Players only check their own layout; cross-player rules (turn order,
 * global card uniqueness) belong to Game and GameValidator.
 */

import type {
  Card,
  HandSnapshot,
  PlayerId,
  PlayerStatus,
  Row,
  StreetKind,
} from './types.js';
import { LAYOUT_SIZE, ROWS, ROW_CAPACITY } from './types.js';
import { containsCard, formatCard, withoutCard } from './cards.js';
import { GameStateError, InvalidCardPlacementError } from './errors.js';
import type { HandEvaluator } from './hand-evaluator.js';

export interface PlayerOptions {
  id: PlayerId;
  name: string;
  evaluator: HandEvaluator;
}

export interface RoyaltyBreakdown {
  top: number;
  middle: number;
  bottom: number;
  total: number;
}

export class Player {
  readonly id: PlayerId;
  readonly name: string;
  private readonly evaluator: HandEvaluator;

  private rows: Record<Row, Card[]> = { top: [], middle: [], bottom: [] };
  private pool: Card[] = [];
  private poolKind: StreetKind | null = null;
  private currentStatus: PlayerStatus = 'active';
  private placedInRound = false;
  private fantasyLand = false;

  constructor(options: PlayerOptions) {
    this.id = options.id;
    this.name = options.name;
    this.evaluator = options.evaluator;
  }

  get status(): PlayerStatus {
    return this.currentStatus;
  }

  get placedThisRound(): boolean {
    return this.placedInRound;
  }

  get inFantasyLand(): boolean {
    return this.fantasyLand;
  }

  get isFouled(): boolean {
    return this.currentStatus === 'fouled';
  }

  /** How the cards currently held were dealt, or null when none are held. */
  get streetKind(): StreetKind | null {
    return this.pool.length > 0 ? this.poolKind : null;
  }

  get handCards(): Card[] {
    return [...this.pool];
  }

  get placedCount(): number {
    return this.rows.top.length + this.rows.middle.length + this.rows.bottom.length;
  }

  // -- Dealing --

  receiveInitialCards(cards: readonly Card[], expectedCount: number): void {
    if (this.pool.length > 0) {
      throw new GameStateError(`Player ${this.id} already holds ${this.pool.length} unplaced cards`, {
        playerId: this.id,
      });
    }
    if (cards.length !== expectedCount) {
      throw new GameStateError(`Expected ${expectedCount} initial cards, got ${cards.length}`, {
        playerId: this.id,
      });
    }
    this.receive(cards, 'initial');
  }

  /** Cards for one later street. */
  receiveStreetCards(cards: readonly Card[]): void {
    if (this.pool.length > 0) {
      throw new GameStateError(`Player ${this.id} must place held cards before the next street`, {
        playerId: this.id,
      });
    }
    if (this.isLayoutComplete()) {
      throw new GameStateError(`Player ${this.id} has a complete layout`, { playerId: this.id });
    }
    this.receive(cards, 'street');
  }

  /** The whole Fantasy Land deal, received at once into an empty layout. */
  receiveFantasyLandCards(cards: readonly Card[]): void {
    if (!this.fantasyLand) {
      throw new GameStateError(`Player ${this.id} is not in Fantasy Land`, { playerId: this.id });
    }
    if (this.pool.length > 0 || this.placedCount > 0) {
      throw new GameStateError(`Fantasy Land cards go to an empty layout`, { playerId: this.id });
    }
    this.receive(cards, 'fantasy-land');
  }

  private receive(cards: readonly Card[], kind: StreetKind): void {
    this.pool = [...cards];
    this.poolKind = kind;
  }

  // -- Placement --

  canPlaceCard(card: Card, row: Row): boolean {
    return containsCard(this.pool, card) && this.rows[row].length < ROW_CAPACITY[row];
  }

  /**
   * Move a held card into a row. The placement that completes the layout
   * also decides fouling.
   */
  placeCard(card: Card, row: Row): void {
    if (!containsCard(this.pool, card)) {
      throw new InvalidCardPlacementError(`Player ${this.id} does not hold ${formatCard(card)}`, {
        playerId: this.id,
        card: formatCard(card),
      });
    }
    if (this.rows[row].length >= ROW_CAPACITY[row]) {
      throw new InvalidCardPlacementError(`The ${row} row is full`, {
        playerId: this.id,
        row,
      });
    }

    this.pool = withoutCard(this.pool, card);
    this.rows[row] = [...this.rows[row], card];
    this.placedInRound = true;

    if (this.isLayoutComplete() && !this.validateLayout()) {
      this.currentStatus = 'fouled';
    }
  }

  /** Give up a held card (the Pineapple discard). */
  discardCard(card: Card): Card {
    if (!containsCard(this.pool, card)) {
      throw new InvalidCardPlacementError(`Player ${this.id} cannot discard ${formatCard(card)}: not held`, {
        playerId: this.id,
        card: formatCard(card),
      });
    }
    this.pool = withoutCard(this.pool, card);
    return card;
  }

  /** Empty the pool, returning whatever was still held. */
  releaseHandCards(): Card[] {
    const released = this.pool;
    this.pool = [];
    this.poolKind = null;
    return released;
  }

  // -- Layout --

  /** True for partial layouts; a complete one must progress strictly. */
  validateLayout(): boolean {
    if (!this.isLayoutComplete()) return true;
    return this.evaluator.validateOfcProgression(this.rows.top, this.rows.middle, this.rows.bottom);
  }

  isLayoutComplete(): boolean {
    return this.placedCount === LAYOUT_SIZE;
  }

  getAvailablePositions(): Row[] {
    return ROWS.filter(row => this.rows[row].length < ROW_CAPACITY[row]);
  }

  getRowCards(row: Row): Card[] {
    return [...this.rows[row]];
  }

  getCurrentHand(): HandSnapshot {
    return {
      top: this.getRowCards('top'),
      middle: this.getRowCards('middle'),
      bottom: this.getRowCards('bottom'),
      handCards: this.handCards,
    };
  }

  /** Royalties per full row; a fouled layout earns none. */
  calculateRoyalties(): RoyaltyBreakdown {
    const breakdown: RoyaltyBreakdown = { top: 0, middle: 0, bottom: 0, total: 0 };
    if (this.isFouled) return breakdown;

    for (const row of ROWS) {
      const cards = this.rows[row];
      if (cards.length !== ROW_CAPACITY[row]) continue;
      breakdown[row] = this.evaluator.evaluateRow(cards, row).royaltyBonus;
      breakdown.total += breakdown[row];
    }
    return breakdown;
  }

  // -- Round and Fantasy Land flags --

  startNewRound(): void {
    this.placedInRound = false;
  }

  enterFantasyLand(): void {
    this.fantasyLand = true;
    if (this.currentStatus === 'active') {
      this.currentStatus = 'fantasy-land';
    }
  }

  /** Leave Fantasy Land, returning any Fantasy Land cards still held. */
  exitFantasyLand(): Card[] {
    this.fantasyLand = false;
    if (this.currentStatus === 'fantasy-land') {
      this.currentStatus = 'active';
    }
    return this.poolKind === 'fantasy-land' ? this.releaseHandCards() : [];
  }
}
