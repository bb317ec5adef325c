/**
 * Advisory rule checks. Every method re-derives its answer from current
 * state and reports through ValidationResult; rule violations never throw.
 *
 * Game runs the same checks before it mutates anything, so a valid result
 * here means the matching Game operation will succeed.
 */

import type {
  Card,
  CardPlacement,
  GameRules,
  GameStatus,
  InitialPlacement,
  PineappleAction,
  PlayerId,
  Row,
  ValidationResult,
} from './types.js';
import { DECK_SIZE, ROWS, ROW_CAPACITY } from './types.js';
import { cardKey, containsCard, formatCard, hasDuplicateCards, sameCard } from './cards.js';
import type { HandEvaluator } from './hand-evaluator.js';
import type { FantasyLandManager } from './fantasy-land.js';
import type { Player } from './player.js';
import { placementsPerStreet } from './rules.js';

/** The read-only slice of a game the validator inspects. */
export interface TableView {
  readonly status: GameStatus;
  readonly rules: GameRules;
  readonly players: readonly Player[];
  readonly currentPlayerId: PlayerId | null;
  remainingCards(): Card[];
  discardedCards(): Card[];
}

/** A foul already settled by full rows, or only threatened. */
interface FoulCheck {
  settled: boolean;
  detail: string;
}

const VALID: ValidationResult = { isValid: true };

function invalid(errorMessage: string): ValidationResult {
  return { isValid: false, errorMessage };
}

export class GameValidator {
  private readonly evaluator: HandEvaluator;
  private readonly fantasyLand: FantasyLandManager;

  constructor(evaluator: HandEvaluator, fantasyLand: FantasyLandManager) {
    this.evaluator = evaluator;
    this.fantasyLand = fantasyLand;
  }

  // -- Turns and single placements --

  validateTurnOrder(table: TableView, playerId: PlayerId): ValidationResult {
    if (table.status !== 'in-progress') {
      return invalid(`Game is ${table.status}`);
    }
    if (!findPlayer(table, playerId)) {
      return invalid(`Player ${playerId} is not in this game`);
    }
    if (table.currentPlayerId !== playerId) {
      return invalid(`It is not ${playerId}'s turn`);
    }
    return VALID;
  }

  validateCardPlacement(table: TableView, playerId: PlayerId, card: Card, row: Row): ValidationResult {
    const turn = this.validateTurnOrder(table, playerId);
    if (!turn.isValid) return turn;

    const player = findPlayer(table, playerId);
    if (!player) return invalid(`Player ${playerId} is not in this game`);

    if (table.rules.variant === 'pineapple' && player.streetKind === 'street') {
      return invalid('Pineapple streets are played as a whole turn: place two cards and discard one');
    }
    return this.canPlaceCardSafely(player, card, row);
  }

  /**
   * Whether `card` can go in `row`, with a warning when doing so fouls the
   * layout or leaves the top row ahead of the middle so far.
   */
  canPlaceCardSafely(player: Player, card: Card, row: Row): ValidationResult {
    if (!containsCard(player.handCards, card)) {
      return invalid(`Player ${player.id} does not hold ${formatCard(card)}`);
    }
    if (!player.canPlaceCard(card, row)) {
      return invalid(`The ${row} row is full`);
    }

    const rows = {
      top: player.getRowCards('top'),
      middle: player.getRowCards('middle'),
      bottom: player.getRowCards('bottom'),
    };
    rows[row] = [...rows[row], card];

    const check = this.checkFoulRisk(rows);
    if (!check) return VALID;
    return {
      isValid: true,
      warningMessage: check.settled
        ? `This placement fouls the layout: ${check.detail}`
        : `This placement risks fouling: ${check.detail}`,
    };
  }

  private checkFoulRisk(rows: Record<Row, Card[]>): FoulCheck | null {
    const full = (r: Row) => rows[r].length === ROW_CAPACITY[r];

    if (full('top') && full('middle')) {
      const top = this.evaluator.evaluate(rows.top);
      const middle = this.evaluator.evaluate(rows.middle);
      if (this.evaluator.compare(middle, top) <= 0) {
        return { settled: true, detail: 'the top row is not weaker than the middle row' };
      }
    }
    if (full('middle') && full('bottom')) {
      const middle = this.evaluator.evaluate(rows.middle);
      const bottom = this.evaluator.evaluate(rows.bottom);
      if (this.evaluator.compare(bottom, middle) <= 0) {
        return { settled: true, detail: 'the middle row is not weaker than the bottom row' };
      }
    }
    if (full('top') && !full('middle') && rows.middle.length >= 3) {
      const top = this.evaluator.evaluate(rows.top);
      const middleSoFar = this.evaluator.bestThreeCardRanking(rows.middle);
      if (this.evaluator.compare(top, middleSoFar) >= 0) {
        return { settled: false, detail: 'the top row outranks the middle row so far' };
      }
    }
    return null;
  }

  getAvailablePositions(player: Player): Row[] {
    return player.getAvailablePositions();
  }

  // -- Whole-turn actions --

  /** Three dealt cards: exactly two placed and one discarded. */
  validatePineappleAction(table: TableView, action: PineappleAction): ValidationResult {
    const { rules } = table;
    if (rules.variant !== 'pineapple') {
      return invalid('Pineapple turns are only played in the pineapple variant');
    }

    const expectedDealt = rules.cardsPerTurn;
    const expectedPlaced = placementsPerStreet(rules);
    if (action.dealtCards.length !== expectedDealt) {
      return invalid(`Must deal ${expectedDealt} cards, got ${action.dealtCards.length}`);
    }
    if (hasDuplicateCards(action.dealtCards)) {
      return invalid('Dealt cards contain duplicates');
    }
    if (action.placements.length !== expectedPlaced) {
      return invalid(`Must place ${expectedPlaced} cards, got ${action.placements.length}`);
    }

    const used = [...action.placements.map(p => p.card), action.discardedCard];
    if (hasDuplicateCards(used)) {
      return invalid('Each dealt card must be either placed or discarded, once');
    }
    const foreign = used.find(c => !containsCard(action.dealtCards, c));
    if (foreign) {
      return invalid(`Card ${formatCard(foreign)} is not one of the dealt cards`);
    }

    const turn = this.validateTurnOrder(table, action.playerId);
    if (!turn.isValid) return turn;
    const player = findPlayer(table, action.playerId);
    if (!player) return invalid(`Player ${action.playerId} is not in this game`);

    if (player.streetKind !== 'street' || !sameCardSet(player.handCards, action.dealtCards)) {
      return invalid(`Player ${action.playerId} was not dealt ${formatCardList(action.dealtCards)}`);
    }
    return this.checkRowCapacity(player, action.placements);
  }

  /** The first street's cards, placed together in legal slots. */
  validateInitialPlacement(table: TableView, placement: InitialPlacement): ValidationResult {
    const expected = table.rules.initialCardsCount;
    if (placement.placements.length !== expected) {
      return invalid(`Must place ${expected} initial cards, got ${placement.placements.length}`);
    }
    const cards = placement.placements.map(p => p.card);
    if (hasDuplicateCards(cards)) {
      return invalid('Initial placement uses a card twice');
    }

    const turn = this.validateTurnOrder(table, placement.playerId);
    if (!turn.isValid) return turn;
    const player = findPlayer(table, placement.playerId);
    if (!player) return invalid(`Player ${placement.playerId} is not in this game`);

    if (player.streetKind !== 'initial' || !sameCardSet(player.handCards, cards)) {
      return invalid(`Player ${placement.playerId} must place exactly the initial cards dealt`);
    }
    return this.checkRowCapacity(player, placement.placements);
  }

  private checkRowCapacity(player: Player, placements: readonly CardPlacement[]): ValidationResult {
    for (const row of ROWS) {
      const adding = placements.filter(p => p.row === row).length;
      const free = ROW_CAPACITY[row] - player.getRowCards(row).length;
      if (adding > free) {
        return invalid(`The ${row} row has room for ${free} more cards, got ${adding}`);
      }
    }
    return VALID;
  }

  // -- Fantasy Land --

  validateFantasyLandEntry(player: Player): ValidationResult {
    if (!player.isLayoutComplete()) return invalid('Layout is not complete');
    if (player.isFouled) return invalid('A fouled layout cannot enter Fantasy Land');
    if (!this.fantasyLand.checkEntryQualification(player.getRowCards('top'))) {
      return invalid('Top row needs a pair of Queens or better');
    }
    return VALID;
  }

  validateFantasyLandStay(player: Player): ValidationResult {
    if (!player.isLayoutComplete()) return invalid('Layout is not complete');
    if (player.isFouled) return invalid('A fouled layout cannot stay in Fantasy Land');
    const qualifies = this.fantasyLand.checkStayQualification(
      player.getRowCards('top'),
      player.getRowCards('middle'),
      player.getRowCards('bottom'),
    );
    if (!qualifies) {
      return invalid('Staying needs top trips, a middle full house or better, or bottom quads or better');
    }
    return VALID;
  }

  validateFantasyLandPlacement(
    table: TableView,
    playerId: PlayerId,
    placements: readonly CardPlacement[],
  ): ValidationResult {
    const turn = this.validateTurnOrder(table, playerId);
    if (!turn.isValid) return turn;
    const player = findPlayer(table, playerId);
    if (!player) return invalid(`Player ${playerId} is not in this game`);

    if (!player.inFantasyLand || player.streetKind !== 'fantasy-land') {
      return invalid(`Player ${playerId} is not playing from Fantasy Land`);
    }
    return this.fantasyLand.validateFantasyPlacement(placements, player.handCards, table.rules.variant);
  }

  // -- Whole-game invariants --

  /** Complete layouts must progress; partial ones fail only on a settled foul. */
  validateRowStrengthProgression(player: Player): ValidationResult {
    if (player.isLayoutComplete()) {
      return player.validateLayout()
        ? VALID
        : invalid('Rows must get stronger from top to bottom');
    }

    const rows = {
      top: player.getRowCards('top'),
      middle: player.getRowCards('middle'),
      bottom: player.getRowCards('bottom'),
    };
    const check = this.checkFoulRisk(rows);
    if (!check) return VALID;
    if (check.settled) return invalid(`Layout is fouled: ${check.detail}`);
    return { isValid: true, warningMessage: `Fouling risk: ${check.detail}` };
  }

  checkGameCompletion(table: TableView): ValidationResult {
    const incomplete = table.players.filter(p => !p.isLayoutComplete());
    if (incomplete.length > 0) {
      return invalid(`Layouts still incomplete: ${incomplete.map(p => p.id).join(', ')}`);
    }
    return VALID;
  }

  /** Every card once across deck, pools, rows and discards. */
  validateCardUniqueness(table: TableView): ValidationResult {
    const all = collectCards(table);
    const seen = new Set<string>();
    for (const c of all) {
      const key = cardKey(c);
      if (seen.has(key)) {
        return invalid(`Card ${formatCard(c)} appears more than once`);
      }
      seen.add(key);
    }
    if (all.length !== DECK_SIZE) {
      return invalid(`Expected ${DECK_SIZE} cards across the game, found ${all.length}`);
    }
    return VALID;
  }

  validateMultiPlayerGameState(table: TableView): ValidationResult {
    const { players, rules } = table;
    if (players.length < rules.minPlayers || players.length > rules.maxPlayers) {
      return invalid(
        `Game needs ${rules.minPlayers}-${rules.maxPlayers} players, has ${players.length}`,
      );
    }
    const ids = new Set(players.map(p => p.id));
    if (ids.size !== players.length) {
      return invalid('Player ids must be unique');
    }
    for (const player of players) {
      for (const row of ROWS) {
        if (player.getRowCards(row).length > ROW_CAPACITY[row]) {
          return invalid(`Player ${player.id} overfilled the ${row} row`);
        }
      }
    }
    if (
      table.status === 'in-progress' &&
      (table.currentPlayerId === null || !ids.has(table.currentPlayerId))
    ) {
      return invalid('No valid current player');
    }
    return this.validateCardUniqueness(table);
  }

  /** Named checks over the whole table, one entry per player layout. */
  getValidationSummary(table: TableView): Record<string, ValidationResult> {
    const summary: Record<string, ValidationResult> = {
      gameState: this.validateMultiPlayerGameState(table),
      cardUniqueness: this.validateCardUniqueness(table),
      gameCompletion: this.checkGameCompletion(table),
    };
    if (table.currentPlayerId !== null) {
      summary.turnOrder = this.validateTurnOrder(table, table.currentPlayerId);
    }
    for (const player of table.players) {
      summary[`layout:${player.id}`] = this.validateRowStrengthProgression(player);
    }
    return summary;
  }
}

// -- Helpers --

function findPlayer(table: TableView, playerId: PlayerId): Player | undefined {
  return table.players.find(p => p.id === playerId);
}

function collectCards(table: TableView): Card[] {
  const cards = [...table.remainingCards(), ...table.discardedCards()];
  for (const player of table.players) {
    const hand = player.getCurrentHand();
    cards.push(...hand.top, ...hand.middle, ...hand.bottom, ...hand.handCards);
  }
  return cards;
}

function sameCardSet(a: readonly Card[], b: readonly Card[]): boolean {
  return a.length === b.length && a.every(c => b.some(other => sameCard(c, other)));
}

function formatCardList(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}
