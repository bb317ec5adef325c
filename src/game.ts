/**
 * Game: the aggregate that owns one hand of OFC.
 *
 * Holds the deck, the seats in turn order, discards, Fantasy Land states
 * and the turn pointer. Every mutation runs synchronously through a method
 * here and either applies in full or throws before touching state.
 *
 * Flow:
 *   1. Construction deals the first street (the whole Fantasy Land deal to
 *      seats playing from Fantasy Land) and starts round 1.
 *   2. Each turn the current seat places one card, or plays a whole turn
 *      (initial placement, Pineapple street, Fantasy Land layout).
 *   3. When every incomplete seat has played, the next round starts and
 *      seats with nothing in hand are dealt the next street.
 *   4. When all layouts are complete the hand is scored, Fantasy Land is
 *      decided for the next hand and `game-completed` is emitted.
 */

import type {
  AnalysisPosition,
  Card,
  CardPlacement,
  FantasyLandState,
  GameEvent,
  GameRules,
  GameStatus,
  InitialPlacement,
  PineappleAction,
  PlayerId,
  Row,
  Score,
  ValidationResult,
} from './types.js';
import { formatCard } from './cards.js';
import { Deck } from './deck.js';
import { GameStateError, InvalidCardPlacementError } from './errors.js';
import {
  createInitialFantasyLandState,
  enterFantasyLandState,
  exitFantasyLandState,
} from './fantasy-land.js';
import { Player } from './player.js';
import { cardsDealtPerSeat, standardRules, validateRules } from './rules.js';
import { calculateScores, pickWinner } from './scoring.js';
import type { ScoringSeat } from './scoring.js';
import type { EngineServices } from './services.js';
import { engineServicesFor } from './services.js';
import type { TableView } from './validator.js';

// -- Configuration --

export interface SeatConfig {
  id: PlayerId;
  name: string;
  /** Carried over from the previous hand; active means this hand is played from Fantasy Land. */
  fantasyLand?: FantasyLandState;
}

export interface GameConfig {
  id: string;
  /** Seats in turn order. */
  seats: readonly SeatConfig[];
  /** RNG seed for the shuffle. Ignored when `deck` is given. */
  seed: number;
  rules?: GameRules;
  /** Pre-arranged deck, dealt from the front. */
  deck?: Deck;
  /** 1-based position of this hand in a session. Defaults to 1. */
  handNumber?: number;
  services?: EngineServices;
  clock?: () => Date;
}

export interface NextHandOptions {
  seed: number;
  deck?: Deck;
}

export class Game implements TableView {
  readonly id: string;
  readonly rules: GameRules;
  readonly handNumber: number;

  private readonly services: EngineServices;
  private readonly clock: () => Date;
  private readonly deck: Deck;
  private readonly seats: Player[];
  private readonly fantasyLandStates = new Map<PlayerId, FantasyLandState>();

  private discards: Card[] = [];
  private events: GameEvent[] = [];
  private currentStatus: GameStatus = 'waiting';
  private round = 0;
  private turnIndex = 0;
  private placementSequence = 0;
  private revision = 0;
  private completionTime: Date | null = null;
  private scores: Record<PlayerId, Score> | null = null;
  private winner: PlayerId | null = null;

  constructor(config: GameConfig) {
    const rules = config.rules ?? standardRules();
    validateRules(rules);

    const { seats } = config;
    if (seats.length < rules.minPlayers || seats.length > rules.maxPlayers) {
      throw new GameStateError(
        `Game needs ${rules.minPlayers}-${rules.maxPlayers} players, got ${seats.length}`,
      );
    }
    const ids = new Set(seats.map(s => s.id));
    if (ids.size !== seats.length) {
      throw new GameStateError('Player ids must be unique');
    }

    this.id = config.id;
    this.rules = { ...rules };
    this.handNumber = config.handNumber ?? 1;
    this.services = config.services ?? engineServicesFor(rules.royaltyTable);
    this.clock = config.clock ?? (() => new Date());
    this.deck = config.deck ?? Deck.shuffled(config.seed);

    for (const seat of seats) {
      const state = seat.fantasyLand ?? createInitialFantasyLandState(seat.id);
      if (state.playerId !== seat.id) {
        throw new GameStateError(`Fantasy Land state for ${state.playerId} given to seat ${seat.id}`);
      }
      this.fantasyLandStates.set(seat.id, { ...state });
    }

    const needed = seats.reduce((sum, seat) => sum + this.cardsForSeat(seat.id), 0);
    if (needed > this.deck.size) {
      throw new GameStateError(`Deck has ${this.deck.size} cards, the deal needs ${needed}`);
    }

    this.seats = seats.map(
      seat => new Player({ id: seat.id, name: seat.name, evaluator: this.services.evaluator }),
    );
    this.start();
  }

  // -- Queries --

  get status(): GameStatus {
    return this.currentStatus;
  }

  /** Bumped by every successful mutation. */
  get version(): number {
    return this.revision;
  }

  get roundNumber(): number {
    return this.round;
  }

  get players(): readonly Player[] {
    return this.seats;
  }

  get currentPlayerId(): PlayerId | null {
    if (this.currentStatus !== 'in-progress' && this.currentStatus !== 'paused') return null;
    return this.seats[this.turnIndex].id;
  }

  get completedAt(): Date | null {
    return this.completionTime;
  }

  get finalScores(): Record<PlayerId, Score> | null {
    return this.scores ? copyScores(this.scores) : null;
  }

  get winnerId(): PlayerId | null {
    return this.winner;
  }

  getPlayer(playerId: PlayerId): Player | undefined {
    return this.seats.find(p => p.id === playerId);
  }

  getCurrentPlayer(): Player {
    if (this.currentStatus === 'completed' || this.currentStatus === 'cancelled') {
      throw new GameStateError(`Game is ${this.currentStatus}`, { gameId: this.id });
    }
    return this.seats[this.turnIndex];
  }

  remainingCards(): Card[] {
    return this.deck.remainingCards();
  }

  discardedCards(): Card[] {
    return [...this.discards];
  }

  getFantasyLandState(playerId: PlayerId): FantasyLandState | undefined {
    const state = this.fantasyLandStates.get(playerId);
    return state ? { ...state } : undefined;
  }

  getAnalysisPosition(): AnalysisPosition {
    const playersHands: AnalysisPosition['playersHands'] = {};
    for (const player of this.seats) {
      playersHands[player.id] = player.getCurrentHand();
    }
    return {
      gameId: this.id,
      version: this.revision,
      playersHands,
      remainingCards: this.deck.remainingCards(),
      currentPlayerId: this.currentPlayerId,
      roundNumber: this.round,
      rules: { ...this.rules },
    };
  }

  validateLayout(playerId: PlayerId): boolean {
    return this.requirePlayer(playerId).validateLayout();
  }

  getValidationSummary(): Record<string, ValidationResult> {
    return this.services.validator.getValidationSummary(this);
  }

  /** Scores for the finished hand. */
  calculateScores(): Record<PlayerId, Score> {
    if (this.scores) return copyScores(this.scores);
    if (!this.seats.every(p => p.isLayoutComplete())) {
      throw new GameStateError('Scores need every layout complete', { gameId: this.id });
    }
    return this.scoreTable();
  }

  /** Drain the events recorded since the last call. */
  pullEvents(): GameEvent[] {
    const events = this.events;
    this.events = [];
    return events;
  }

  // -- Turn Actions --

  placeCard(playerId: PlayerId, card: Card, row: Row): void {
    const player = this.requireTurn(playerId);
    if (this.rules.variant === 'pineapple' && player.streetKind === 'street') {
      throw new InvalidCardPlacementError(
        'Pineapple streets are played with playPineappleTurn: place two cards and discard one',
        { playerId },
      );
    }
    if (!player.canPlaceCard(card, row)) {
      throw new InvalidCardPlacementError(`Cannot place ${formatCard(card)} in the ${row} row`, {
        playerId,
        card: formatCard(card),
        row,
      });
    }

    this.place(player, card, row);
    this.finishTurn(player);
  }

  /** Place every initial card as one turn. */
  placeInitialCards(playerId: PlayerId, placements: readonly CardPlacement[]): void {
    const player = this.requireTurn(playerId);
    const placement: InitialPlacement = { playerId, placements: [...placements] };
    assertValid(this.services.validator.validateInitialPlacement(this, placement), playerId);

    for (const { card, row } of placements) {
      this.place(player, card, row);
    }
    this.finishTurn(player);
  }

  /** A Pineapple street: two placements and one discard as one turn. */
  playPineappleTurn(action: PineappleAction): void {
    const player = this.requireTurn(action.playerId);
    assertValid(this.services.validator.validatePineappleAction(this, action), action.playerId);

    this.discard(player, player.discardCard(action.discardedCard));
    for (const { card, row } of action.placements) {
      this.place(player, card, row);
    }
    this.finishTurn(player);
  }

  /** Set a whole Fantasy Land layout; cards left in hand are discarded. */
  setFantasyLandLayout(playerId: PlayerId, placements: readonly CardPlacement[]): void {
    const player = this.requireTurn(playerId);
    assertValid(
      this.services.validator.validateFantasyLandPlacement(this, playerId, placements),
      playerId,
    );

    for (const { card, row } of placements) {
      this.place(player, card, row);
    }
    this.finishTurn(player);
  }

  // -- Lifecycle --

  pause(): void {
    if (this.currentStatus !== 'in-progress') {
      throw new GameStateError(`Cannot pause a game that is ${this.currentStatus}`, { gameId: this.id });
    }
    this.currentStatus = 'paused';
    this.revision++;
  }

  resume(): void {
    if (this.currentStatus !== 'paused') {
      throw new GameStateError(`Cannot resume a game that is ${this.currentStatus}`, { gameId: this.id });
    }
    this.currentStatus = 'in-progress';
    this.revision++;
  }

  cancel(): void {
    if (this.currentStatus === 'completed' || this.currentStatus === 'cancelled') {
      throw new GameStateError(`Cannot cancel a game that is ${this.currentStatus}`, { gameId: this.id });
    }
    this.currentStatus = 'cancelled';
    this.revision++;
  }

  /**
   * The following hand with the same seats and rules. Seats that qualified
   * carry their Fantasy Land state into it.
   */
  createNextHand(id: string, options: NextHandOptions): Game {
    if (this.currentStatus !== 'completed') {
      throw new GameStateError('The next hand starts after this one completes', { gameId: this.id });
    }
    return new Game({
      id,
      seats: this.seats.map(p => ({
        id: p.id,
        name: p.name,
        fantasyLand: this.getFantasyLandState(p.id),
      })),
      seed: options.seed,
      deck: options.deck,
      rules: this.rules,
      handNumber: this.handNumber + 1,
      services: this.services,
      clock: this.clock,
    });
  }

  // -- Internals --

  private playsFantasyLand(playerId: PlayerId): boolean {
    return this.rules.fantasyLandEnabled && (this.fantasyLandStates.get(playerId)?.isActive ?? false);
  }

  private cardsForSeat(playerId: PlayerId): number {
    return this.playsFantasyLand(playerId)
      ? this.services.fantasyLand.getFantasyLandCardCount(this.rules.variant)
      : cardsDealtPerSeat(this.rules);
  }

  private start(): void {
    for (const player of this.seats) {
      if (this.playsFantasyLand(player.id)) {
        const count = this.services.fantasyLand.getFantasyLandCardCount(this.rules.variant);
        player.enterFantasyLand();
        player.receiveFantasyLandCards(this.deck.deal(count));
      } else {
        const count = this.rules.initialCardsCount;
        player.receiveInitialCards(this.deck.deal(count), count);
      }
    }
    this.currentStatus = 'in-progress';
    this.beginRound();
  }

  private beginRound(): void {
    this.round++;
    for (const player of this.seats) {
      player.startNewRound();
      if (!player.isLayoutComplete() && player.handCards.length === 0 && !player.inFantasyLand) {
        player.receiveStreetCards(this.deck.deal(this.rules.cardsPerTurn));
      }
    }

    this.turnIndex = this.seats.findIndex(p => !p.isLayoutComplete());
    this.events.push({
      type: 'round-started',
      gameId: this.id,
      roundNumber: this.round,
      activePlayerId: this.seats[this.turnIndex].id,
      remainingCards: this.deck.size,
    });
  }

  private requirePlayer(playerId: PlayerId): Player {
    const player = this.getPlayer(playerId);
    if (!player) {
      throw new GameStateError(`Player ${playerId} is not in this game`, { gameId: this.id, playerId });
    }
    return player;
  }

  private requireTurn(playerId: PlayerId): Player {
    if (this.currentStatus === 'completed') {
      throw new GameStateError('Game is already completed', { gameId: this.id });
    }
    if (this.currentStatus !== 'in-progress') {
      throw new GameStateError(`Game is ${this.currentStatus}`, { gameId: this.id });
    }
    const player = this.requirePlayer(playerId);
    const current = this.seats[this.turnIndex];
    if (current.id !== playerId) {
      throw new GameStateError(`It is not ${playerId}'s turn`, {
        gameId: this.id,
        playerId,
        currentPlayerId: current.id,
      });
    }
    return player;
  }

  private place(player: Player, card: Card, row: Row): void {
    player.placeCard(card, row);
    this.placementSequence++;
    this.events.push({
      type: 'card-placed',
      gameId: this.id,
      playerId: player.id,
      card,
      row,
      roundNumber: this.round,
      placementSequence: this.placementSequence,
    });
  }

  private discard(player: Player, card: Card): void {
    this.discards.push(card);
    this.events.push({
      type: 'card-discarded',
      gameId: this.id,
      playerId: player.id,
      card,
      roundNumber: this.round,
    });
  }

  private finishTurn(player: Player): void {
    if (player.isLayoutComplete()) {
      for (const card of player.releaseHandCards()) {
        this.discard(player, card);
      }
    }
    this.revision++;

    if (this.seats.every(p => p.isLayoutComplete())) {
      this.complete();
      return;
    }
    const next = this.nextSeatInRound();
    if (next === null) {
      this.beginRound();
    } else {
      this.turnIndex = next;
    }
  }

  /** Next seat after the current one that still has to play this round. */
  private nextSeatInRound(): number | null {
    for (let step = 1; step <= this.seats.length; step++) {
      const index = (this.turnIndex + step) % this.seats.length;
      const player = this.seats[index];
      if (!player.isLayoutComplete() && !player.placedThisRound) {
        return index;
      }
    }
    return null;
  }

  private complete(): void {
    const fantasyLandPlayerIds = this.rules.fantasyLandEnabled ? this.qualifyFantasyLand() : [];

    const scores = this.scoreTable();
    const winnerId = pickWinner(this.seats.map(p => p.id), scores);
    this.completionTime = this.clock();
    this.scores = scores;
    this.winner = winnerId;
    this.currentStatus = 'completed';

    this.events.push({
      type: 'game-completed',
      gameId: this.id,
      finalScores: copyScores(scores),
      winnerId,
      fantasyLandPlayerIds,
    });
  }

  /**
   * Seats playing from Fantasy Land must meet the stay requirement; the
   * rest must meet the entry requirement. Returns the seats that play the
   * next hand from Fantasy Land.
   */
  private qualifyFantasyLand(): PlayerId[] {
    const { validator } = this.services;
    const nextHand = this.handNumber + 1;
    const qualified: PlayerId[] = [];

    for (const player of this.seats) {
      const state = this.fantasyLandStates.get(player.id) ?? createInitialFantasyLandState(player.id);
      const playing = this.playsFantasyLand(player.id);
      const verdict = playing
        ? validator.validateFantasyLandStay(player)
        : validator.validateFantasyLandEntry(player);

      if (verdict.isValid) {
        this.fantasyLandStates.set(player.id, enterFantasyLandState(state, nextHand));
        player.enterFantasyLand();
        qualified.push(player.id);
      } else if (state.isActive) {
        this.fantasyLandStates.set(player.id, exitFantasyLandState(state));
        for (const card of player.exitFantasyLand()) {
          this.discard(player, card);
        }
      }
    }
    return qualified;
  }

  private scoreTable(): Record<PlayerId, Score> {
    const seats: ScoringSeat[] = this.seats.map(p => ({
      playerId: p.id,
      fouled: p.isFouled,
      rows: { top: p.getRowCards('top'), middle: p.getRowCards('middle'), bottom: p.getRowCards('bottom') },
    }));
    return calculateScores(seats, this.services.evaluator, this.rules.scoopBonus);
  }
}

function assertValid(result: ValidationResult, playerId: PlayerId): void {
  if (!result.isValid) {
    throw new InvalidCardPlacementError(result.errorMessage ?? 'Invalid action', { playerId });
  }
}

function copyScores(scores: Record<PlayerId, Score>): Record<PlayerId, Score> {
  const copy: Record<PlayerId, Score> = {};
  for (const [playerId, score] of Object.entries(scores)) {
    copy[playerId] = { ...score };
  }
  return copy;
}
