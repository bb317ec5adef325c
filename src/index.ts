/**
 * Open-Face Chinese Poker: rules and scoring engine.
 *
 * Public API surface for hand evaluation, the game state machine,
 * Fantasy Land, scoring, validation and the multiplayer table server.
 */

// Types
export type {
  Suit,
  Rank,
  Card,
  Row,
  HandRanking,
  Variant,
  RoyaltyTable,
  GameRules,
  PlayerId,
  PlayerStatus,
  StreetKind,
  HandSnapshot,
  FantasyLandState,
  CardPlacement,
  PineappleAction,
  InitialPlacement,
  GameStatus,
  Score,
  AnalysisPosition,
  ValidationResult,
  CardPlacedEvent,
  CardDiscardedEvent,
  RoundStartedEvent,
  GameCompletedEvent,
  GameEvent,
} from './types.js';
export {
  SUITS,
  RANKS,
  RANK_SYMBOLS,
  SUIT_GLYPHS,
  ROWS,
  ROW_CAPACITY,
  LAYOUT_SIZE,
  DECK_SIZE,
  MIN_PLAYERS,
  MAX_PLAYERS,
  HandType,
} from './types.js';

// Cards and deck
export {
  card,
  parseCard,
  parseCards,
  formatCard,
  formatCards,
  displayCard,
  sameCard,
  cardKey,
  containsCard,
  withoutCard,
  hasDuplicateCards,
  buildStandardDeck,
} from './cards.js';
export { createRng, shuffle, Deck } from './deck.js';

// Errors
export type { ErrorContext } from './errors.js';
export { GameStateError, InvalidCardPlacementError, InvalidHandError } from './errors.js';

// Rules and royalties
export {
  standardRules,
  pineappleRules,
  rulesForVariant,
  createRules,
  validateRules,
  placementsPerStreet,
  cardsDealtPerSeat,
} from './rules.js';
export type { FiveCardRoyalties, RoyaltySchedule } from './royalties.js';
export { ROYALTY_SCHEDULES, TOP_PAIR_THRESHOLD } from './royalties.js';

// Hand evaluation
export { HandEvaluator, handEvaluatorFor } from './hand-evaluator.js';

// Fantasy Land
export {
  FANTASY_LAND_PAIR_RANK,
  FantasyLandManager,
  createInitialFantasyLandState,
  enterFantasyLandState,
  exitFantasyLandState,
} from './fantasy-land.js';

// Players and scoring
export type { PlayerOptions, RoyaltyBreakdown } from './player.js';
export { Player } from './player.js';
export type { ScoringSeat } from './scoring.js';
export { emptyScore, seatRoyalties, rowPoints, calculateScores, pickWinner } from './scoring.js';

// Validation and services
export type { TableView } from './validator.js';
export { GameValidator } from './validator.js';
export type { EngineServices } from './services.js';
export { createEngineServices, engineServicesFor } from './services.js';

// Game
export type { SeatConfig, GameConfig, NextHandOptions } from './game.js';
export { Game } from './game.js';

// Multiplayer
export * from './server/index.js';
