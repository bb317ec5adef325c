/**
 * Core type definitions for the Open-Face Chinese Poker rules engine.
 */

// -- Card Types --

export type Suit = 's' | 'h' | 'd' | 'c';

/** Numeric rank: 2-10, J=11, Q=12, K=13, A=14. */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export const SUITS: readonly Suit[] = ['s', 'h', 'd', 'c'];

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export const RANK_SYMBOLS: Record<Rank, string> = {
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: 'T',
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

export const SUIT_GLYPHS: Record<Suit, string> = {
  s: '♠',
  h: '♥',
  d: '♦',
  c: '♣',
};

// -- Rows --

export type Row = 'top' | 'middle' | 'bottom';

/** Rows in Top/Middle/Bottom order. */
export const ROWS: readonly Row[] = ['top', 'middle', 'bottom'];

export const ROW_CAPACITY: Record<Row, number> = {
  top: 3,
  middle: 5,
  bottom: 5,
};

/** Cards in a complete layout (3 + 5 + 5). */
export const LAYOUT_SIZE = 13;

export const DECK_SIZE = 52;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 4;

// -- Hand Ranking --

/** Hand types, numbered in order of strength. */
export const HandType = {
  HighCard: 0,
  Pair: 1,
  TwoPair: 2,
  Trips: 3,
  Straight: 4,
  Flush: 5,
  FullHouse: 6,
  Quads: 7,
  StraightFlush: 8,
} as const;

export type HandType = (typeof HandType)[keyof typeof HandType];

export interface HandRanking {
  handType: HandType;
  /** Ranks that decide between hands of the same type, most significant first. */
  tiebreakKey: number[];
  /** Single integer ordering all 3- and 5-card hands. */
  strengthValue: number;
  royaltyBonus: number;
  cards: Card[];
  description: string;
}

// -- Rules --

export type Variant = 'standard' | 'pineapple';

export type RoyaltyTable = 'standard' | 'pineapple';

export interface GameRules {
  variant: Variant;
  minPlayers: number;
  maxPlayers: number;
  fantasyLandEnabled: boolean;
  /** Cards dealt on the first street. */
  initialCardsCount: number;
  /** Cards dealt on each later street. */
  cardsPerTurn: number;
  royaltyTable: RoyaltyTable;
  /** Bonus on top of the three row points for winning every row. */
  scoopBonus: number;
}

// -- Player --

export type PlayerId = string;

export type PlayerStatus = 'active' | 'fouled' | 'fantasy-land' | 'eliminated';

/** How the cards currently in a player's pool were dealt. */
export type StreetKind = 'initial' | 'street' | 'fantasy-land';

export interface HandSnapshot {
  top: Card[];
  middle: Card[];
  bottom: Card[];
  /** Dealt cards not yet placed. */
  handCards: Card[];
}

export interface FantasyLandState {
  playerId: PlayerId;
  isActive: boolean;
  /** Hand number on which the current Fantasy Land run started. */
  entryHand: number | null;
  /** Hands played in a row from Fantasy Land, including the current one. */
  consecutiveCount: number;
}

// -- Actions --

export interface CardPlacement {
  card: Card;
  row: Row;
}

/** Pineapple street: three dealt cards, two placed, one discarded. */
export interface PineappleAction {
  playerId: PlayerId;
  dealtCards: Card[];
  placements: CardPlacement[];
  discardedCard: Card;
}

/** First street: five dealt cards placed together. */
export interface InitialPlacement {
  playerId: PlayerId;
  placements: CardPlacement[];
}

// -- Game --

export type GameStatus = 'waiting' | 'in-progress' | 'completed' | 'paused' | 'cancelled';

export interface Score {
  /** Net head-to-head row and scoop points. */
  points: number;
  /** Royalties collected from opponents. */
  royalties: number;
  /** Royalties paid to opponents. */
  penalties: number;
  total: number;
}

export interface AnalysisPosition {
  gameId: string;
  version: number;
  playersHands: Record<PlayerId, HandSnapshot>;
  remainingCards: Card[];
  currentPlayerId: PlayerId | null;
  roundNumber: number;
  rules: GameRules;
}

export interface ValidationResult {
  isValid: boolean;
  errorMessage?: string;
  warningMessage?: string;
}

// -- Events --

export interface CardPlacedEvent {
  type: 'card-placed';
  gameId: string;
  playerId: PlayerId;
  card: Card;
  row: Row;
  roundNumber: number;
  placementSequence: number;
}

export interface CardDiscardedEvent {
  type: 'card-discarded';
  gameId: string;
  playerId: PlayerId;
  card: Card;
  roundNumber: number;
}

export interface RoundStartedEvent {
  type: 'round-started';
  gameId: string;
  roundNumber: number;
  activePlayerId: PlayerId;
  remainingCards: number;
}

export interface GameCompletedEvent {
  type: 'game-completed';
  gameId: string;
  finalScores: Record<PlayerId, Score>;
  winnerId: PlayerId;
  fantasyLandPlayerIds: PlayerId[];
}

export type GameEvent =
  | CardPlacedEvent
  | CardDiscardedEvent
  | RoundStartedEvent
  | GameCompletedEvent;
