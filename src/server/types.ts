/**
 * Table server types: tables, connections, the JSON message protocol and
 * the per-client view of a game.
 */

import type {
  Card,
  GameEvent,
  GameStatus,
  PlayerId,
  PlayerStatus,
  Row,
  Score,
  StreetKind,
  Variant,
} from '../types.js';
import type { Game } from '../game.js';

// -- Table --

export type TableStatus = 'waiting' | 'playing' | 'finished' | 'closed';

export interface TableConfig {
  variant: Variant;
  maxPlayers: number;
  fantasyLandEnabled: boolean;
  /** RNG seed for the first hand; each later hand adds its hand number. Random if not provided. */
  seed?: number;
}

export interface SeatInfo {
  displayName: string;
}

export interface LobbyPlayer {
  playerId: string;
  displayName: string;
  isReady: boolean;
  isConnected: boolean;
  isHost: boolean;
}

export interface LobbyState {
  tableId: string;
  tableCode: string;
  config: TableConfig;
  players: LobbyPlayer[];
  canStart: boolean;
}

export interface Table {
  id: string;
  code: string;
  hostId: string;
  status: TableStatus;
  config: TableConfig;
  /** Player IDs in join order, which is also seat order. */
  playerIds: string[];
  connectedPlayerIds: Set<string>;
  seatInfo: Map<string, SeatInfo>;
  readyStatus: Map<string, boolean>;
  /** Hand in play, or the last one finished. null before the first deal. */
  game: Game | null;
  /** Seed of the first hand, fixed when the game starts. */
  seed: number | null;
  lastActivityAt: number;
  createdAt: number;
}

// -- Client → Server Messages --

/** A card placement on the wire; cards travel in text notation ("Ah", "Td"). */
export interface WirePlacement {
  card: string;
  row: Row;
}

export interface CreateTableMessage {
  type: 'create-table';
  variant: Variant;
  maxPlayers: number;
  displayName: string;
  fantasyLandEnabled?: boolean;
}

export interface JoinTableMessage {
  type: 'join-table';
  tableCode: string;
  displayName: string;
}

export interface ResumeSessionMessage {
  type: 'resume-session';
  sessionToken: string;
}

export interface SetReadyMessage {
  type: 'set-ready';
  ready: boolean;
}

export interface LeaveTableMessage {
  type: 'leave-table';
}

export interface StartGameMessage {
  type: 'start-game';
}

export interface NextHandMessage {
  type: 'next-hand';
}

export interface PlaceCardMessage {
  type: 'place-card';
  card: string;
  row: Row;
  /** Game version the client acted on; the action is rejected once the game has moved on. */
  expectedVersion?: number;
}

export interface PlaceInitialMessage {
  type: 'place-initial';
  placements: WirePlacement[];
  expectedVersion?: number;
}

export interface PineappleTurnMessage {
  type: 'pineapple-turn';
  placements: WirePlacement[];
  discard: string;
  expectedVersion?: number;
}

export interface FantasyLandLayoutMessage {
  type: 'fantasy-land-layout';
  placements: WirePlacement[];
  expectedVersion?: number;
}

export type GameActionMessage =
  | PlaceCardMessage
  | PlaceInitialMessage
  | PineappleTurnMessage
  | FantasyLandLayoutMessage;

export type ClientMessage =
  | CreateTableMessage
  | JoinTableMessage
  | ResumeSessionMessage
  | SetReadyMessage
  | LeaveTableMessage
  | StartGameMessage
  | NextHandMessage
  | GameActionMessage;

// -- Server → Client Messages --

export interface SessionCreatedMessage {
  type: 'session-created';
  sessionToken: string;
  playerId: string;
}

export interface TableCreatedMessage {
  type: 'table-created';
  tableId: string;
  tableCode: string;
}

export interface PlayerJoinedMessage {
  type: 'player-joined';
  playerId: string;
  playerCount: number;
  maxPlayers: number;
}

export interface PlayerLeftMessage {
  type: 'player-left';
  playerId: string;
  playerCount: number;
  maxPlayers: number;
  newHostId?: string;
}

export interface LobbyStateMessage {
  type: 'lobby-state';
  lobby: LobbyState;
}

export interface GameStartedMessage {
  type: 'game-started';
  state: ClientGameState;
}

export interface GameStateMessage {
  type: 'game-state';
  state: ClientGameState;
}

export interface GameEventMessage {
  type: 'game-event';
  event: GameEvent;
}

export interface PlayerDisconnectedMessage {
  type: 'player-disconnected';
  playerId: string;
}

export interface PlayerReconnectedMessage {
  type: 'player-reconnected';
  playerId: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | SessionCreatedMessage
  | TableCreatedMessage
  | PlayerJoinedMessage
  | PlayerLeftMessage
  | LobbyStateMessage
  | GameStartedMessage
  | GameStateMessage
  | GameEventMessage
  | PlayerDisconnectedMessage
  | PlayerReconnectedMessage
  | ErrorMessage;

// -- State Partitioning --

export interface PublicSeatState {
  id: PlayerId;
  displayName: string;
  status: PlayerStatus;
  rows: Record<Row, Card[]>;
  /** Number of dealt cards not yet placed (contents hidden). */
  handCount: number;
  inFantasyLand: boolean;
  isConnected: boolean;
}

export interface PrivateSeatState {
  id: PlayerId;
  displayName: string;
  status: PlayerStatus;
  rows: Record<Row, Card[]>;
  hand: Card[];
  streetKind: StreetKind | null;
  availableRows: Row[];
  inFantasyLand: boolean;
}

export interface ClientGameState {
  gameId: string;
  handNumber: number;
  version: number;
  status: GameStatus;
  variant: Variant;
  roundNumber: number;
  currentPlayerId: PlayerId | null;
  remainingCount: number;
  self: PrivateSeatState;
  opponents: PublicSeatState[];
  finalScores: Record<PlayerId, Score> | null;
  winnerId: PlayerId | null;
}

// -- Connection Abstraction --

export interface Connection {
  id: string;
  playerId: string;
  tableId: string | null;
  send(message: ServerMessage): void;
}
