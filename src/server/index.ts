/**
 * Multiplayer table server for the OFC engine.
 *
 * Provides WebSocket-based real-time play with:
 *   - Table management (create, join, reconnect)
 *   - Lobby with ready status
 *   - Session persistence for reconnection across page refreshes
 *   - Authoritative game server (the Game validates every action)
 *   - Hidden information enforcement (per-client state partitioning)
 *   - Stale action rejection by game version
 */

// Server
export type { TableServerConfig, TableServer } from './ws-server.js';
export { createTableServer } from './ws-server.js';

// Table management
export {
  createTable,
  joinTable,
  disconnectPlayer,
  reconnectPlayer,
  isPlayerConnected,
  allPlayersDisconnected,
  canStartGame,
  allPlayersReady,
  setPlayerReady,
  removePlayer,
  getLobbyState,
  maxPlayersFor,
  setTableStatus,
  cleanupTable,
  generateTableCode,
  generateTableId,
} from './table.js';

// Game controller
export type { ConnectionRegistry } from './game-controller.js';
export {
  startGame,
  startNextHand,
  handleGameAction,
  handleReconnection,
  handleDisconnection,
  isStaleAction,
} from './game-controller.js';

// Protocol and state partitioning
export { parseClientMessage } from './protocol.js';
export {
  partitionState,
  buildPrivateState,
  buildPublicState,
  isEventVisibleTo,
} from './state-partition.js';

// Types
export type {
  Table,
  TableConfig,
  TableStatus,
  SeatInfo,
  LobbyPlayer,
  LobbyState,
  Connection,
  WirePlacement,
  ClientMessage,
  GameActionMessage,
  ServerMessage,
  CreateTableMessage,
  JoinTableMessage,
  ResumeSessionMessage,
  SetReadyMessage,
  LeaveTableMessage,
  StartGameMessage,
  NextHandMessage,
  PlaceCardMessage,
  PlaceInitialMessage,
  PineappleTurnMessage,
  FantasyLandLayoutMessage,
  SessionCreatedMessage,
  TableCreatedMessage,
  PlayerJoinedMessage,
  PlayerLeftMessage,
  LobbyStateMessage,
  GameStartedMessage,
  GameStateMessage,
  GameEventMessage,
  PlayerDisconnectedMessage,
  PlayerReconnectedMessage,
  ErrorMessage,
  PublicSeatState,
  PrivateSeatState,
  ClientGameState,
} from './types.js';
