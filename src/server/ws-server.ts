/**
 * WebSocket server for multiplayer OFC tables.
 *
 * Thin adapter layer: maps WebSocket connections to tables and the game
 * controller. Uses the `ws` library for WebSocket support.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import type {
  Table,
  Connection,
  ServerMessage,
  ClientMessage,
  TableConfig,
  CreateTableMessage,
  JoinTableMessage,
  ResumeSessionMessage,
} from './types.js';
import type { ConnectionRegistry } from './game-controller.js';
import {
  createTable,
  joinTable,
  disconnectPlayer,
  reconnectPlayer,
  canStartGame,
  cleanupTable,
  allPlayersDisconnected,
  setPlayerReady,
  removePlayer,
  getLobbyState,
  maxPlayersFor,
} from './table.js';
import {
  startGame,
  startNextHand,
  handleGameAction,
  handleReconnection,
  handleDisconnection,
} from './game-controller.js';
import { parseClientMessage } from './protocol.js';

// -- Server State --

interface Session {
  playerId: string;
  tableId: string | null;
}

interface ServerState {
  tables: Map<string, Table>;
  tablesByCode: Map<string, Table>;
  connections: Map<string, WsConnection>;
  /** Session tokens → session data for reconnection across page refreshes. */
  sessions: Map<string, Session>;
  /** Player ID → session token. */
  playerSessions: Map<string, string>;
  /** Pending cleanup timers for abandoned tables (table ID → timer handle). */
  tableCleanupTimers: Map<string, ReturnType<typeof setTimeout>>;
}

interface WsConnection extends Connection {
  ws: WebSocket;
}

export interface TableServerConfig {
  port: number;
  /** Close abandoned tables after this many ms of inactivity. 0 = never. */
  tableCleanupMs?: number;
  /** Grace period before closing a table nobody is connected to (ms). Default 30000. */
  abandonedTableGracePeriodMs?: number;
  /** Seed for every table's first hand. Random per table if not provided. */
  seed?: number;
}

export interface TableServer {
  wss: WebSocketServer;
  close(): void;
  /** Get server state for testing/monitoring. */
  getState(): Readonly<ServerState>;
}

/**
 * Create and start an OFC table server.
 */
export function createTableServer(config: TableServerConfig): TableServer {
  const state: ServerState = {
    tables: new Map(),
    tablesByCode: new Map(),
    connections: new Map(),
    sessions: new Map(),
    playerSessions: new Map(),
    tableCleanupTimers: new Map(),
  };

  const gracePeriodMs = config.abandonedTableGracePeriodMs ?? 30_000;

  const registry: ConnectionRegistry = {
    getConnection(playerId: string) {
      return state.connections.get(playerId) ?? null;
    },

    broadcast(table: Table, message: ServerMessage) {
      for (const playerId of table.playerIds) {
        if (table.connectedPlayerIds.has(playerId)) {
          const conn = state.connections.get(playerId);
          if (conn) sendJson(conn.ws, message);
        }
      }
    },

    sendTo(playerId: string, message: ServerMessage) {
      const conn = state.connections.get(playerId);
      if (conn) sendJson(conn.ws, message);
    },
  };

  const wss = new WebSocketServer({ port: config.port });

  wss.on('connection', (ws: WebSocket) => {
    const playerId = generatePlayerId();
    const sessionToken = generateSessionToken();

    const conn: WsConnection = {
      id: playerId,
      playerId,
      tableId: null,
      ws,
      send(message: ServerMessage) {
        sendJson(ws, message);
      },
    };

    state.connections.set(playerId, conn);
    state.sessions.set(sessionToken, { playerId, tableId: null });
    state.playerSessions.set(playerId, sessionToken);

    conn.send({ type: 'session-created', sessionToken, playerId });

    ws.on('message', (data: RawData) => {
      try {
        const message = parseClientMessage(data.toString());
        handleMessage(state, conn, message, registry, config);
      } catch (err) {
        const errorMsg = err instanceof Error ? err.message : 'Invalid message';
        conn.send({ type: 'error', message: errorMsg });
      }
    });

    ws.on('close', () => {
      handleClose(state, conn, registry, gracePeriodMs);
    });

    ws.on('error', () => {
      handleClose(state, conn, registry, gracePeriodMs);
    });
  });

  const cleanupMs = config.tableCleanupMs ?? 0;
  let cleanupInterval: ReturnType<typeof setInterval> | null = null;
  if (cleanupMs > 0) {
    cleanupInterval = setInterval(() => {
      cleanupStaleTables(state, cleanupMs);
    }, cleanupMs);
  }

  return {
    wss,
    close() {
      if (cleanupInterval) clearInterval(cleanupInterval);
      for (const timer of state.tableCleanupTimers.values()) {
        clearTimeout(timer);
      }
      state.tableCleanupTimers.clear();
      for (const table of state.tables.values()) {
        cleanupTable(table);
      }
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close();
    },
    getState() {
      return state;
    },
  };
}

// -- Message Handling --

function handleMessage(
  state: ServerState,
  conn: WsConnection,
  message: ClientMessage,
  registry: ConnectionRegistry,
  config: TableServerConfig,
): void {
  switch (message.type) {
    case 'create-table':
      handleCreateTable(state, conn, message, registry, config);
      break;

    case 'join-table':
      handleJoinTable(state, conn, message, registry);
      break;

    case 'resume-session':
      handleResumeSession(state, conn, message, registry);
      break;

    case 'set-ready': {
      const table = getPlayerTable(state, conn);
      if (!table) return;
      const error = setPlayerReady(table, conn.playerId, message.ready);
      if (error) {
        conn.send({ type: 'error', message: error });
        return;
      }
      broadcastLobbyState(table, registry);
      break;
    }

    case 'leave-table':
      handleLeaveTable(state, conn, registry);
      break;

    case 'start-game':
      handleStartGame(state, conn, registry);
      break;

    case 'next-hand': {
      const table = getPlayerTable(state, conn);
      if (table) startNextHand(table, conn.playerId, registry);
      break;
    }

    default: {
      const table = getPlayerTable(state, conn);
      if (table) handleGameAction(table, conn.playerId, message, registry);
      break;
    }
  }
}

function handleCreateTable(
  state: ServerState,
  conn: WsConnection,
  message: CreateTableMessage,
  registry: ConnectionRegistry,
  config: TableServerConfig,
): void {
  if (conn.tableId) {
    conn.send({ type: 'error', message: 'Already at a table' });
    return;
  }

  if (message.displayName.trim() === '') {
    conn.send({ type: 'error', message: 'Display name is required' });
    return;
  }

  const limit = maxPlayersFor(message);
  if (!Number.isInteger(message.maxPlayers) || message.maxPlayers < 2 || message.maxPlayers > limit) {
    conn.send({ type: 'error', message: `Max players must be between 2 and ${limit}` });
    return;
  }

  const tableConfig: TableConfig = {
    variant: message.variant,
    maxPlayers: message.maxPlayers,
    fantasyLandEnabled: message.fantasyLandEnabled ?? true,
    seed: config.seed,
  };

  const table = createTable(conn.playerId, tableConfig, message.displayName);
  state.tables.set(table.id, table);
  state.tablesByCode.set(table.code, table);
  seatConnection(state, conn, table);

  conn.send({ type: 'table-created', tableId: table.id, tableCode: table.code });
  broadcastLobbyState(table, registry);
}

function handleJoinTable(
  state: ServerState,
  conn: WsConnection,
  message: JoinTableMessage,
  registry: ConnectionRegistry,
): void {
  const code = message.tableCode.toUpperCase();

  if (conn.tableId) {
    const current = state.tables.get(conn.tableId);
    if (current && current.code === code) {
      handleReconnect(state, conn, current, registry);
      return;
    }
    conn.send({ type: 'error', message: 'Already at a table' });
    return;
  }

  const table = state.tablesByCode.get(code);
  if (!table) {
    conn.send({ type: 'error', message: 'Table not found' });
    return;
  }

  if (table.playerIds.includes(conn.playerId)) {
    handleReconnect(state, conn, table, registry);
    return;
  }

  const error = joinTable(table, conn.playerId, message.displayName);
  if (error) {
    conn.send({ type: 'error', message: error });
    return;
  }

  cancelTableCleanup(state, table.id);
  seatConnection(state, conn, table);

  registry.broadcast(table, {
    type: 'player-joined',
    playerId: conn.playerId,
    playerCount: table.playerIds.length,
    maxPlayers: table.config.maxPlayers,
  });
  broadcastLobbyState(table, registry);
}

function handleResumeSession(
  state: ServerState,
  conn: WsConnection,
  message: ResumeSessionMessage,
  registry: ConnectionRegistry,
): void {
  const session = state.sessions.get(message.sessionToken);
  if (!session) {
    conn.send({ type: 'error', message: 'Invalid session token' });
    return;
  }

  const oldPlayerId = session.playerId;

  // A repeated resume on the same connection has already been remapped.
  if (conn.playerId === oldPlayerId) {
    conn.send({ type: 'session-created', sessionToken: message.sessionToken, playerId: oldPlayerId });
    return;
  }

  const oldConn = state.connections.get(oldPlayerId);
  if (oldConn && oldConn !== conn) {
    state.connections.delete(oldPlayerId);
  }

  // Drop the session created for this connection and take over the old one.
  state.connections.delete(conn.playerId);
  const newToken = state.playerSessions.get(conn.playerId);
  if (newToken) {
    state.sessions.delete(newToken);
    state.playerSessions.delete(conn.playerId);
  }

  conn.playerId = oldPlayerId;
  conn.id = oldPlayerId;
  state.connections.set(oldPlayerId, conn);
  state.playerSessions.set(oldPlayerId, message.sessionToken);

  conn.send({ type: 'session-created', sessionToken: message.sessionToken, playerId: oldPlayerId });

  if (!session.tableId) return;

  const table = state.tables.get(session.tableId);
  if (!table || !table.playerIds.includes(oldPlayerId)) {
    session.tableId = null;
    return;
  }

  handleReconnect(state, conn, table, registry);
}

function handleLeaveTable(state: ServerState, conn: WsConnection, registry: ConnectionRegistry): void {
  const table = getPlayerTable(state, conn);
  if (!table) return;

  const result = removePlayer(table, conn.playerId);
  if (result.error) {
    conn.send({ type: 'error', message: result.error });
    return;
  }

  conn.tableId = null;
  const session = sessionOf(state, conn.playerId);
  if (session) session.tableId = null;

  if (table.playerIds.length > 0) {
    registry.broadcast(table, {
      type: 'player-left',
      playerId: conn.playerId,
      playerCount: table.playerIds.length,
      maxPlayers: table.config.maxPlayers,
      newHostId: result.newHostId,
    });
    broadcastLobbyState(table, registry);
  } else {
    closeTable(state, table);
  }
}

function handleReconnect(
  state: ServerState,
  conn: WsConnection,
  table: Table,
  registry: ConnectionRegistry,
): void {
  cancelTableCleanup(state, table.id);
  reconnectPlayer(table, conn.playerId);
  seatConnection(state, conn, table);

  if (table.status === 'waiting') {
    broadcastLobbyState(table, registry);
    registry.broadcast(table, { type: 'player-reconnected', playerId: conn.playerId });
  } else {
    handleReconnection(table, conn.playerId, registry);
  }
}

function handleStartGame(state: ServerState, conn: WsConnection, registry: ConnectionRegistry): void {
  const table = getPlayerTable(state, conn);
  if (!table) return;

  if (table.hostId !== conn.playerId) {
    conn.send({ type: 'error', message: 'Only the host can start the game' });
    return;
  }

  if (!canStartGame(table)) {
    conn.send({ type: 'error', message: 'Not enough ready players to start' });
    return;
  }

  startGame(table, registry);
}

// -- Disconnection --

function handleClose(
  state: ServerState,
  conn: WsConnection,
  registry: ConnectionRegistry,
  gracePeriodMs: number,
): void {
  // A resumed session already points at a newer connection.
  const currentConn = state.connections.get(conn.playerId);
  if (currentConn && currentConn !== conn) {
    return;
  }

  const table = conn.tableId ? state.tables.get(conn.tableId) : undefined;
  if (table) {
    disconnectPlayer(table, conn.playerId);

    if (table.status === 'waiting') {
      broadcastLobbyState(table, registry);
    } else {
      handleDisconnection(table, conn.playerId, registry);
    }

    if (allPlayersDisconnected(table)) {
      scheduleTableCleanup(state, table, gracePeriodMs);
    }
  }

  // Sessions survive so the player can resume.
  state.connections.delete(conn.playerId);
}

// -- Grace Period --

function scheduleTableCleanup(state: ServerState, table: Table, gracePeriodMs: number): void {
  cancelTableCleanup(state, table.id);

  const timer = setTimeout(() => {
    state.tableCleanupTimers.delete(table.id);
    if (state.tables.has(table.id) && allPlayersDisconnected(table)) {
      closeTable(state, table);
    }
  }, gracePeriodMs);

  state.tableCleanupTimers.set(table.id, timer);
}

function cancelTableCleanup(state: ServerState, tableId: string): void {
  const timer = state.tableCleanupTimers.get(tableId);
  if (timer) {
    clearTimeout(timer);
    state.tableCleanupTimers.delete(tableId);
  }
}

// -- Cleanup --

function cleanupStaleTables(state: ServerState, maxAgeMs: number): void {
  const now = Date.now();
  for (const table of state.tables.values()) {
    const inactive = now - table.lastActivityAt > maxAgeMs;
    if (inactive && allPlayersDisconnected(table)) {
      for (const playerId of table.playerIds) {
        const token = state.playerSessions.get(playerId);
        if (token) {
          state.sessions.delete(token);
          state.playerSessions.delete(playerId);
        }
      }
      closeTable(state, table);
    }
  }
}

function closeTable(state: ServerState, table: Table): void {
  cancelTableCleanup(state, table.id);
  cleanupTable(table);
  state.tables.delete(table.id);
  state.tablesByCode.delete(table.code);
}

// -- Helpers --

function sessionOf(state: ServerState, playerId: string): Session | undefined {
  const token = state.playerSessions.get(playerId);
  return token ? state.sessions.get(token) : undefined;
}

function seatConnection(state: ServerState, conn: WsConnection, table: Table): void {
  conn.tableId = table.id;
  const session = sessionOf(state, conn.playerId);
  if (session) session.tableId = table.id;
}

function getPlayerTable(state: ServerState, conn: WsConnection): Table | null {
  if (!conn.tableId) {
    conn.send({ type: 'error', message: 'Not at a table' });
    return null;
  }
  const table = state.tables.get(conn.tableId);
  if (!table) {
    conn.send({ type: 'error', message: 'Table not found' });
    return null;
  }
  return table;
}

function broadcastLobbyState(table: Table, registry: ConnectionRegistry): void {
  if (table.status !== 'waiting') return;
  registry.broadcast(table, { type: 'lobby-state', lobby: getLobbyState(table) });
}

function sendJson(ws: WebSocket, data: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

let playerCounter = 0;
function generatePlayerId(): string {
  return `player-${++playerCounter}-${Math.random().toString(36).slice(2, 6)}`;
}

function generateSessionToken(): string {
  const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
  let token = '';
  for (let i = 0; i < 32; i++) {
    token += chars[Math.floor(Math.random() * chars.length)];
  }
  return token;
}
