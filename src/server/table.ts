/**
 * Table management for multiplayer OFC games.
 *
 * Handles table lifecycle: creation, joining, seat tracking,
 * reconnection, lobby state, and cleanup.
 */

import type { Table, TableConfig, TableStatus, SeatInfo, LobbyState, LobbyPlayer } from './types.js';
import { rulesForVariant } from '../rules.js';

/**
 * Generate a short table code (6 uppercase alphanumeric chars).
 */
export function generateTableCode(): string {
  const chars = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789'; // no I/O/0/1
  let code = '';
  for (let i = 0; i < 6; i++) {
    code += chars[Math.floor(Math.random() * chars.length)];
  }
  return code;
}

export function generateTableId(): string {
  return `table-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Largest table the variant allows.
 */
export function maxPlayersFor(config: Pick<TableConfig, 'variant'>): number {
  return rulesForVariant(config.variant).maxPlayers;
}

/**
 * Create a new table with the host in the first seat.
 */
export function createTable(hostId: string, config: TableConfig, displayName?: string): Table {
  const now = Date.now();
  const info: SeatInfo = { displayName: displayName ?? 'Player 1' };

  return {
    id: generateTableId(),
    code: generateTableCode(),
    hostId,
    status: 'waiting',
    config: { ...config },
    playerIds: [hostId],
    connectedPlayerIds: new Set([hostId]),
    seatInfo: new Map([[hostId, info]]),
    readyStatus: new Map([[hostId, false]]),
    game: null,
    seed: null,
    lastActivityAt: now,
    createdAt: now,
  };
}

/**
 * Seat a player at a table. Returns error string if invalid.
 */
export function joinTable(table: Table, playerId: string, displayName?: string): string | null {
  if (table.status !== 'waiting') {
    return 'Table is not accepting new players';
  }

  if (table.playerIds.length >= table.config.maxPlayers) {
    return 'Table is full';
  }

  if (table.playerIds.includes(playerId)) {
    return 'Already at this table';
  }

  table.playerIds.push(playerId);
  table.connectedPlayerIds.add(playerId);
  table.seatInfo.set(playerId, { displayName: displayName ?? `Player ${table.playerIds.length}` });
  table.readyStatus.set(playerId, false);
  table.lastActivityAt = Date.now();

  return null;
}

/**
 * Mark a player as disconnected (but keep the seat).
 */
export function disconnectPlayer(table: Table, playerId: string): boolean {
  if (!table.playerIds.includes(playerId)) return false;
  table.connectedPlayerIds.delete(playerId);
  return true;
}

export function reconnectPlayer(table: Table, playerId: string): boolean {
  if (!table.playerIds.includes(playerId)) return false;
  table.connectedPlayerIds.add(playerId);
  return true;
}

export function isPlayerConnected(table: Table, playerId: string): boolean {
  return table.connectedPlayerIds.has(playerId);
}

export function allPlayersDisconnected(table: Table): boolean {
  return table.connectedPlayerIds.size === 0;
}

/**
 * At least two seats taken and everyone ready.
 */
export function canStartGame(table: Table): boolean {
  if (table.status !== 'waiting') return false;
  if (table.playerIds.length < 2) return false;
  return allPlayersReady(table);
}

export function allPlayersReady(table: Table): boolean {
  for (const playerId of table.playerIds) {
    if (!table.readyStatus.get(playerId)) return false;
  }
  return true;
}

export function setPlayerReady(table: Table, playerId: string, ready: boolean): string | null {
  if (!table.playerIds.includes(playerId)) return 'Not at this table';
  if (table.status !== 'waiting') return 'Game already started';

  table.readyStatus.set(playerId, ready);
  table.lastActivityAt = Date.now();
  return null;
}

/**
 * Remove a player from the lobby (before the game starts).
 * If the host leaves, the next player becomes host.
 */
export function removePlayer(table: Table, playerId: string): { error?: string; newHostId?: string } {
  if (!table.playerIds.includes(playerId)) return { error: 'Not at this table' };
  if (table.status !== 'waiting') return { error: 'Cannot leave during a game' };

  table.playerIds = table.playerIds.filter(id => id !== playerId);
  table.connectedPlayerIds.delete(playerId);
  table.seatInfo.delete(playerId);
  table.readyStatus.delete(playerId);
  table.lastActivityAt = Date.now();

  if (table.hostId === playerId && table.playerIds.length > 0) {
    const newHostId = table.playerIds[0];
    table.hostId = newHostId;
    table.readyStatus.set(newHostId, false);
    return { newHostId };
  }

  return {};
}

export function getLobbyState(table: Table): LobbyState {
  const players: LobbyPlayer[] = table.playerIds.map(pid => ({
    playerId: pid,
    displayName: table.seatInfo.get(pid)?.displayName ?? 'Unknown',
    isReady: table.readyStatus.get(pid) ?? false,
    isConnected: table.connectedPlayerIds.has(pid),
    isHost: pid === table.hostId,
  }));

  return {
    tableId: table.id,
    tableCode: table.code,
    config: { ...table.config },
    players,
    canStart: canStartGame(table),
  };
}

export function setTableStatus(table: Table, status: TableStatus): void {
  table.status = status;
  table.lastActivityAt = Date.now();
}

/**
 * Close a table and drop its game.
 */
export function cleanupTable(table: Table): void {
  table.status = 'closed';
  table.game = null;
  table.connectedPlayerIds.clear();
}
