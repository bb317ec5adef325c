/**
 * Game controller: drives a table's Game from client messages.
 *
 * The controller is the authoritative game server. Clients send intents,
 * the Game validates and applies them, and the controller relays the
 * resulting events and a fresh per-seat view to everyone at the table.
 * Rule violations come back to the sender as `error` messages.
 */

import { Game } from '../game.js';
import { parseCard } from '../cards.js';
import { createRules } from '../rules.js';
import type { CardPlacement, PlayerId } from '../types.js';
import type {
  Table,
  Connection,
  ServerMessage,
  GameActionMessage,
  WirePlacement,
} from './types.js';
import { partitionState, isEventVisibleTo } from './state-partition.js';
import { setTableStatus } from './table.js';

// -- Connection Registry --

export interface ConnectionRegistry {
  /** Get connection for a player. Returns null if disconnected. */
  getConnection(playerId: string): Connection | null;
  /** Broadcast a message to all connected players at a table. */
  broadcast(table: Table, message: ServerMessage): void;
  sendTo(playerId: string, message: ServerMessage): void;
}

// -- Game Lifecycle --

/**
 * Deal the first hand at a table and send each seat its view.
 */
export function startGame(table: Table, registry: ConnectionRegistry): void {
  const seed = table.config.seed ?? Date.now();
  const rules = createRules({
    variant: table.config.variant,
    fantasyLandEnabled: table.config.fantasyLandEnabled,
  });

  table.seed = seed;
  table.game = new Game({
    id: `${table.id}-hand-1`,
    seats: table.playerIds.map(id => ({ id, name: table.seatInfo.get(id)?.displayName ?? id })),
    seed,
    rules,
  });
  setTableStatus(table, 'playing');

  announceHand(table, registry);
}

/**
 * Deal the next hand once the current one is scored. Fantasy Land
 * qualification carries over from the finished hand.
 */
export function startNextHand(table: Table, playerId: string, registry: ConnectionRegistry): void {
  const game = table.game;
  if (!game || table.status !== 'finished') {
    registry.sendTo(playerId, { type: 'error', message: 'No finished hand to follow' });
    return;
  }
  if (table.hostId !== playerId) {
    registry.sendTo(playerId, { type: 'error', message: 'Only the host can deal the next hand' });
    return;
  }

  const handNumber = game.handNumber + 1;
  table.game = game.createNextHand(`${table.id}-hand-${handNumber}`, {
    seed: (table.seed ?? 0) + handNumber - 1,
  });
  setTableStatus(table, 'playing');

  announceHand(table, registry);
}

function announceHand(table: Table, registry: ConnectionRegistry): void {
  const game = table.game;
  if (!game) return;

  for (const playerId of table.playerIds) {
    registry.sendTo(playerId, {
      type: 'game-started',
      state: partitionState(game, playerId, table.seatInfo, table.connectedPlayerIds),
    });
  }
  relayEvents(table, game, registry);
}

// -- Actions --

/**
 * Whether the client acted on an older version of the game.
 */
export function isStaleAction(game: Game, message: GameActionMessage): boolean {
  return message.expectedVersion !== undefined && message.expectedVersion !== game.version;
}

/**
 * Apply a client game action. Every failure is reported to the sender only.
 */
export function handleGameAction(
  table: Table,
  playerId: string,
  message: GameActionMessage,
  registry: ConnectionRegistry,
): void {
  const game = table.game;
  if (!game || table.status !== 'playing') {
    registry.sendTo(playerId, { type: 'error', message: 'Game not in progress' });
    return;
  }

  if (!table.playerIds.includes(playerId)) {
    registry.sendTo(playerId, { type: 'error', message: 'Not a player in this game' });
    return;
  }

  if (isStaleAction(game, message)) {
    registry.sendTo(playerId, {
      type: 'error',
      message: `Stale action: expected version ${message.expectedVersion}, game is at version ${game.version}`,
    });
    return;
  }

  try {
    applyAction(game, playerId, message);
  } catch (err: unknown) {
    const errorMsg = err instanceof Error ? err.message : 'Unknown error';
    registry.sendTo(playerId, { type: 'error', message: errorMsg });
    return;
  }

  if (game.status === 'completed') {
    setTableStatus(table, 'finished');
  }
  relayEvents(table, game, registry);
  broadcastState(table, game, registry);
}

function applyAction(game: Game, playerId: PlayerId, message: GameActionMessage): void {
  switch (message.type) {
    case 'place-card':
      game.placeCard(playerId, parseCard(message.card), message.row);
      break;

    case 'place-initial':
      game.placeInitialCards(playerId, toPlacements(message.placements));
      break;

    case 'pineapple-turn': {
      const player = game.getPlayer(playerId);
      if (!player) {
        throw new Error(`Player ${playerId} is not in this game`);
      }
      game.playPineappleTurn({
        playerId,
        dealtCards: player.handCards,
        placements: toPlacements(message.placements),
        discardedCard: parseCard(message.discard),
      });
      break;
    }

    case 'fantasy-land-layout':
      game.setFantasyLandLayout(playerId, toPlacements(message.placements));
      break;
  }
}

function toPlacements(placements: readonly WirePlacement[]): CardPlacement[] {
  return placements.map(p => ({ card: parseCard(p.card), row: p.row }));
}

// -- Broadcasting --

function relayEvents(table: Table, game: Game, registry: ConnectionRegistry): void {
  for (const event of game.pullEvents()) {
    for (const playerId of table.playerIds) {
      if (table.connectedPlayerIds.has(playerId) && isEventVisibleTo(event, playerId)) {
        registry.sendTo(playerId, { type: 'game-event', event });
      }
    }
  }
}

function broadcastState(table: Table, game: Game, registry: ConnectionRegistry): void {
  for (const playerId of table.playerIds) {
    if (!table.connectedPlayerIds.has(playerId)) continue;
    registry.sendTo(playerId, {
      type: 'game-state',
      state: partitionState(game, playerId, table.seatInfo, table.connectedPlayerIds),
    });
  }
}

// -- Reconnection --

/**
 * Bring a returning player up to date and tell the table.
 */
export function handleReconnection(table: Table, playerId: string, registry: ConnectionRegistry): void {
  registry.broadcast(table, { type: 'player-reconnected', playerId });

  if (table.game) {
    registry.sendTo(playerId, {
      type: 'game-state',
      state: partitionState(table.game, playerId, table.seatInfo, table.connectedPlayerIds),
    });
  }
}

/**
 * The seat is kept; the game waits for the player to return.
 */
export function handleDisconnection(table: Table, playerId: string, registry: ConnectionRegistry): void {
  registry.broadcast(table, { type: 'player-disconnected', playerId });
}
