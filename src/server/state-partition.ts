/**
 * State partitioning: splits the authoritative Game into per-client views.
 *
 * Each client receives its own held cards and the rows of every seat.
 * Opponents' held cards are reduced to a count, and discards are only
 * reported to the seat that made them.
 */

import type { Game } from '../game.js';
import type { Player } from '../player.js';
import type { Card, GameEvent, PlayerId, Row } from '../types.js';
import { ROWS } from '../types.js';
import type { ClientGameState, PrivateSeatState, PublicSeatState, SeatInfo } from './types.js';

function rowsOf(player: Player): Record<Row, Card[]> {
  const rows: Record<Row, Card[]> = { top: [], middle: [], bottom: [] };
  for (const row of ROWS) {
    rows[row] = player.getRowCards(row);
  }
  return rows;
}

function displayNameOf(player: Player, seatInfo?: Map<string, SeatInfo>): string {
  return seatInfo?.get(player.id)?.displayName ?? player.name;
}

export function buildPrivateState(player: Player, seatInfo?: Map<string, SeatInfo>): PrivateSeatState {
  return {
    id: player.id,
    displayName: displayNameOf(player, seatInfo),
    status: player.status,
    rows: rowsOf(player),
    hand: player.handCards,
    streetKind: player.streetKind,
    availableRows: player.getAvailablePositions(),
    inFantasyLand: player.inFantasyLand,
  };
}

export function buildPublicState(
  player: Player,
  isConnected: boolean,
  seatInfo?: Map<string, SeatInfo>,
): PublicSeatState {
  return {
    id: player.id,
    displayName: displayNameOf(player, seatInfo),
    status: player.status,
    rows: rowsOf(player),
    handCount: player.handCards.length,
    inFantasyLand: player.inFantasyLand,
    isConnected,
  };
}

/**
 * Build the client-visible game state for one seat.
 *
 * @param connected - Player IDs currently connected; everyone when omitted.
 */
export function partitionState(
  game: Game,
  playerId: PlayerId,
  seatInfo?: Map<string, SeatInfo>,
  connected?: ReadonlySet<string>,
): ClientGameState {
  const self = game.getPlayer(playerId);
  if (!self) {
    throw new Error(`Player ${playerId} is not seated in game ${game.id}`);
  }

  return {
    gameId: game.id,
    handNumber: game.handNumber,
    version: game.version,
    status: game.status,
    variant: game.rules.variant,
    roundNumber: game.roundNumber,
    currentPlayerId: game.currentPlayerId,
    remainingCount: game.remainingCards().length,
    self: buildPrivateState(self, seatInfo),
    opponents: game.players
      .filter(p => p.id !== playerId)
      .map(p => buildPublicState(p, connected?.has(p.id) ?? true, seatInfo)),
    finalScores: game.finalScores,
    winnerId: game.winnerId,
  };
}

/**
 * Whether a game event may be shown to the given seat.
 */
export function isEventVisibleTo(event: GameEvent, playerId: PlayerId): boolean {
  return event.type !== 'card-discarded' || event.playerId === playerId;
}
