import { describe, it, expect } from 'vitest';
import { partitionState, buildPrivateState, buildPublicState, isEventVisibleTo } from '../state-partition.js';
import { Game } from '../../game.js';
import { Deck } from '../../deck.js';
import { parseCard, parseCards } from '../../cards.js';
import type { GameEvent } from '../../types.js';

const ALICE_DEAL = parseCards('Ah Kh Qh Jh Th');
const BOB_DEAL = parseCards('2c 3c 4c 5c 6c');

function createGame(): Game {
  return new Game({
    id: 'hand-1',
    seats: [
      { id: 'alice', name: 'Alice' },
      { id: 'bob', name: 'Bob' },
    ],
    seed: 1,
    deck: Deck.stacked([...ALICE_DEAL, ...BOB_DEAL]),
  });
}

describe('partitionState', () => {
  it('shows a seat its own cards and only counts for opponents', () => {
    const game = createGame();
    game.placeInitialCards('alice', [
      { card: parseCard('Ah'), row: 'top' },
      { card: parseCard('Kh'), row: 'middle' },
      { card: parseCard('Qh'), row: 'middle' },
      { card: parseCard('Jh'), row: 'bottom' },
      { card: parseCard('Th'), row: 'bottom' },
    ]);

    const view = partitionState(game, 'bob');

    expect(view.gameId).toBe('hand-1');
    expect(view.handNumber).toBe(1);
    expect(view.version).toBe(1);
    expect(view.status).toBe('in-progress');
    expect(view.variant).toBe('standard');
    expect(view.roundNumber).toBe(1);
    expect(view.currentPlayerId).toBe('bob');
    expect(view.remainingCount).toBe(42);
    expect(view.self.hand).toEqual(BOB_DEAL);
    expect(view.self.availableRows).toEqual(['top', 'middle', 'bottom']);
    expect(view.opponents).toEqual([
      {
        id: 'alice',
        displayName: 'Alice',
        status: 'active',
        rows: {
          top: parseCards('Ah'),
          middle: parseCards('Kh Qh'),
          bottom: parseCards('Jh Th'),
        },
        handCount: 0,
        inFantasyLand: false,
        isConnected: true,
      },
    ]);
    expect(view.finalScores).toBeNull();
    expect(view.winnerId).toBeNull();
  });

  it('prefers table display names and reports connection state', () => {
    const game = createGame();
    const seatInfo = new Map([
      ['alice', { displayName: 'Ace' }],
      ['bob', { displayName: 'Bobby' }],
    ]);

    const view = partitionState(game, 'alice', seatInfo, new Set(['alice']));

    expect(view.self.displayName).toBe('Ace');
    expect(view.opponents[0].displayName).toBe('Bobby');
    expect(view.opponents[0].isConnected).toBe(false);
  });

  it('throws for a player who is not seated', () => {
    expect(() => partitionState(createGame(), 'carol')).toThrow('Player carol is not seated in game hand-1');
  });
});

describe('seat states', () => {
  it('builds the private view with held cards', () => {
    const game = createGame();
    const alice = game.getPlayer('alice');
    if (!alice) throw new Error('missing seat');

    expect(buildPrivateState(alice)).toEqual({
      id: 'alice',
      displayName: 'Alice',
      status: 'active',
      rows: { top: [], middle: [], bottom: [] },
      hand: ALICE_DEAL,
      streetKind: 'initial',
      availableRows: ['top', 'middle', 'bottom'],
      inFantasyLand: false,
    });
  });

  it('builds the public view with a hand count', () => {
    const game = createGame();
    const bob = game.getPlayer('bob');
    if (!bob) throw new Error('missing seat');

    const view = buildPublicState(bob, false);
    expect(view.handCount).toBe(5);
    expect(view.isConnected).toBe(false);
    expect(view).not.toHaveProperty('hand');
  });
});

describe('isEventVisibleTo', () => {
  const discard: GameEvent = {
    type: 'card-discarded',
    gameId: 'hand-1',
    playerId: 'alice',
    card: parseCard('2d'),
    roundNumber: 2,
  };
  const placed: GameEvent = {
    type: 'card-placed',
    gameId: 'hand-1',
    playerId: 'alice',
    card: parseCard('2d'),
    row: 'top',
    roundNumber: 2,
    placementSequence: 6,
  };

  it('shows discards to their owner only', () => {
    expect(isEventVisibleTo(discard, 'alice')).toBe(true);
    expect(isEventVisibleTo(discard, 'bob')).toBe(false);
  });

  it('shows placements to everyone', () => {
    expect(isEventVisibleTo(placed, 'bob')).toBe(true);
  });
});
