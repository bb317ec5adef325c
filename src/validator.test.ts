import { describe, it, expect } from 'vitest';
import { GameValidator } from './validator.js';
import type { TableView } from './validator.js';
import { FantasyLandManager } from './fantasy-land.js';
import { HandEvaluator } from './hand-evaluator.js';
import { Game } from './game.js';
import { Player } from './player.js';
import { buildStandardDeck, formatCard, parseCard, parseCards, sameCard } from './cards.js';
import { pineappleRules, standardRules } from './rules.js';
import { ROWS } from './types.js';
import type { Card, CardPlacement, Row } from './types.js';

const evaluator = new HandEvaluator();
const validator = new GameValidator(evaluator, new FantasyLandManager(evaluator));

const SEATS = [
  { id: 'alice', name: 'Alice' },
  { id: 'bob', name: 'Bob' },
];

/** Initial cards: first three to the bottom, the rest to the middle. */
function initialPlacements(cards: readonly Card[]): CardPlacement[] {
  return cards.map((card, i): CardPlacement => ({ card, row: i < 3 ? 'bottom' : 'middle' }));
}

function holder(game: Game, playerId: string): Player {
  const player = game.getPlayer(playerId);
  if (!player) throw new Error(`No seat ${playerId}`);
  return player;
}

/** A pineapple game where both initial streets have been played. */
function pineappleOnStreet(): Game {
  const game = new Game({ id: 'pine', seats: SEATS, seed: 5, rules: pineappleRules() });
  for (const { id } of SEATS) {
    game.placeInitialCards(id, initialPlacements(holder(game, id).handCards));
  }
  return game;
}

/** A lone player holding 13 cards, with some of them already placed. */
function partialLayout(placed: Partial<Record<Row, string>>, held = ''): Player {
  const player = new Player({ id: 'solo', name: 'Solo', evaluator });
  const placements = ROWS.flatMap(row => parseCards(placed[row] ?? '').map(card => ({ card, row })));
  const cards = [...placements.map(p => p.card), ...parseCards(held)];
  const filler = buildStandardDeck().filter(c => !cards.some(x => sameCard(x, c)));

  player.enterFantasyLand();
  player.receiveFantasyLandCards([...cards, ...filler.slice(0, 13 - cards.length)]);
  for (const { card, row } of placements) {
    player.placeCard(card, row);
  }
  return player;
}

describe('validateTurnOrder', () => {
  it('accepts the current player only', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    expect(validator.validateTurnOrder(game, 'alice')).toEqual({ isValid: true });
    expect(validator.validateTurnOrder(game, 'bob')).toEqual({
      isValid: false,
      errorMessage: "It is not bob's turn",
    });
    expect(validator.validateTurnOrder(game, 'zed').errorMessage).toBe('Player zed is not in this game');
  });

  it('rejects moves in a game that is not in progress', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    game.pause();
    expect(validator.validateTurnOrder(game, 'alice').errorMessage).toBe('Game is paused');
  });
});

describe('validateCardPlacement', () => {
  it('accepts a held card in a row with room', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const [card] = holder(game, 'alice').handCards;
    expect(validator.validateCardPlacement(game, 'alice', card, 'bottom')).toEqual({ isValid: true });
  });

  it('rejects a card that is not held', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const [card] = holder(game, 'bob').handCards;
    expect(validator.validateCardPlacement(game, 'alice', card, 'bottom')).toEqual({
      isValid: false,
      errorMessage: `Player alice does not hold ${formatCard(card)}`,
    });
  });

  it('routes pineapple streets to the whole-turn action', () => {
    const game = pineappleOnStreet();
    const [card] = holder(game, 'alice').handCards;
    expect(validator.validateCardPlacement(game, 'alice', card, 'top').errorMessage).toBe(
      'Pineapple streets are played as a whole turn: place two cards and discard one',
    );
  });
});

describe('canPlaceCardSafely', () => {
  it('warns when the placement settles a foul', () => {
    const player = partialLayout({ top: 'As Ah Kc', middle: 'Kh Qd Jc 9s' }, '8h');
    expect(validator.canPlaceCardSafely(player, parseCard('8h'), 'middle')).toEqual({
      isValid: true,
      warningMessage: 'This placement fouls the layout: the top row is not weaker than the middle row',
    });
  });

  it('warns when the top outranks the middle so far', () => {
    const player = partialLayout({ top: 'As Ah Kc', middle: 'Kh Qd' }, 'Jc');
    expect(validator.canPlaceCardSafely(player, parseCard('Jc'), 'middle')).toEqual({
      isValid: true,
      warningMessage: 'This placement risks fouling: the top row outranks the middle row so far',
    });
  });

  it('stays quiet for a safe placement', () => {
    const player = partialLayout({ top: 'As Ah Kc', middle: 'Kh Qd' }, 'Jc');
    expect(validator.canPlaceCardSafely(player, parseCard('Jc'), 'bottom')).toEqual({ isValid: true });
  });

  it('rejects a full row', () => {
    const player = partialLayout({ top: '2s 3h 4c' }, '8h');
    expect(validator.canPlaceCardSafely(player, parseCard('8h'), 'top')).toEqual({
      isValid: false,
      errorMessage: 'The top row is full',
    });
  });
});

describe('validateRowStrengthProgression', () => {
  it('fails a partial layout whose full rows already foul', () => {
    const player = partialLayout({ top: 'As Ah Kc', middle: 'Kh Qd Jc 9s 8h' });
    expect(validator.validateRowStrengthProgression(player)).toEqual({
      isValid: false,
      errorMessage: 'Layout is fouled: the top row is not weaker than the middle row',
    });
  });

  it('passes a partial layout with no full pair of rows', () => {
    const player = partialLayout({ top: 'As Ah', middle: 'Kh Qd Jc 9s 8h' });
    expect(validator.validateRowStrengthProgression(player)).toEqual({ isValid: true });
  });
});

describe('validatePineappleAction', () => {
  it('fails on a wrong dealt count before looking at placements', () => {
    const game = pineappleOnStreet();
    const dealt = holder(game, 'alice').handCards;
    const result = validator.validatePineappleAction(game, {
      playerId: 'alice',
      dealtCards: dealt.slice(0, 2),
      placements: [],
      discardedCard: dealt[0],
    });
    expect(result).toEqual({ isValid: false, errorMessage: 'Must deal 3 cards, got 2' });
  });

  it('accepts two placements and a discard of the dealt cards', () => {
    const game = pineappleOnStreet();
    const [a, b, c] = holder(game, 'alice').handCards;
    const result = validator.validatePineappleAction(game, {
      playerId: 'alice',
      dealtCards: [a, b, c],
      placements: [
        { card: a, row: 'top' },
        { card: b, row: 'top' },
      ],
      discardedCard: c,
    });
    expect(result).toEqual({ isValid: true });
  });

  it('needs exactly two placements', () => {
    const game = pineappleOnStreet();
    const [a, b, c] = holder(game, 'alice').handCards;
    const result = validator.validatePineappleAction(game, {
      playerId: 'alice',
      dealtCards: [a, b, c],
      placements: [{ card: a, row: 'top' }],
      discardedCard: c,
    });
    expect(result.errorMessage).toBe('Must place 2 cards, got 1');
  });

  it('rejects discarding a placed card', () => {
    const game = pineappleOnStreet();
    const [a, b, c] = holder(game, 'alice').handCards;
    const result = validator.validatePineappleAction(game, {
      playerId: 'alice',
      dealtCards: [a, b, c],
      placements: [
        { card: a, row: 'top' },
        { card: b, row: 'top' },
      ],
      discardedCard: a,
    });
    expect(result.errorMessage).toBe('Each dealt card must be either placed or discarded, once');
  });

  it('only applies to the pineapple variant', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const [a, b, c] = holder(game, 'alice').handCards;
    const result = validator.validatePineappleAction(game, {
      playerId: 'alice',
      dealtCards: [a, b, c],
      placements: [],
      discardedCard: c,
    });
    expect(result.errorMessage).toBe('Pineapple turns are only played in the pineapple variant');
  });
});

describe('validateInitialPlacement', () => {
  it('accepts the dealt cards in legal slots', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const placements = initialPlacements(holder(game, 'alice').handCards);
    expect(validator.validateInitialPlacement(game, { playerId: 'alice', placements })).toEqual({
      isValid: true,
    });
  });

  it('rejects a card used twice', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const cards = holder(game, 'alice').handCards;
    const placements = initialPlacements([...cards.slice(0, 4), cards[0]]);
    expect(validator.validateInitialPlacement(game, { playerId: 'alice', placements }).errorMessage).toBe(
      'Initial placement uses a card twice',
    );
  });

  it('rejects the wrong number of cards', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const placements = initialPlacements(holder(game, 'alice').handCards.slice(0, 4));
    expect(validator.validateInitialPlacement(game, { playerId: 'alice', placements }).errorMessage).toBe(
      'Must place 5 initial cards, got 4',
    );
  });

  it('rejects cards that were not dealt to the player', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const placements = initialPlacements(holder(game, 'bob').handCards);
    expect(validator.validateInitialPlacement(game, { playerId: 'alice', placements }).errorMessage).toBe(
      'Player alice must place exactly the initial cards dealt',
    );
  });
});

describe('Fantasy Land checks', () => {
  it('reports entry and stay for complete layouts', () => {
    const queens = partialLayout({ top: 'Qs Qh 3c', middle: 'Kd Kc 4h 4d 9s', bottom: '6d 7d 8h 9h Th' });
    expect(validator.validateFantasyLandEntry(queens)).toEqual({ isValid: true });
    expect(validator.validateFantasyLandStay(queens).isValid).toBe(false);

    const trips = partialLayout({ top: '7c 7d 7h', middle: 'Ks Kh Kd 2c 2h', bottom: '8s 8h 8d 8c 3s' });
    expect(validator.validateFantasyLandStay(trips)).toEqual({ isValid: true });
  });

  it('does not qualify a fouled layout', () => {
    const fouled = partialLayout({ top: 'As Ah Kc', middle: 'Kh Qd Jc 9s 8h', bottom: '3s 3h 3d 7c 7d' });
    expect(fouled.isFouled).toBe(true);
    expect(validator.validateFantasyLandEntry(fouled).errorMessage).toBe(
      'A fouled layout cannot enter Fantasy Land',
    );
  });

  it('requires a complete layout', () => {
    const partial = partialLayout({ top: 'Qs Qh 3c' });
    expect(validator.validateFantasyLandEntry(partial).errorMessage).toBe('Layout is not complete');
  });
});

describe('whole-game checks', () => {
  it('finds every card exactly once in a fresh game', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    expect(validator.validateCardUniqueness(game)).toEqual({ isValid: true });
    expect(validator.validateMultiPlayerGameState(game)).toEqual({ isValid: true });
  });

  it('reports a duplicated card', () => {
    const table: TableView = {
      status: 'in-progress',
      rules: standardRules(),
      players: [],
      currentPlayerId: null,
      remainingCards: () => parseCards('Ah Kd Ah'),
      discardedCards: () => [],
    };
    expect(validator.validateCardUniqueness(table).errorMessage).toBe('Card Ah appears more than once');
  });

  it('reports missing cards', () => {
    const table: TableView = {
      status: 'in-progress',
      rules: standardRules(),
      players: [],
      currentPlayerId: null,
      remainingCards: () => buildStandardDeck().slice(1),
      discardedCards: () => [],
    };
    expect(validator.validateCardUniqueness(table).errorMessage).toBe(
      'Expected 52 cards across the game, found 51',
    );
  });

  it('reports incomplete layouts', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    expect(validator.checkGameCompletion(game).errorMessage).toBe('Layouts still incomplete: alice, bob');
  });

  it('summarises named checks', () => {
    const game = new Game({ id: 'g', seats: SEATS, seed: 1 });
    const summary = validator.getValidationSummary(game);
    expect(Object.keys(summary)).toEqual([
      'gameState',
      'cardUniqueness',
      'gameCompletion',
      'turnOrder',
      'layout:alice',
      'layout:bob',
    ]);
    expect(summary.turnOrder).toEqual({ isValid: true });
  });
});

describe('getAvailablePositions', () => {
  it('lists rows with room in top-to-bottom order', () => {
    const player = partialLayout({ middle: 'Kh Qd Jc 9s 8h' });
    expect(validator.getAvailablePositions(player)).toEqual(['top', 'bottom']);
  });
});
