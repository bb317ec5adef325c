import { describe, it, expect } from 'vitest';
import {
  card,
  parseCard,
  parseCards,
  formatCard,
  formatCards,
  displayCard,
  sameCard,
  containsCard,
  withoutCard,
  hasDuplicateCards,
  buildStandardDeck,
} from './cards.js';

describe('parseCard', () => {
  it('reads rank symbol and suit', () => {
    expect(parseCard('Ah')).toEqual({ rank: 14, suit: 'h' });
    expect(parseCard('Td')).toEqual({ rank: 10, suit: 'd' });
    expect(parseCard('2c')).toEqual({ rank: 2, suit: 'c' });
  });

  it('accepts "10", lower-case ranks and suit glyphs', () => {
    expect(parseCard('10s')).toEqual({ rank: 10, suit: 's' });
    expect(parseCard('kH')).toEqual({ rank: 13, suit: 'h' });
    expect(parseCard('Q♠')).toEqual({ rank: 12, suit: 's' });
    expect(parseCard(' 9♦ ')).toEqual({ rank: 9, suit: 'd' });
  });

  it('rejects bad input', () => {
    expect(() => parseCard('A')).toThrow('Invalid card: "A"');
    expect(() => parseCard('1h')).toThrow('Invalid rank in card: "1h"');
    expect(() => parseCard('Ax')).toThrow('Invalid suit in card: "Ax"');
  });

  it('returns frozen cards', () => {
    expect(Object.isFrozen(parseCard('Ah'))).toBe(true);
  });
});

describe('formatting', () => {
  it('formats text and display forms', () => {
    expect(formatCard(card(10, 'c'))).toBe('Tc');
    expect(formatCards(parseCards('Ah  Kd 5c'))).toBe('Ah Kd 5c');
    expect(displayCard(card(14, 'h'))).toBe('A♥');
  });
});

describe('card sets', () => {
  const hand = parseCards('Ah Kd 5c Kd');

  it('compares by value', () => {
    expect(sameCard(parseCard('Ah'), card(14, 'h'))).toBe(true);
    expect(containsCard(hand, card(5, 'c'))).toBe(true);
    expect(containsCard(hand, card(5, 'd'))).toBe(false);
  });

  it('removes only the first match', () => {
    expect(formatCards(withoutCard(hand, parseCard('Kd')))).toBe('Ah 5c Kd');
    expect(withoutCard(hand, parseCard('2s'))).toEqual(hand);
  });

  it('detects duplicates', () => {
    expect(hasDuplicateCards(hand)).toBe(true);
    expect(hasDuplicateCards(parseCards('Ah Kd 5c'))).toBe(false);
  });
});

describe('buildStandardDeck', () => {
  it('holds 52 distinct cards in suit-major order', () => {
    const deck = buildStandardDeck();
    expect(deck).toHaveLength(52);
    expect(hasDuplicateCards(deck)).toBe(false);
    expect(formatCards(deck.slice(0, 3))).toBe('2s 3s 4s');
    expect(formatCard(deck[51])).toBe('Ac');
  });
});
