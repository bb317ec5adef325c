import { describe, it, expect } from 'vitest';
import { createRng, shuffle, Deck } from './deck.js';
import { buildStandardDeck, formatCards, parseCard, parseCards } from './cards.js';

describe('createRng', () => {
  it('produces deterministic results from same seed', () => {
    const rng1 = createRng(42);
    const rng2 = createRng(42);
    const seq1 = Array.from({ length: 10 }, () => rng1());
    const seq2 = Array.from({ length: 10 }, () => rng2());
    expect(seq1).toEqual(seq2);
  });

  it('produces different results from different seeds', () => {
    const rng1 = createRng(42);
    const rng2 = createRng(99);
    const seq1 = Array.from({ length: 10 }, () => rng1());
    const seq2 = Array.from({ length: 10 }, () => rng2());
    expect(seq1).not.toEqual(seq2);
  });

  it('produces values in [0, 1)', () => {
    const rng = createRng(123);
    for (let i = 0; i < 1000; i++) {
      const val = rng();
      expect(val).toBeGreaterThanOrEqual(0);
      expect(val).toBeLessThan(1);
    }
  });
});

describe('shuffle', () => {
  it('keeps every element and leaves the input alone', () => {
    const items = [1, 2, 3, 4, 5];
    const result = shuffle(items, createRng(42));
    expect(result).toHaveLength(5);
    expect([...result].sort()).toEqual([1, 2, 3, 4, 5]);
    expect(items).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('Deck', () => {
  it('shuffles the same way for the same seed', () => {
    const a = Deck.shuffled(7).remainingCards();
    const b = Deck.shuffled(7).remainingCards();
    expect(formatCards(a)).toBe(formatCards(b));
    expect(a).toHaveLength(52);
    expect(formatCards(a)).not.toBe(formatCards(buildStandardDeck()));
  });

  it('deals from the front of a stacked deck', () => {
    const deck = Deck.stacked(parseCards('Ah Kh Qh'));
    expect(deck.size).toBe(52);
    expect(deck.deal(2)).toEqual(parseCards('Ah Kh'));
    expect(deck.deal(2)).toEqual(parseCards('Qh 2s'));
    expect(deck.size).toBe(48);
    expect(deck.has(parseCard('Ah'))).toBe(false);
    expect(deck.has(parseCard('3s'))).toBe(true);
  });

  it('refuses to overdeal', () => {
    const deck = new Deck(parseCards('Ah Kh'));
    expect(() => deck.deal(3)).toThrow('Cannot deal 3 cards, only 2 remain');
    expect(() => deck.deal(-1)).toThrow('Cannot deal a negative number of cards: -1');
  });

  it('rejects duplicate cards', () => {
    expect(() => new Deck(parseCards('Ah Ah'))).toThrow('Deck contains duplicate cards');
  });
});
