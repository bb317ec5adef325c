/**
 * Deck management: seeded shuffle and dealing.
 *
 * Shuffle uses a seeded PRNG for deterministic replay.
 */

import type { Card } from './types.js';
import { buildStandardDeck, cardKey, containsCard, hasDuplicateCards } from './cards.js';

/**
 * Seeded pseudo-random number generator (mulberry32).
 * Returns a function that produces the next random number in [0, 1).
 */
export function createRng(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle using provided RNG.
 * Returns a new shuffled array (does not mutate input).
 */
export function shuffle<T>(items: readonly T[], rng: () => number): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

/**
 * The undealt cards of one game. Cards are dealt from the front.
 */
export class Deck {
  private cards: Card[];

  constructor(cards: readonly Card[]) {
    if (hasDuplicateCards(cards)) {
      throw new Error('Deck contains duplicate cards');
    }
    this.cards = [...cards];
  }

  /** A full 52-card deck shuffled with the given seed. */
  static shuffled(seed: number): Deck {
    return new Deck(shuffle(buildStandardDeck(), createRng(seed)));
  }

  /**
   * A deck whose first cards are `top` in order, followed by the rest of
   * the 52 cards in standard order. Used to stack deals for replays.
   */
  static stacked(top: readonly Card[]): Deck {
    const used = new Set(top.map(cardKey));
    const rest = buildStandardDeck().filter(c => !used.has(cardKey(c)));
    return new Deck([...top, ...rest]);
  }

  get size(): number {
    return this.cards.length;
  }

  deal(count: number): Card[] {
    if (count < 0) {
      throw new Error(`Cannot deal a negative number of cards: ${count}`);
    }
    if (count > this.cards.length) {
      throw new Error(`Cannot deal ${count} cards, only ${this.cards.length} remain`);
    }
    const dealt = this.cards.slice(0, count);
    this.cards = this.cards.slice(count);
    return dealt;
  }

  has(c: Card): boolean {
    return containsCard(this.cards, c);
  }

  remainingCards(): Card[] {
    return [...this.cards];
  }
}
