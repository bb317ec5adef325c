/**
 * Card creation helpers, text notation, and the 52-card deck.
 */

import type { Card, Rank, Suit } from './types.js';
import { RANKS, RANK_SYMBOLS, SUITS, SUIT_GLYPHS } from './types.js';

const SYMBOL_TO_RANK: Record<string, Rank> = Object.fromEntries(
  RANKS.map(rank => [RANK_SYMBOLS[rank], rank]),
);

const GLYPH_TO_SUIT: Record<string, Suit> = {
  '♠': 's',
  '♥': 'h',
  '♦': 'd',
  '♣': 'c',
};

export function card(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/**
 * Parse a card from text notation: rank symbol followed by suit,
 * e.g. "Ah", "Td", "10c", "Q♠".
 */
export function parseCard(text: string): Card {
  const trimmed = text.trim();
  if (trimmed.length < 2) {
    throw new Error(`Invalid card: "${text}"`);
  }

  const rankText = trimmed.slice(0, -1).toUpperCase();
  const suitText = trimmed.slice(-1);

  const rank = rankText === '10' ? 10 : SYMBOL_TO_RANK[rankText];
  if (rank === undefined) {
    throw new Error(`Invalid rank in card: "${text}"`);
  }

  const suit = isSuit(suitText.toLowerCase()) ? suitText.toLowerCase() : GLYPH_TO_SUIT[suitText];
  if (suit === undefined || !isSuit(suit)) {
    throw new Error(`Invalid suit in card: "${text}"`);
  }

  return card(rank, suit);
}

/** Parse a space-separated list of cards, e.g. "Ah Kd 5c". */
export function parseCards(text: string): Card[] {
  return text.split(/\s+/).filter(Boolean).map(parseCard);
}

export function formatCard(c: Card): string {
  return `${RANK_SYMBOLS[c.rank]}${c.suit}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}

/** Display form with a suit glyph, e.g. "A♥". */
export function displayCard(c: Card): string {
  return `${RANK_SYMBOLS[c.rank]}${SUIT_GLYPHS[c.suit]}`;
}

export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Stable key for sets and maps (cards compare by value). */
export function cardKey(c: Card): string {
  return formatCard(c);
}

export function containsCard(cards: readonly Card[], target: Card): boolean {
  return cards.some(c => sameCard(c, target));
}

/** Return a copy of `cards` without the first card equal to `target`. */
export function withoutCard(cards: readonly Card[], target: Card): Card[] {
  const index = cards.findIndex(c => sameCard(c, target));
  if (index === -1) return [...cards];
  return [...cards.slice(0, index), ...cards.slice(index + 1)];
}

export function hasDuplicateCards(cards: readonly Card[]): boolean {
  return new Set(cards.map(cardKey)).size !== cards.length;
}

/**
 * Build the 52-card deck in suit-major order (2s..As, 2h..Ah, ...).
 */
export function buildStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(card(rank, suit));
    }
  }
  return deck;
}

function isSuit(value: string): value is Suit {
  return value === 's' || value === 'h' || value === 'd' || value === 'c';
}
