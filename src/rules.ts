/**
 * Rules configuration: variant presets, validation, and deal arithmetic.
 */

import type { GameRules, Variant } from './types.js';
import { DECK_SIZE, LAYOUT_SIZE, MAX_PLAYERS, MIN_PLAYERS } from './types.js';

export function standardRules(): GameRules {
  return {
    variant: 'standard',
    minPlayers: MIN_PLAYERS,
    maxPlayers: MAX_PLAYERS,
    fantasyLandEnabled: true,
    initialCardsCount: 5,
    cardsPerTurn: 1,
    royaltyTable: 'standard',
    scoopBonus: 3,
  };
}

/** Pineapple: deal 3 per street, place 2, discard 1. Scoop bonus doubled. */
export function pineappleRules(): GameRules {
  return {
    variant: 'pineapple',
    minPlayers: MIN_PLAYERS,
    maxPlayers: 3,
    fantasyLandEnabled: true,
    initialCardsCount: 5,
    cardsPerTurn: 3,
    royaltyTable: 'pineapple',
    scoopBonus: 6,
  };
}

export function rulesForVariant(variant: Variant): GameRules {
  return variant === 'pineapple' ? pineappleRules() : standardRules();
}

/**
 * Build rules from a variant preset plus overrides, then validate.
 */
export function createRules(overrides: Partial<GameRules> = {}): GameRules {
  const rules = { ...rulesForVariant(overrides.variant ?? 'standard'), ...overrides };
  validateRules(rules);
  return rules;
}

/**
 * Throw if the rules cannot describe a playable game.
 */
export function validateRules(rules: GameRules): void {
  if (rules.variant !== 'standard' && rules.variant !== 'pineapple') {
    throw new Error(`Invalid variant: ${String(rules.variant)}`);
  }

  if (rules.minPlayers < MIN_PLAYERS || rules.maxPlayers > MAX_PLAYERS || rules.minPlayers > rules.maxPlayers) {
    throw new Error(
      `Player count bounds must lie within ${MIN_PLAYERS}-${MAX_PLAYERS}, got ${rules.minPlayers}-${rules.maxPlayers}`,
    );
  }

  if (!Number.isInteger(rules.initialCardsCount) || rules.initialCardsCount < 1 || rules.initialCardsCount > LAYOUT_SIZE) {
    throw new Error(`Initial card count must be 1-${LAYOUT_SIZE}, got ${rules.initialCardsCount}`);
  }

  if (!Number.isInteger(rules.cardsPerTurn) || rules.cardsPerTurn < 1) {
    throw new Error(`Cards per turn must be a positive integer, got ${rules.cardsPerTurn}`);
  }

  if (rules.variant === 'pineapple' && rules.cardsPerTurn < 2) {
    throw new Error('Pineapple needs at least 2 cards per turn (one is discarded)');
  }

  const remaining = LAYOUT_SIZE - rules.initialCardsCount;
  const perStreet = placementsPerStreet(rules);
  if (remaining % perStreet !== 0) {
    const label = rules.variant === 'pineapple' ? 'Pineapple streets' : 'Streets';
    throw new Error(`${label} of ${perStreet} placements cannot fill the remaining ${remaining} slots`);
  }

  const needed = rules.maxPlayers * cardsDealtPerSeat(rules);
  if (needed > DECK_SIZE) {
    throw new Error(`${rules.maxPlayers} players need ${needed} cards, the deck has ${DECK_SIZE}`);
  }

  if (rules.scoopBonus < 0) {
    throw new Error(`Scoop bonus cannot be negative, got ${rules.scoopBonus}`);
  }
}

/** Cards placed from each street after the first. */
export function placementsPerStreet(rules: GameRules): number {
  return rules.variant === 'pineapple' ? rules.cardsPerTurn - 1 : rules.cardsPerTurn;
}

/** Cards a regular (non-Fantasy-Land) seat draws over a whole hand. */
export function cardsDealtPerSeat(rules: GameRules): number {
  const streets = (LAYOUT_SIZE - rules.initialCardsCount) / placementsPerStreet(rules);
  return rules.initialCardsCount + streets * rules.cardsPerTurn;
}
