import { describe, it, expect } from 'vitest';
import {
  standardRules,
  pineappleRules,
  rulesForVariant,
  createRules,
  validateRules,
  placementsPerStreet,
  cardsDealtPerSeat,
} from './rules.js';

describe('presets', () => {
  it('deals one card per street in the standard game', () => {
    const rules = standardRules();
    expect(rules).toMatchObject({ variant: 'standard', initialCardsCount: 5, cardsPerTurn: 1, scoopBonus: 3 });
    expect(placementsPerStreet(rules)).toBe(1);
    expect(cardsDealtPerSeat(rules)).toBe(13);
  });

  it('deals three and places two in Pineapple', () => {
    const rules = pineappleRules();
    expect(rules).toMatchObject({ variant: 'pineapple', maxPlayers: 3, cardsPerTurn: 3, royaltyTable: 'pineapple' });
    expect(placementsPerStreet(rules)).toBe(2);
    expect(cardsDealtPerSeat(rules)).toBe(17);
  });

  it('selects presets by variant', () => {
    expect(rulesForVariant('pineapple')).toEqual(pineappleRules());
    expect(rulesForVariant('standard')).toEqual(standardRules());
  });
});

describe('createRules', () => {
  it('applies overrides on top of the variant preset', () => {
    const rules = createRules({ variant: 'pineapple', fantasyLandEnabled: false });
    expect(rules.cardsPerTurn).toBe(3);
    expect(rules.fantasyLandEnabled).toBe(false);
  });

  it('validates the result', () => {
    expect(() => createRules({ maxPlayers: 6 })).toThrow('Player count bounds must lie within 2-4, got 2-6');
  });
});

describe('validateRules', () => {
  it('rejects a Pineapple table the deck cannot serve', () => {
    expect(() => validateRules({ ...pineappleRules(), maxPlayers: 4 })).toThrow(
      '4 players need 68 cards, the deck has 52',
    );
  });

  it('rejects streets that cannot fill the layout', () => {
    expect(() => validateRules({ ...pineappleRules(), cardsPerTurn: 4 })).toThrow(
      'Pineapple streets of 3 placements cannot fill the remaining 8 slots',
    );
    expect(() => validateRules({ ...pineappleRules(), cardsPerTurn: 1 })).toThrow(
      'Pineapple needs at least 2 cards per turn (one is discarded)',
    );
  });

  it('rejects standard streets that overrun the layout', () => {
    expect(() => createRules({ cardsPerTurn: 3 })).toThrow('Streets of 3 placements cannot fill the remaining 8 slots');
    expect(() => createRules({ cardsPerTurn: 2 })).not.toThrow();
  });

  it('counts multi-card standard streets', () => {
    expect(cardsDealtPerSeat({ ...standardRules(), cardsPerTurn: 4 })).toBe(13);
  });

  it('rejects bad counts', () => {
    expect(() => validateRules({ ...standardRules(), initialCardsCount: 0 })).toThrow(
      'Initial card count must be 1-13, got 0',
    );
    expect(() => validateRules({ ...standardRules(), cardsPerTurn: 0 })).toThrow(
      'Cards per turn must be a positive integer, got 0',
    );
    expect(() => validateRules({ ...standardRules(), scoopBonus: -1 })).toThrow('Scoop bonus cannot be negative, got -1');
  });
});
