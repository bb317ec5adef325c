/**
 * Error taxonomy for rejected game actions.
 *
 * Both action errors are fatal to the single operation that raised them and
 * leave game state untouched. Rule probes that should not throw go through
 * GameValidator, which returns ValidationResult instead.
 */

export type ErrorContext = Record<string, string | number>;

/** The operation is invalid in the game's current state. */
export class GameStateError extends Error {
  readonly code = 'GAME_STATE';
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'GameStateError';
    this.context = context;
  }
}

/** A placement violates capacity or ownership rules. */
export class InvalidCardPlacementError extends Error {
  readonly code = 'CARD_PLACEMENT';
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'InvalidCardPlacementError';
    this.context = context;
  }
}

/** A card set that cannot be ranked (wrong size or duplicate cards). */
export class InvalidHandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidHandError';
  }
}
