/**
 * Shared rule services. All three are stateless, so one set per royalty
 * table serves every game.
 */

import type { RoyaltyTable } from './types.js';
import { HandEvaluator, handEvaluatorFor } from './hand-evaluator.js';
import { FantasyLandManager } from './fantasy-land.js';
import { GameValidator } from './validator.js';

export interface EngineServices {
  evaluator: HandEvaluator;
  fantasyLand: FantasyLandManager;
  validator: GameValidator;
}

export function createEngineServices(evaluator: HandEvaluator): EngineServices {
  const fantasyLand = new FantasyLandManager(evaluator);
  return {
    evaluator,
    fantasyLand,
    validator: new GameValidator(evaluator, fantasyLand),
  };
}

const sharedServices = new Map<RoyaltyTable, EngineServices>();

export function engineServicesFor(table: RoyaltyTable): EngineServices {
  let services = sharedServices.get(table);
  if (!services) {
    services = createEngineServices(handEvaluatorFor(table));
    sharedServices.set(table, services);
  }
  return services;
}
