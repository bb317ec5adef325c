/**
 * Table scoring: every pair of seats settles rows, scoop bonus and
 * royalties head to head. Totals are zero-sum across the table.
 */

import type { Card, PlayerId, Row, Score } from './types.js';
import { ROWS } from './types.js';
import type { HandEvaluator } from './hand-evaluator.js';

/** A finished layout as scoring sees it. */
export interface ScoringSeat {
  playerId: PlayerId;
  fouled: boolean;
  rows: Record<Row, readonly Card[]>;
}

export function emptyScore(): Score {
  return { points: 0, royalties: 0, penalties: 0, total: 0 };
}

/** Royalties a seat collects from each opponent; none when fouled. */
export function seatRoyalties(seat: ScoringSeat, evaluator: HandEvaluator): number {
  if (seat.fouled) return 0;
  let total = 0;
  for (const row of ROWS) {
    total += evaluator.evaluateRow(seat.rows[row], row).royaltyBonus;
  }
  return total;
}

/**
 * Net row points for `a` against `b`: one per row won, and `scoopBonus`
 * more for winning all three. A fouled seat loses every row.
 */
export function rowPoints(
  a: ScoringSeat,
  b: ScoringSeat,
  evaluator: HandEvaluator,
  scoopBonus: number,
): number {
  if (a.fouled && b.fouled) return 0;
  if (a.fouled) return -(ROWS.length + scoopBonus);
  if (b.fouled) return ROWS.length + scoopBonus;

  let winsA = 0;
  let winsB = 0;
  for (const row of ROWS) {
    const result = evaluator.compare(
      evaluator.evaluate(a.rows[row]),
      evaluator.evaluate(b.rows[row]),
    );
    if (result > 0) winsA++;
    else if (result < 0) winsB++;
  }

  let net = winsA - winsB;
  if (winsA === ROWS.length) net += scoopBonus;
  if (winsB === ROWS.length) net -= scoopBonus;
  return net;
}

export function calculateScores(
  seats: readonly ScoringSeat[],
  evaluator: HandEvaluator,
  scoopBonus: number,
): Record<PlayerId, Score> {
  const scores: Record<PlayerId, Score> = {};
  const royalties = new Map<PlayerId, number>();
  for (const seat of seats) {
    scores[seat.playerId] = emptyScore();
    royalties.set(seat.playerId, seatRoyalties(seat, evaluator));
  }

  for (let i = 0; i < seats.length; i++) {
    for (let j = i + 1; j < seats.length; j++) {
      const a = seats[i];
      const b = seats[j];
      const scoreA = scores[a.playerId];
      const scoreB = scores[b.playerId];

      const points = rowPoints(a, b, evaluator, scoopBonus);
      scoreA.points += points;
      scoreB.points -= points;

      const royaltiesA = royalties.get(a.playerId) ?? 0;
      const royaltiesB = royalties.get(b.playerId) ?? 0;
      scoreA.royalties += royaltiesA;
      scoreB.penalties += royaltiesA;
      scoreB.royalties += royaltiesB;
      scoreA.penalties += royaltiesB;
    }
  }

  for (const score of Object.values(scores)) {
    score.total = score.points + score.royalties - score.penalties;
  }
  return scores;
}

/**
 * Highest total wins; ties go to more royalties collected, then to the
 * earlier seat.
 */
export function pickWinner(
  seatOrder: readonly PlayerId[],
  scores: Record<PlayerId, Score>,
): PlayerId {
  let winner: PlayerId | null = null;
  let best: Score | null = null;

  for (const playerId of seatOrder) {
    const score = scores[playerId];
    if (!score) continue;
    if (
      best === null ||
      score.total > best.total ||
      (score.total === best.total && score.royalties > best.royalties)
    ) {
      winner = playerId;
      best = score;
    }
  }

  if (winner === null) {
    throw new Error('Cannot pick a winner without scores');
  }
  return winner;
}
