import { describe, it, expect } from 'vitest';
import { calculateScores, pickWinner, rowPoints, seatRoyalties } from './scoring.js';
import type { ScoringSeat } from './scoring.js';
import { HandEvaluator } from './hand-evaluator.js';
import { parseCards } from './cards.js';

const evaluator = new HandEvaluator();

function seat(playerId: string, top: string, middle: string, bottom: string, fouled = false): ScoringSeat {
  return {
    playerId,
    fouled,
    rows: { top: parseCards(top), middle: parseCards(middle), bottom: parseCards(bottom) },
  };
}

// K-high / pair of Aces / full house: 6 in royalties
const alice = seat('alice', 'Kh Qc Jd', 'As Ah 9c 8d 7s', '5s 5h 5c 2d 2s');
// Queens / two pair / ten-high straight: 7 + 0 + 2 in royalties
const bob = seat('bob', 'Qs Qh 3c', 'Kd Kc 4h 4d 9s', '6d 7d 8h 9h Th');
// Loses every row to both
const carol = seat('carol', '2h 3h 4d', 'Jh Js 6c 4c 3d', 'Qd Qc Jc 8s 6s');

describe('seatRoyalties', () => {
  it('sums row royalties', () => {
    expect(seatRoyalties(alice, evaluator)).toBe(6);
    expect(seatRoyalties(bob, evaluator)).toBe(9);
  });

  it('is zero for a fouled seat', () => {
    expect(seatRoyalties({ ...bob, fouled: true }, evaluator)).toBe(0);
  });
});

describe('rowPoints', () => {
  it('nets rows won against rows lost', () => {
    expect(rowPoints(alice, bob, evaluator, 3)).toBe(-1);
    expect(rowPoints(bob, alice, evaluator, 3)).toBe(1);
  });

  it('adds the scoop bonus for winning all three rows', () => {
    expect(rowPoints(alice, carol, evaluator, 3)).toBe(6);
    expect(rowPoints(carol, alice, evaluator, 6)).toBe(-9);
  });

  it('scoops a fouled seat', () => {
    const fouled = { ...carol, fouled: true };
    expect(rowPoints(alice, fouled, evaluator, 3)).toBe(6);
    expect(rowPoints(fouled, alice, evaluator, 3)).toBe(-6);
  });

  it('scores two fouled seats level', () => {
    expect(rowPoints({ ...alice, fouled: true }, { ...bob, fouled: true }, evaluator, 3)).toBe(0);
  });
});

describe('calculateScores', () => {
  it('settles a heads-up hand', () => {
    const scores = calculateScores([alice, bob], evaluator, 3);
    expect(scores.alice).toEqual({ points: -1, royalties: 6, penalties: 9, total: -4 });
    expect(scores.bob).toEqual({ points: 1, royalties: 9, penalties: 6, total: 4 });
  });

  it('settles every pair at a three-handed table', () => {
    const scores = calculateScores([alice, bob, carol], evaluator, 3);
    expect(scores.alice).toEqual({ points: 5, royalties: 12, penalties: 9, total: 8 });
    expect(scores.bob).toEqual({ points: 7, royalties: 18, penalties: 6, total: 19 });
    expect(scores.carol).toEqual({ points: -12, royalties: 0, penalties: 15, total: -27 });
  });

  it('is zero-sum', () => {
    const scores = calculateScores([alice, bob, carol], evaluator, 6);
    const sum = Object.values(scores).reduce((acc, s) => acc + s.total, 0);
    expect(sum).toBe(0);
  });

  it('lets the other seat collect royalties from a fouled seat', () => {
    const fouled = seat('dave', 'As Ad Kc', 'Kh Qd Jc 9s 8h', '3s 3h 3d 7c 7d', true);
    const scores = calculateScores([alice, fouled], evaluator, 3);
    expect(scores.alice).toEqual({ points: 6, royalties: 6, penalties: 0, total: 12 });
    expect(scores.dave).toEqual({ points: -6, royalties: 0, penalties: 6, total: -12 });
  });
});

describe('pickWinner', () => {
  it('picks the highest total', () => {
    const scores = calculateScores([alice, bob, carol], evaluator, 3);
    expect(pickWinner(['alice', 'bob', 'carol'], scores)).toBe('bob');
  });

  it('breaks a tied total on royalties', () => {
    const winner = pickWinner(['a', 'b'], {
      a: { points: 2, royalties: 2, penalties: 4, total: 0 },
      b: { points: -3, royalties: 5, penalties: 2, total: 0 },
    });
    expect(winner).toBe('b');
  });

  it('breaks a full tie on seat order', () => {
    const level = { points: 0, royalties: 0, penalties: 0, total: 0 };
    expect(pickWinner(['b', 'a'], { a: { ...level }, b: { ...level } })).toBe('b');
  });

  it('needs at least one score', () => {
    expect(() => pickWinner([], {})).toThrow('Cannot pick a winner');
  });
});
