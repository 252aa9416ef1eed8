/**
 * Tie Breaker
 *
 * Picks a charity when two or more tallies are equal. Tied tallies are
 * perturbed with random words 1-3 and the perturbed values compared.
 *
 * Comparison order:
 * - three-way: charity1 if its perturbed value is the largest, else charity2
 *   if its value is, else charity3 without a check
 * - two-way at the top: the lower-numbered charity takes word 1 and the
 *   higher-numbered one word 2; strictly larger wins and equality goes to
 *   the higher-numbered charity
 * - an equal pair below a unique maximum takes the tie path but nothing is
 *   perturbed; the maximum wins
 */

import type { CharityChoice, DonationTally, RandomWords, TieKind } from "./types";

export interface TieResolution {
  winner: CharityChoice;
  highestDonationCount: number;
  tie: Exclude<TieKind, "none">;
  /** Perturbed values of the tied charities, in charity order */
  perturbed?: Partial<Record<CharityChoice, bigint>>;
}

/** True when any pair of tallies is equal */
export function isTie(t1: number, t2: number, t3: number): boolean {
  return t1 === t2 || t1 === t3 || t2 === t3;
}

/** Largest of three tallies by direct comparison */
export function maxOfThree(a: number, b: number, c: number): number {
  if (a >= b && a >= c) return a;
  if (b >= c) return b;
  return c;
}

function tieWord(words: RandomWords, index: 1 | 2 | 3): bigint {
  const word = words[index];
  if (word === undefined) {
    throw new Error(`Tie break needs random word ${index}`);
  }
  return word;
}

function breakPair(
  lower: CharityChoice,
  higher: CharityChoice,
  tallies: DonationTally,
  words: RandomWords,
): TieResolution {
  const lowerValue = BigInt(tallies[lower]) + tieWord(words, 1);
  const higherValue = BigInt(tallies[higher]) + tieWord(words, 2);
  const perturbed: Partial<Record<CharityChoice, bigint>> = {};
  perturbed[lower] = lowerValue;
  perturbed[higher] = higherValue;
  return {
    winner: lowerValue > higherValue ? lower : higher,
    highestDonationCount: tallies[lower],
    tie: "two-way",
    perturbed,
  };
}

export function handleTie(tallies: DonationTally, words: RandomWords): TieResolution {
  const t1 = tallies.CHARITY1;
  const t2 = tallies.CHARITY2;
  const t3 = tallies.CHARITY3;
  const max = maxOfThree(t1, t2, t3);

  if (t1 === t2 && t2 === t3) {
    const p1 = BigInt(t1) + tieWord(words, 1);
    const p2 = BigInt(t2) + tieWord(words, 2);
    const p3 = BigInt(t3) + tieWord(words, 3);
    const top = p1 >= p2 && p1 >= p3 ? p1 : p2 >= p3 ? p2 : p3;

    let winner: CharityChoice;
    if (p1 === top) {
      winner = "CHARITY1";
    } else if (p2 === top) {
      winner = "CHARITY2";
    } else {
      winner = "CHARITY3";
    }

    return {
      winner,
      highestDonationCount: max,
      tie: "three-way",
      perturbed: { CHARITY1: p1, CHARITY2: p2, CHARITY3: p3 },
    };
  }

  if (t1 === max && t2 === max) return breakPair("CHARITY1", "CHARITY2", tallies, words);
  if (t1 === max && t3 === max) return breakPair("CHARITY1", "CHARITY3", tallies, words);
  if (t2 === max && t3 === max) return breakPair("CHARITY2", "CHARITY3", tallies, words);

  // Equal pair sits below a unique maximum
  const winner: CharityChoice = t1 === max ? "CHARITY1" : t2 === max ? "CHARITY2" : "CHARITY3";
  return { winner, highestDonationCount: max, tie: "below-max" };
}
