/**
 * Charity Resolver
 *
 * Decides which charity receives the donation match from the cycle's
 * tallies, handing ambiguous tallies to the tie breaker.
 */

import { handleTie, isTie, type TieResolution } from "./tie-breaker";
import type { CharityChoice, CharityResolution, DonationTally, RandomWords } from "./types";

export interface CharityOutcome extends CharityResolution {
  perturbed?: TieResolution["perturbed"];
}

export function resolveCharityWinner(
  tallies: DonationTally,
  words: RandomWords,
): CharityOutcome {
  const t1 = tallies.CHARITY1;
  const t2 = tallies.CHARITY2;
  const t3 = tallies.CHARITY3;

  if (isTie(t1, t2, t3)) {
    return handleTie(tallies, words);
  }

  let winner: CharityChoice;
  if (t1 > t2 && t1 > t3) {
    winner = "CHARITY1";
  } else if (t2 > t3) {
    winner = "CHARITY2";
  } else {
    winner = "CHARITY3";
  }

  return { winner, highestDonationCount: tallies[winner], tie: "none" };
}
