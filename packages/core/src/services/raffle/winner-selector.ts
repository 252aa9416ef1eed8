/**
 * Jackpot winner selection.
 */

/** `word mod entrantCount`, as a plain index into the entrant list */
export function selectWinnerIndex(word: bigint, entrantCount: number): number {
  if (!Number.isInteger(entrantCount) || entrantCount <= 0) {
    throw new Error(`Cannot select a winner from ${entrantCount} entrants`);
  }
  return Number(word % BigInt(entrantCount));
}

export function selectWinner(word: bigint, entrants: readonly string[]): string {
  const winner = entrants[selectWinnerIndex(word, entrants.length)];
  if (winner === undefined) {
    throw new Error("Winner index out of range");
  }
  return winner;
}
