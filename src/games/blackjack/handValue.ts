import { ACE, type Card } from '../../cards/Card.js';

export const BLACKJACK = 21;

export function valueOfCard(card: Card, runningTotal: number): number {
  if (card.rank === ACE) return runningTotal + 11 > BLACKJACK ? 1 : 11;
  if (card.rank > 8) return 10; // J, Q, K
  return card.rank + 2;
}

/**
 * Scores a hand front to back. An Ace counts 11 unless that would take the
 * total so far past 21, so [A, A] is 12 and [5, A, 9] is 25: the ace is
 * never revalued by cards that come after it.
 */
export function handValue(cards: readonly Card[]): number {
  let total = 0;
  for (const c of cards) total += valueOfCard(c, total);
  return total;
}

export function isBust(cards: readonly Card[]): boolean {
  return handValue(cards) > BLACKJACK;
}
