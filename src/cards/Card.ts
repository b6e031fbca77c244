/** 0-8 are the numerals 2-10; 9-12 are J, Q, K, A. */
export type Rank = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;
/** Spades, clubs, diamonds, hearts. Never affects scoring. */
export type Suit = 0 | 1 | 2 | 3;

export type Card = Readonly<{ rank: Rank; suit: Suit }>;

export const ACE: Rank = 12;

export const RANKS: readonly Rank[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
export const SUITS: readonly Suit[] = [0, 1, 2, 3];

const SHORT = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'] as const;
const LONG = [
  'two', 'three', 'four', 'five', 'six', 'seven', 'eight',
  'nine', 'ten', 'jack', 'queen', 'king', 'ace',
] as const;
const SUIT_ICONS = ['♠', '♣', '♦', '♥'] as const;

export function isRank(n: number): n is Rank {
  return Number.isInteger(n) && n >= 0 && n <= 12;
}

export function isSuit(n: number): n is Suit {
  return Number.isInteger(n) && n >= 0 && n <= 3;
}

export function makeCard(rank: number, suit: number): Card {
  if (!isRank(rank)) throw new RangeError(`rank out of range: ${rank}`);
  if (!isSuit(suit)) throw new RangeError(`suit out of range: ${suit}`);
  return Object.freeze({ rank, suit });
}

export function rankShort(card: Card): string {
  return SHORT[card.rank];
}

export function rankLong(card: Card): string {
  return LONG[card.rank];
}

export function suitIcon(card: Card): string {
  return SUIT_ICONS[card.suit];
}

// Depicts a figure; Ace is grouped in here for display purposes only
export function isFaceCard(card: Card): boolean {
  return card.rank > 8;
}

export function cardLabel(card: Card): string {
  return rankShort(card) + suitIcon(card);
}

export function sameRank(a: Card, b: Card): boolean {
  return a.rank === b.rank;
}
