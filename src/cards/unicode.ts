import type { Card, Rank, Suit } from './Card.js';

// Unicode Playing Cards block (no Knights)
// Ace code points: Spades U+1F0A1, Hearts U+1F0B1, Diamonds U+1F0C1, Clubs U+1F0D1
const SUIT_BASE: Record<Suit, number> = { 0: 0x1f0a1, 1: 0x1f0d1, 2: 0x1f0c1, 3: 0x1f0b1 };

// Offset from the suit's Ace; 11 is the Knight and is skipped
const RANK_OFFSET: Record<Rank, number> = {
  0: 1, 1: 2, 2: 3, 3: 4, 4: 5, 5: 6, 6: 7, 7: 8, 8: 9,
  9: 10, 10: 12, 11: 13, 12: 0,
};

export function cardToUnicode(card: Card): string {
  return String.fromCodePoint(SUIT_BASE[card.suit] + RANK_OFFSET[card.rank]);
}
