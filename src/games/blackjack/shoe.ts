import { makeCard, RANKS, SUITS, type Card } from '../../cards/Card.js';
import { EmptyShoeError } from '../../util/errors.js';
import { cryptoRNG, shuffleInPlace, type RNG } from '../../util/rng.js';

export function fullDeck(): Card[] {
  const cards: Card[] = [];
  for (const r of RANKS) {
    for (const s of SUITS) {
      cards.push(makeCard(r, s));
    }
  }
  return cards;
}

/** A single deck dealt from the top; cards never go back in. */
export class Shoe {
  // top of the shoe is the end of the array
  private readonly cards: Card[];

  private constructor(cards: Card[]) {
    this.cards = cards;
  }

  static createShuffled(rng: RNG = cryptoRNG): Shoe {
    return new Shoe(shuffleInPlace(fullDeck(), rng));
  }

  /** Dispenses `cards` in the given order. */
  static stacked(cards: readonly Card[]): Shoe {
    return new Shoe(cards.slice().reverse());
  }

  get remaining(): number {
    return this.cards.length;
  }

  dispense(): Card {
    const card = this.cards.pop();
    if (card === undefined) throw new EmptyShoeError();
    return card;
  }
}
