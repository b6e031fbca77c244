import type { Card } from '../../cards/Card.js';
import type { CardStyle } from '../../config/index.js';
import { DEALER_START, PLAYER_START } from '../../config/economy.js';
import { ChipStack, type Denomination } from '../../economy/chips.js';
import { renderCard } from '../../ui/cardsDisplay.js';
import type { Shoe } from './shoe.js';
import type { Narrator } from './types.js';

export class Participant {
  readonly name: string;
  readonly chips: ChipStack;

  constructor(name: string, chips: ChipStack) {
    this.name = name;
    this.chips = chips;
  }
}

export class Dealer extends Participant {
  /** Moves the next card of the shoe into `hand`. */
  deal(shoe: Shoe, hand: Card[], recipient: string, narrator: Narrator, style: CardStyle = 'text'): Card {
    const card = shoe.dispense();
    hand.push(card);
    narrator.say(`${this.name} deals ${recipient} ${renderCard(card, style)}`);
    return card;
  }

  dealInitial(shoe: Shoe, playerHand: Card[], ownHand: Card[], narrator: Narrator, style: CardStyle = 'text'): void {
    this.deal(shoe, playerHand, 'you', narrator, style);
    this.deal(shoe, ownHand, 'itself', narrator, style);
    this.deal(shoe, playerHand, 'you', narrator, style);
    this.deal(shoe, ownHand, 'itself', narrator, style);
  }
}

export type Table = { player: Participant; dealer: Dealer };

export function createTable(
  player: readonly Denomination[] = PLAYER_START,
  dealer: readonly Denomination[] = DEALER_START,
): Table {
  return {
    player: new Participant('You', ChipStack.fromCounts(player)),
    dealer: new Dealer('Dealer', ChipStack.fromCounts(dealer)),
  };
}
