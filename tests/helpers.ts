import { makeCard, type Card } from '../src/cards/Card.js';
import type { PlayerInput } from '../src/games/blackjack/types.js';

const SHORT = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];
const ICONS = ['♠', '♣', '♦', '♥'];

/** `card('10♥')` */
export function card(label: string): Card {
  return makeCard(SHORT.indexOf(label.slice(0, -1)), ICONS.indexOf(label.slice(-1)));
}

export function cards(...labels: string[]): Card[] {
  return labels.map(card);
}

/**
 * Answers menus from a script. Each entry must be an offered option or a
 * prefix of one ('bet minimum' picks 'bet minimum ($5)').
 */
export class ScriptedInput implements PlayerInput {
  readonly menus: string[][] = [];
  readonly amountBounds: Array<[number, number]> = [];
  private readonly choices: string[];
  private readonly amounts: number[];

  constructor(choices: string[], amounts: number[] = []) {
    this.choices = choices.slice();
    this.amounts = amounts.slice();
  }

  async choose(options: readonly string[]): Promise<number> {
    this.menus.push([...options]);
    const want = this.choices.shift();
    if (want === undefined) throw new Error(`no scripted choice for [${options.join(', ')}]`);
    const i = options.findIndex((o) => o === want || o.startsWith(want));
    if (i < 0) throw new Error(`'${want}' not offered in [${options.join(', ')}]`);
    return i + 1;
  }

  async askAmount(min: number, max: number): Promise<number> {
    this.amountBounds.push([min, max]);
    const a = this.amounts.shift();
    if (a === undefined) throw new Error('no scripted amount');
    return a;
  }

  get exhausted(): boolean {
    return this.choices.length === 0 && this.amounts.length === 0;
  }
}
