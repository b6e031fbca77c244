import type { Card } from '../../cards/Card.js';
import type { ScopedLog } from '../../cli/logger.js';
import type { Tone } from '../../cli/ui.js';
import type { CardStyle, Limits } from '../../config/index.js';
import type { Chip } from '../../economy/chips.js';
import type { Shoe } from './shoe.js';

export type Phase = 'betting' | 'dealt' | 'player_turn' | 'split_active' | 'settlement' | 'done';

export type Action = 'stand' | 'hit' | 'double down' | 'split';

export type HandOutcome = 'blackjack' | 'win' | 'push' | 'lose' | 'bust';

/** Line-oriented output; every deal, prompt and result goes through here. */
export interface Narrator {
  say(line: string, tone?: Tone): void;
}

/**
 * Validated player input. `choose` resolves to a 1-based index into `options`,
 * `askAmount` to an integer within [min, max].
 */
export interface PlayerInput {
  choose(options: readonly string[]): Promise<number>;
  askAmount(min: number, max: number): Promise<number>;
}

export interface RoundIO {
  input: PlayerInput;
  narrator: Narrator;
}

export interface RoundOptions {
  limits: Limits;
  newShoe?: () => Shoe;
  cardStyle?: CardStyle;
  log?: ScopedLog;
}

export interface HandState {
  cards: Card[];
  stake: number;
  escrow: Chip[];
  doubled: boolean;
  status: 'playing' | 'stood' | 'bust';
}

export interface RoundState {
  phase: Phase;
  phases: Phase[]; // every phase entered, in order
  bet: number;
  firstMove: boolean;
  hands: HandState[]; // primary, then the split hand if any
  activeIndex: number;
  splitPending: boolean;
  dealer: Card[];
}

export interface HandResult {
  cards: readonly Card[];
  value: number;
  stake: number;
  outcome: HandOutcome;
  returned: number; // chips handed back to the player, stake included
}

export interface RoundResult {
  bet: number;
  blackjack: boolean;
  hands: HandResult[];
  dealerCards: readonly Card[];
  dealerValue: number;
  net: number;
  phases: readonly Phase[];
}
