import { sameRank } from '../../cards/Card.js';
import { log as rootLog, type ScopedLog } from '../../cli/logger.js';
import type { CardStyle, Limits } from '../../config/index.js';
import { chipsValue, type Chip, type ChipStack } from '../../economy/chips.js';
import { renderHand } from '../../ui/cardsDisplay.js';
import { chipLines, formatDollars } from '../../ui/outcome.js';
import { InsufficientChipsError } from '../../util/errors.js';
import { BLACKJACK, handValue } from './handValue.js';
import type { Participant, Table } from './participants.js';
import { Shoe } from './shoe.js';
import type {
  Action,
  HandResult,
  HandState,
  Narrator,
  Phase,
  PlayerInput,
  RoundIO,
  RoundOptions,
  RoundResult,
  RoundState,
} from './types.js';

type BetOption = { label: string; amount: number | 'custom' };

/** 1-based pick from the input collaborator, checked against the menu it was given. */
export function pickOption<T>(options: readonly T[], index: number): T {
  if (!Number.isInteger(index) || index < 1 || index > options.length) {
    throw new RangeError(`choice ${index} is outside 1..${options.length}`);
  }
  return options[index - 1];
}

/** Moves chips worth exactly `amount` out of `stack`, or leaves it untouched and throws. */
export function escrowStake(stack: ChipStack, amount: number): Chip[] {
  const chips = stack.remove(amount);
  if (chipsValue(chips) !== amount) {
    stack.add(chips);
    throw new InsufficientChipsError(amount, stack.totalValue());
  }
  return chips;
}

function hasExactAmount(stack: ChipStack, lo: number, hi: number): boolean {
  for (let n = lo; n <= hi; n++) if (stack.coversExactly(n)) return true;
  return false;
}

export function betOptions(player: Participant, limits: Limits): BetOption[] {
  const options: BetOption[] = [];
  const { min_bet: min, max_bet: max } = limits;
  if (player.chips.coversExactly(min)) options.push({ label: `bet minimum (${formatDollars(min)})`, amount: min });
  if (max !== min && player.chips.coversExactly(max)) options.push({ label: `bet maximum (${formatDollars(max)})`, amount: max });
  const upper = Math.min(max, player.chips.totalValue());
  if (upper >= min && hasExactAmount(player.chips, min, upper)) options.push({ label: 'bet a custom amount', amount: 'custom' });
  return options;
}

export function canPlaceBet(player: Participant, limits: Limits): boolean {
  return betOptions(player, limits).length > 0;
}

async function placeBet(player: Participant, input: PlayerInput, narrator: Narrator, limits: Limits): Promise<number> {
  const options = betOptions(player, limits);
  if (options.length === 0) throw new InsufficientChipsError(limits.min_bet, player.chips.totalValue());
  narrator.say('Place a bet.', 'title');
  const picked = pickOption(options, await input.choose(options.map((o) => o.label)));
  if (picked.amount !== 'custom') return picked.amount;
  const upper = Math.min(limits.max_bet, player.chips.totalValue());
  for (;;) {
    const amount = await input.askAmount(limits.min_bet, upper);
    if (player.chips.coversExactly(amount)) return amount;
    narrator.say(`Your chips cannot make exactly ${formatDollars(amount)}. Pick another amount.`, 'warn');
  }
}

export function availableActions(state: RoundState, player: Participant): Action[] {
  const hand = state.hands[state.activeIndex];
  const actions: Action[] = ['stand', 'hit'];
  if (hand.cards.length !== 2) return actions;
  const affordable = player.chips.coversExactly(state.bet);
  if (!hand.doubled && affordable) actions.push('double down');
  if (state.hands.length === 1 && sameRank(hand.cards[0], hand.cards[1]) && affordable) actions.push('split');
  return actions;
}

function reportChips(table: Table, narrator: Narrator) {
  narrator.say('Your chips:', 'title');
  for (const line of chipLines(table.player.chips.summary())) narrator.say(line);
  narrator.say("Dealer's chips:", 'title');
  for (const line of chipLines(table.dealer.chips.summary())) narrator.say(line);
}

function handName(state: RoundState, index: number): string {
  return state.hands.length > 1 ? `Your hand ${index + 1}` : 'Your hand';
}

function showTable(state: RoundState, narrator: Narrator, style: CardStyle) {
  state.hands.forEach((h, i) => {
    const marker = state.hands.length > 1 && i === state.activeIndex ? ' (playing)' : '';
    narrator.say(`${handName(state, i)}${marker}: ${renderHand(h.cards, style)} (${handValue(h.cards)})`);
  });
  narrator.say(`Dealer's hand: ${renderHand(state.dealer, style)} (${handValue(state.dealer)})`);
}

function enter(state: RoundState, phase: Phase) {
  state.phase = phase;
  state.phases.push(phase);
}

/** Pays `amount` out of the dealer's stack; an inexact payout is announced with its shortfall. */
function payFromHouse(table: Table, amount: number, narrator: Narrator, log: ScopedLog): Chip[] {
  const paid = table.dealer.chips.remove(amount);
  const value = chipsValue(paid);
  if (value !== amount) {
    narrator.say(`The house is short: it paid ${formatDollars(value)} of ${formatDollars(amount)} owed.`, 'warn');
    log.info('house payout short', { owed: amount, paid: value });
  }
  return paid;
}

function settleHand(state: RoundState, index: number, table: Table, narrator: Narrator, log: ScopedLog): HandResult {
  const hand = state.hands[index];
  const value = handValue(hand.cards);
  const dealerValue = handValue(state.dealer);
  const prefix = state.hands.length > 1 ? `Hand ${index + 1}: ` : '';
  const base = { cards: hand.cards, value, stake: hand.stake };

  if (hand.status === 'bust') {
    narrator.say(`${prefix}You lose ${formatDollars(hand.stake)}.`, 'error');
    return { ...base, outcome: 'bust', returned: 0 };
  }
  if (value === dealerValue) {
    narrator.say(`${prefix}It's a push. Both the dealer and you have the same hand value of ${value}.`, 'info');
    table.player.chips.add(hand.escrow);
    narrator.say(`You get your ${formatDollars(hand.stake)} back.`);
    return { ...base, outcome: 'push', returned: hand.stake };
  }
  if (value > dealerValue) {
    narrator.say(`${prefix}You win! Your hand value is ${value} vs dealer's ${dealerValue}.`, 'success');
    const won = payFromHouse(table, hand.stake, narrator, log);
    table.player.chips.add([...hand.escrow, ...won]);
    const returned = hand.stake + chipsValue(won);
    narrator.say(`You win ${formatDollars(returned)}.`, 'success');
    return { ...base, outcome: 'win', returned };
  }
  narrator.say(`${prefix}You lose. Your hand value is ${value} vs dealer's ${dealerValue}.`, 'error');
  narrator.say(`You lose ${formatDollars(hand.stake)}.`);
  return { ...base, outcome: 'lose', returned: 0 };
}

function settleBlackjack(state: RoundState, table: Table, narrator: Narrator, log: ScopedLog): HandResult {
  const hand = state.hands[0];
  narrator.say('You got blackjack! You win.', 'success');
  const winAmount = Math.ceil((hand.stake * 3) / 2);
  const won = payFromHouse(table, winAmount, narrator, log);
  table.player.chips.add([...hand.escrow, ...won]);
  const returned = hand.stake + chipsValue(won);
  narrator.say(`You win ${formatDollars(returned)}.`, 'success');
  return { cards: hand.cards, value: handValue(hand.cards), stake: hand.stake, outcome: 'blackjack', returned };
}

function finish(state: RoundState, results: HandResult[], blackjack: boolean): RoundResult {
  enter(state, 'done');
  const staked = results.reduce((s, r) => s + r.stake, 0);
  const returned = results.reduce((s, r) => s + r.returned, 0);
  return {
    bet: state.bet,
    blackjack,
    hands: results,
    dealerCards: state.dealer,
    dealerValue: handValue(state.dealer),
    net: returned - staked,
    phases: state.phases,
  };
}

/**
 * Plays one round against the house: bet, deal, the player's turn (including
 * a split hand), then settlement of every hand against the dealer's opening
 * two cards. The dealer never draws.
 */
export async function playRound(table: Table, io: RoundIO, opts: RoundOptions): Promise<RoundResult> {
  const { input, narrator } = io;
  const style = opts.cardStyle ?? 'text';
  const log = opts.log ?? rootLog.withScope('round');
  const { player, dealer } = table;

  narrator.say('Dealer shuffles a deck of cards.');
  const shoe = (opts.newShoe ?? (() => Shoe.createShuffled()))();
  reportChips(table, narrator);

  const bet = await placeBet(player, input, narrator, opts.limits);
  const state: RoundState = {
    phase: 'betting',
    phases: ['betting'],
    bet,
    firstMove: true,
    hands: [{ cards: [], stake: bet, escrow: escrowStake(player.chips, bet), doubled: false, status: 'playing' }],
    activeIndex: 0,
    splitPending: false,
    dealer: [],
  };
  log.info('bet placed', { bet, playerTotal: player.chips.totalValue() });

  dealer.dealInitial(shoe, state.hands[0].cards, state.dealer, narrator, style);
  enter(state, 'dealt');

  for (;;) {
    const hand: HandState = state.hands[state.activeIndex];
    if (state.phase === 'dealt') enter(state, 'player_turn');
    while (hand.status === 'playing') {
      showTable(state, narrator, style);

      if (state.firstMove && handValue(hand.cards) === BLACKJACK) {
        enter(state, 'settlement');
        const result = settleBlackjack(state, table, narrator, log);
        log.info('round settled', { bet, outcome: 'blackjack', returned: result.returned });
        return finish(state, [result], true);
      }
      state.firstMove = false;

      const actions = availableActions(state, player);
      narrator.say('What do you want to do?');
      const action = pickOption(actions, await input.choose(actions));
      narrator.say(`You chose to ${action}.`, 'dim');
      log.debug('decision', { action, hand: state.activeIndex, value: handValue(hand.cards) });

      switch (action) {
        case 'stand':
          hand.status = 'stood';
          break;
        case 'hit':
          dealer.deal(shoe, hand.cards, 'you', narrator, style);
          break;
        case 'double down':
          dealer.deal(shoe, hand.cards, 'you', narrator, style);
          hand.escrow.push(...escrowStake(player.chips, bet));
          hand.stake += bet;
          hand.doubled = true;
          hand.status = 'stood';
          narrator.say(`Your stake on this hand is now ${formatDollars(hand.stake)}.`);
          break;
        case 'split': {
          const second = hand.cards.splice(1, 1);
          state.hands.push({ cards: second, stake: bet, escrow: escrowStake(player.chips, bet), doubled: false, status: 'playing' });
          state.splitPending = true;
          narrator.say('You split your hand.');
          dealer.deal(shoe, hand.cards, 'you', narrator, style);
          break;
        }
      }

      const value = handValue(hand.cards);
      if (value > BLACKJACK) {
        hand.status = 'bust';
        narrator.say(`You have busted with hand value of ${value}.`, 'error');
      }
    }

    if (!state.splitPending) break;
    state.splitPending = false;
    state.activeIndex = 1;
    enter(state, 'split_active');
    narrator.say('Now playing your second hand.', 'title');
    dealer.deal(shoe, state.hands[1].cards, 'you', narrator, style);
  }

  enter(state, 'settlement');
  const results = state.hands.map((_, i) => settleHand(state, i, table, narrator, log));
  const round = finish(state, results, false);
  log.info('round settled', { bet, outcomes: results.map((r) => r.outcome), net: round.net });
  return round;
}
