import { log as rootLog } from '../../cli/logger.js';
import { formatDollars } from '../../ui/outcome.js';
import { canPlaceBet, pickOption, playRound } from './engine.js';
import type { Table } from './participants.js';
import type { RoundIO, RoundOptions, RoundResult } from './types.js';

export type SessionSummary = {
  rounds: RoundResult[];
  startingTotal: number;
  finalTotal: number;
  endedBy: 'quit' | 'broke';
};

const AGAIN = ['play again', 'quit'] as const;

/** Plays rounds on `table` until the player quits or can no longer cover a bet. */
export async function runSession(table: Table, io: RoundIO, opts: RoundOptions): Promise<SessionSummary> {
  const log = opts.log ?? rootLog.withScope('session');
  const startingTotal = table.player.chips.totalValue();
  const rounds: RoundResult[] = [];
  let endedBy: SessionSummary['endedBy'] = 'quit';

  for (;;) {
    if (!canPlaceBet(table.player, opts.limits)) {
      io.narrator.say(`You are out of chips. You need ${formatDollars(opts.limits.min_bet)} to bet.`, 'warn');
      endedBy = 'broke';
      break;
    }
    rounds.push(await playRound(table, io, opts));
    io.narrator.say('What do you want to do?');
    const next = pickOption(AGAIN, await io.input.choose(AGAIN));
    io.narrator.say(`You chose to ${next}.`, 'dim');
    if (next === 'quit') break;
  }

  const finalTotal = table.player.chips.totalValue();
  log.info('session ended', { rounds: rounds.length, startingTotal, finalTotal, endedBy });
  return { rounds, startingTotal, finalTotal, endedBy };
}
