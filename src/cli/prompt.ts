import readline from 'node:readline';
import type { Narrator, PlayerInput } from '../games/blackjack/types.js';
import { InputClosedError, InvalidInputError } from '../util/errors.js';

/** Source of raw input lines; `null` once the input has ended. */
export interface LineSource {
  next(): Promise<string | null>;
  close(): void;
}

export function readlineSource(input: NodeJS.ReadableStream = process.stdin): LineSource {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  return {
    async next() {
      const r = await lines.next();
      return r.done ? null : r.value;
    },
    close: () => rl.close(),
  };
}

function parseInteger(raw: string): number {
  const s = raw.trim();
  if (!/^[+-]?\d+$/.test(s)) throw new InvalidInputError('Please input an integer.', raw);
  return Number(s);
}

export function parseChoice(raw: string, count: number): number {
  const n = parseInteger(raw);
  if (n < 1 || n > count) throw new InvalidInputError('Please input one of the provided choices.', raw);
  return n;
}

export function parseAmount(raw: string, min: number, max: number): number {
  const n = parseInteger(raw);
  if (n < min || n > max) throw new InvalidInputError(`Please input an amount from ${min} to ${max}.`, raw);
  return n;
}

/** Reads lines until `parse` accepts one; rejections are shown and asked again. */
async function ask<T>(lines: LineSource, narrator: Narrator, parse: (raw: string) => T): Promise<T> {
  for (;;) {
    const raw = await lines.next();
    if (raw === null) throw new InputClosedError();
    try {
      return parse(raw);
    } catch (e) {
      if (!(e instanceof InvalidInputError)) throw e;
      narrator.say(e.message, 'warn');
    }
  }
}

export function createPrompter(lines: LineSource, narrator: Narrator): PlayerInput {
  return {
    choose(options) {
      options.forEach((o, i) => narrator.say(`${i + 1}. ${o}`));
      return ask(lines, narrator, (raw) => parseChoice(raw, options.length));
    },
    askAmount(min, max) {
      narrator.say(`Enter an amount from ${min} to ${max}:`);
      return ask(lines, narrator, (raw) => parseAmount(raw, min, max));
    },
  };
}
