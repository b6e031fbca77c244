import { describe, expect, test } from '@jest/globals';
import { Readable } from 'node:stream';
import { InputClosedError, InvalidInputError } from '../../util/errors.js';
import { RecordingNarrator } from '../narrator.js';
import { createPrompter, parseAmount, parseChoice, readlineSource, type LineSource } from '../prompt.js';

function lineSource(lines: string[]): LineSource {
  const queue = lines.slice();
  return {
    async next() {
      const line = queue.shift();
      return line === undefined ? null : line;
    },
    close() {},
  };
}

describe('prompt', () => {
  test('choose re-prompts until a listed option is picked', async () => {
    const narrator = new RecordingNarrator();
    const input = createPrompter(lineSource(['abc', '3', ' 2 ']), narrator);
    await expect(input.choose(['stand', 'hit'])).resolves.toBe(2);
    expect(narrator.lines).toEqual([
      '1. stand',
      '2. hit',
      'Please input an integer.',
      'Please input one of the provided choices.',
    ]);
  });

  test('askAmount keeps to the bounds', async () => {
    const narrator = new RecordingNarrator();
    const input = createPrompter(lineSource(['4', '501', '5.5', '250']), narrator);
    await expect(input.askAmount(5, 500)).resolves.toBe(250);
    expect(narrator.lines).toEqual([
      'Enter an amount from 5 to 500:',
      'Please input an amount from 5 to 500.',
      'Please input an amount from 5 to 500.',
      'Please input an integer.',
    ]);
  });

  test('closed input ends the prompt', async () => {
    const input = createPrompter(lineSource(['x']), new RecordingNarrator());
    await expect(input.choose(['play again', 'quit'])).rejects.toThrow(InputClosedError);
  });

  test('parsers', () => {
    expect(parseChoice('+2', 3)).toBe(2);
    expect(() => parseChoice('0', 3)).toThrow(InvalidInputError);
    expect(() => parseChoice('', 3)).toThrow('Please input an integer.');
    expect(parseAmount('500', 5, 500)).toBe(500);
    expect(() => parseAmount('-5', 5, 500)).toThrow(InvalidInputError);
  });

  test('readline source yields lines then null', async () => {
    const src = readlineSource(Readable.from(['1\n', '2\n']));
    await expect(src.next()).resolves.toBe('1');
    await expect(src.next()).resolves.toBe('2');
    await expect(src.next()).resolves.toBeNull();
    src.close();
  });
});
