import { describe, expect, test } from '@jest/globals';
import { cardToUnicode } from '../src/cards/unicode.js';
import { renderCard, renderHand } from '../src/ui/cardsDisplay.js';
import { card, cards } from './helpers.js';

describe('unicode playing cards', () => {
  test('specific glyphs', () => {
    expect(cardToUnicode(card('A♠'))).toBe(String.fromCodePoint(0x1f0a1));
    expect(cardToUnicode(card('Q♥'))).toBe(String.fromCodePoint(0x1f0bd));
    expect(cardToUnicode(card('5♦'))).toBe(String.fromCodePoint(0x1f0c5));
    expect(cardToUnicode(card('K♣'))).toBe(String.fromCodePoint(0x1f0de));
  });

  test('jack follows ten and the knight is skipped', () => {
    expect(cardToUnicode(card('10♠'))).toBe(String.fromCodePoint(0x1f0aa));
    expect(cardToUnicode(card('J♠'))).toBe(String.fromCodePoint(0x1f0ab));
    expect(cardToUnicode(card('Q♠'))).toBe(String.fromCodePoint(0x1f0ad));
  });

  test('display styles', () => {
    expect(renderCard(card('A♠'))).toBe('A♠');
    expect(renderCard(card('A♠'), 'unicode')).toBe(`${String.fromCodePoint(0x1f0a1)} A♠`);
    expect(renderHand(cards('7♦', '10♥'))).toBe('7♦, 10♥');
    expect(renderHand(cards('2♣', '3♣'), 'unicode')).toBe(`${String.fromCodePoint(0x1f0d2)} 2♣, ${String.fromCodePoint(0x1f0d3)} 3♣`);
  });
});
