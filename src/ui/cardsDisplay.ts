import { cardLabel, type Card } from '../cards/Card.js';
import { cardToUnicode } from '../cards/unicode.js';
import type { CardStyle } from '../config/index.js';

export function renderCard(card: Card, style: CardStyle = 'text'): string {
  return style === 'unicode' ? `${cardToUnicode(card)} ${cardLabel(card)}` : cardLabel(card);
}

export function renderHand(cards: readonly Card[], style: CardStyle = 'text'): string {
  return cards.map((c) => renderCard(c, style)).join(', ');
}
