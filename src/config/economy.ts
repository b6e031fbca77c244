import type { Denomination } from '../economy/chips.js';

// Opening stacks. Player: $500. House: $3,400.
export const PLAYER_START: readonly Denomination[] = [
  { value: 1, category: 'blue', count: 0 },
  { value: 5, category: 'red', count: 20 },
  { value: 25, category: 'green', count: 8 },
  { value: 100, category: 'black', count: 2 },
  { value: 500, category: 'purple', count: 0 },
  { value: 1000, category: 'orange', count: 0 },
];

export const DEALER_START: readonly Denomination[] = [
  { value: 1, category: 'blue', count: 100 },
  { value: 5, category: 'red', count: 20 },
  { value: 25, category: 'green', count: 12 },
  { value: 100, category: 'black', count: 5 },
  { value: 500, category: 'purple', count: 2 },
  { value: 1000, category: 'orange', count: 1 },
];
