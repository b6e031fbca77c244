import type { ChipSummary } from '../economy/chips.js';

export function formatDollars(n: number): string {
  return `$${n.toLocaleString('en-US')}`;
}

export function deltaBadge(n: number): string {
  const sign = n >= 0 ? '+' : '−';
  return `${sign}${formatDollars(Math.abs(n))}`;
}

export function chipLines(summary: ChipSummary): string[] {
  const lines = summary.lines.map((l) => `${l.count} ${l.category} (${formatDollars(l.value)}) chips`);
  lines.push(`Total chip value: ${formatDollars(summary.total)}`);
  return lines;
}
