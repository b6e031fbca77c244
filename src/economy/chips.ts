export type Chip = Readonly<{ value: number; category: string }>;

export type Denomination = { value: number; category: string; count: number };

export type ChipSummaryLine = { value: number; category: string; count: number; subtotal: number };

export type ChipSummary = { lines: ChipSummaryLine[]; total: number };

export function chipsValue(chips: readonly Chip[]): number {
  return chips.reduce((sum, c) => sum + c.value, 0);
}

/**
 * A participant's chips. Removal is greedy by descending denomination, so a
 * request the held chips cannot express exactly comes back short.
 */
export class ChipStack {
  private chips: Chip[] = [];

  static fromCounts(denominations: readonly Denomination[]): ChipStack {
    const stack = new ChipStack();
    for (const d of denominations) {
      if (!Number.isInteger(d.value) || d.value <= 0) throw new RangeError(`chip value must be a positive integer: ${d.value}`);
      for (let i = 0; i < d.count; i++) stack.chips.push(Object.freeze({ value: d.value, category: d.category }));
    }
    return stack;
  }

  get size(): number {
    return this.chips.length;
  }

  add(chips: readonly Chip[]): void {
    this.chips.push(...chips);
  }

  /** Takes chips of at most `amount` total; the sum is exact whenever the greedy walk finds it. */
  remove(amount: number): Chip[] {
    const taken: Chip[] = [];
    const kept: Chip[] = [];
    let remaining = amount;
    for (const chip of this.sortedDesc()) {
      if (chip.value <= remaining) {
        taken.push(chip);
        remaining -= chip.value;
      } else {
        kept.push(chip);
      }
    }
    this.chips = kept;
    return taken;
  }

  /** Dry run of `remove`: true when it would take exactly `amount`. */
  coversExactly(amount: number): boolean {
    let remaining = amount;
    for (const chip of this.sortedDesc()) {
      if (chip.value <= remaining) remaining -= chip.value;
    }
    return remaining === 0;
  }

  totalValue(): number {
    return chipsValue(this.chips);
  }

  summary(): ChipSummary {
    const byKind = new Map<string, ChipSummaryLine>();
    for (const chip of this.chips) {
      const key = `${chip.value}:${chip.category}`;
      const line = byKind.get(key);
      if (line) {
        line.count++;
        line.subtotal += chip.value;
      } else {
        byKind.set(key, { value: chip.value, category: chip.category, count: 1, subtotal: chip.value });
      }
    }
    const lines = [...byKind.values()].sort((a, b) => a.value - b.value);
    return { lines, total: lines.reduce((sum, l) => sum + l.subtotal, 0) };
  }

  private sortedDesc(): Chip[] {
    return this.chips.slice().sort((a, b) => b.value - a.value);
  }
}
