// Category labels arrive hand-typed across export files ("Pistols", " pistols ", "Long  Guns").

export interface CanonicalCategory {
  /** Comparison key: trimmed, whitespace collapsed, case-folded. */
  key: string;
  /** Trimmed, whitespace-collapsed spelling as it appeared. */
  display: string;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function categoryKey(value: string): string {
  return collapseWhitespace(value.normalize('NFKC')).toLowerCase();
}

export function canonicalCategory(value: string): CanonicalCategory | undefined {
  const display = collapseWhitespace(value);
  if (!display) return undefined;
  return { key: categoryKey(display), display };
}

/**
 * Picks the display form for one category key: the most frequent spelling, ties going to
 * the spelling observed first.
 */
export class DisplayNameTally {
  private readonly counts = new Map<string, number>();

  observe(display: string): void {
    this.counts.set(display, (this.counts.get(display) ?? 0) + 1);
  }

  pick(): string | undefined {
    let best: string | undefined;
    let bestCount = 0;
    for (const [display, count] of this.counts) {
      if (count > bestCount) {
        best = display;
        bestCount = count;
      }
    }
    return best;
  }
}
