/**
 * LabelMatcher — converges near-identical entity labels onto one
 * canonical label.
 *
 * Similarity is the normalised indel ratio of two labels:
 * `100 * 2 * LCS(a, b) / (|a| + |b|)`, where LCS is the longest common
 * subsequence over code points. Two identical strings score 100.
 */

/**
 * Normalise a label for comparison and identity derivation:
 * NFKC, trimmed, whitespace collapsed, lower-cased.
 */
export function normalizeLabel(label: string): string {
  return label.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Indel similarity ratio of two strings, 0-100.
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 100;
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 100;

  let previous = new Array<number>(right.length + 1).fill(0);
  let current = new Array<number>(right.length + 1).fill(0);
  for (let i = 1; i <= left.length; i++) {
    for (let j = 1; j <= right.length; j++) {
      if (left[i - 1] === right[j - 1]) {
        current[j] = (previous[j - 1] ?? 0) + 1;
      } else {
        current[j] = Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
      }
    }
    [previous, current] = [current, previous];
  }
  const lcs = previous[right.length] ?? 0;
  return (200 * lcs) / total;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface CanonicalLabel {
  /** Normalised canonical label, the input to identity derivation */
  normalized: string;
  /** Display form used for rdfs:label */
  display: string;
}

/**
 * Assigns every label a canonical label.
 *
 * Known labels (seeded from the knowledge base) are canonicalised first,
 * among themselves, so stored near-duplicates converge too. A new label equal to a canonical label maps to it; otherwise the
 * canonical label with the best score at or above the threshold wins, ties
 * going to the alphabetically earliest label; otherwise the label becomes
 * canonical itself. Batches are processed in ascending alphabetical order
 * of normalised labels, so the outcome does not depend on input order.
 */
export class LabelCanonicalizer {
  /** Canonical normalised labels, sorted ascending */
  private readonly canonical: string[] = [];
  private readonly display = new Map<string, string>();
  private readonly assigned = new Map<string, string>();

  constructor(
    private readonly threshold: number,
    known: Iterable<string> = []
  ) {
    this.canonicalizeAll(known);
  }

  /**
   * Canonicalise a batch of labels.
   */
  canonicalizeAll(labels: Iterable<string>): void {
    const byNormalized = new Map<string, string>();
    for (const label of labels) {
      const normalized = normalizeLabel(label);
      if (normalized === '') continue;
      const display = label.trim();
      const existing = byNormalized.get(normalized);
      if (existing === undefined || compareText(display, existing) < 0) {
        byNormalized.set(normalized, display);
      }
    }
    const ordered = [...byNormalized.keys()].sort(compareText);
    for (const normalized of ordered) {
      this.assign(normalized, byNormalized.get(normalized) ?? normalized);
    }
  }

  /**
   * Canonical label for a single label, assigning it if unseen.
   */
  canonicalize(label: string): CanonicalLabel {
    const normalized = normalizeLabel(label);
    const canonical = this.assign(normalized, label.trim());
    return { normalized: canonical, display: this.display.get(canonical) ?? canonical };
  }

  get size(): number {
    return this.canonical.length;
  }

  private assign(normalized: string, display: string): string {
    const cached = this.assigned.get(normalized);
    if (cached !== undefined) return cached;

    let match: string | undefined;
    if (this.display.has(normalized)) {
      match = normalized;
    } else if (this.threshold < 100) {
      let bestScore = -1;
      for (const candidate of this.canonical) {
        const score = similarity(normalized, candidate);
        // strictly greater: the earlier (alphabetically smaller) candidate keeps ties
        if (score >= this.threshold && score > bestScore) {
          bestScore = score;
          match = candidate;
        }
      }
    }

    if (match === undefined) {
      this.addCanonical(normalized, display);
      match = normalized;
    }
    this.assigned.set(normalized, match);
    return match;
  }

  private addCanonical(normalized: string, display: string): void {
    this.display.set(normalized, display);
    this.assigned.set(normalized, normalized);
    let index = this.canonical.length;
    while (index > 0 && compareText(this.canonical[index - 1] ?? '', normalized) > 0) {
      index--;
    }
    this.canonical.splice(index, 0, normalized);
  }
}
