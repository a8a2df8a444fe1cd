/**
 * Splits a position across N levels (take-profit or entry ladders)
 */

const WEIGHT_SEPARATOR = /[\s,/]+/;

function equalSplit(levelCount: number): number[] {
  return Array.from({ length: levelCount }, () => 1 / levelCount);
}

/**
 * Parse a single weight token; "50", "50%" and "0.5" all mean one half
 */
function parseWeight(token: string): number {
  const isPercent = token.endsWith('%');
  const value = Number(isPercent ? token.slice(0, -1) : token);
  return isPercent || value > 1 ? value / 100 : value;
}

export class FractionAllocator {
  private weighting: string | undefined;

  constructor(weighting?: string) {
    this.weighting = weighting;
  }

  getWeighting(): string | undefined {
    return this.weighting;
  }

  /**
   * Replace the weighting; later allocations pick it up immediately
   */
  setWeighting(weighting: string | undefined): void {
    this.weighting = weighting?.trim() ? weighting.trim() : undefined;
  }

  allocate(levelCount: number): number[] {
    if (!Number.isInteger(levelCount) || levelCount <= 0) {
      return [];
    }

    if (!this.weighting) {
      return equalSplit(levelCount);
    }

    const tokens = this.weighting.split(WEIGHT_SEPARATOR).filter(token => token.length > 0);
    if (tokens.length !== levelCount) {
      return equalSplit(levelCount);
    }

    const weights = tokens.map(parseWeight);
    if (weights.some(weight => !Number.isFinite(weight) || weight < 0)) {
      return equalSplit(levelCount);
    }

    const total = weights.reduce((sum, weight) => sum + weight, 0);
    if (total <= 0) {
      return equalSplit(levelCount);
    }

    return weights.map(weight => weight / total);
  }
}
