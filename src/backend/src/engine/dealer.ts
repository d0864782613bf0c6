// Dealer final-total distribution by exact enumeration over the remaining composition
import { type RankCounts, RANKS, RANK_VALUES } from './cards.js';
import { InvariantViolationError } from './errors.js';
import { BUST_TOTAL, dealerStandsOn } from './rules.js';

/** Final dealer total (17-21, lower only when the shoe runs dry, 22 = bust) to probability. */
export type DealerDistribution = ReadonlyMap<number, number>;

type Memo = Map<string, DealerDistribution>;

/**
 * Distribution of the dealer's final total starting from `total`/`soft`
 * with `counts` cards left to draw from.
 *
 * The memo lives for one call only: the composition changes with every card,
 * so nothing carries over between calls. Counts are copied per branch and
 * never mutated in place.
 */
export function dealerDistributionFrom(
  total: number,
  soft: boolean,
  counts: RankCounts,
  dealerHitsSoft17: boolean
): DealerDistribution {
  const start = RANKS.map(rank => counts[rank]);
  const negative = RANKS.filter((_, index) => start[index] < 0);
  if (negative.length > 0) {
    throw new InvariantViolationError(`Negative remaining count for ${negative.join(', ')}`);
  }
  return distribution(total, soft, start, dealerHitsSoft17, new Map());
}

function distribution(
  total: number,
  soft: boolean,
  counts: readonly number[],
  dealerHitsSoft17: boolean,
  memo: Memo
): DealerDistribution {
  if (dealerStandsOn(total, soft, dealerHitsSoft17)) {
    return new Map([[total, 1]]);
  }

  const key = `${total}:${soft ? 's' : 'h'}:${counts.join(',')}`;
  const cached = memo.get(key);
  if (cached) return cached;

  const remaining = counts.reduce((sum, count) => sum + count, 0);
  const result = new Map<number, number>();

  if (remaining === 0) {
    // Shoe ran dry below 17: the dealer keeps what it has
    result.set(total, 1);
    memo.set(key, result);
    return result;
  }

  RANKS.forEach((rank, index) => {
    const count = counts[index];
    if (count === 0) return;
    const probability = count / remaining;

    let nextTotal: number;
    let nextSoft = soft;
    if (rank === 'A' && total + 11 <= 21) {
      nextTotal = total + 11;
      nextSoft = true;
    } else if (rank === 'A') {
      nextTotal = total + 1;
    } else {
      nextTotal = total + RANK_VALUES[rank];
    }

    // A soft hand that would bust drops its Ace back to 1
    if (nextTotal > 21 && nextSoft) {
      nextTotal -= 10;
      nextSoft = false;
    }

    if (nextTotal > 21) {
      accumulate(result, BUST_TOTAL, probability);
      return;
    }

    const nextCounts = counts.slice();
    nextCounts[index]--;
    for (const [finalTotal, p] of distribution(nextTotal, nextSoft, nextCounts, dealerHitsSoft17, memo)) {
      accumulate(result, finalTotal, probability * p);
    }
  });

  memo.set(key, result);
  return result;
}

function accumulate(target: Map<number, number>, total: number, probability: number): void {
  target.set(total, (target.get(total) ?? 0) + probability);
}

export function bustProbabilityOf(dist: DealerDistribution): number {
  return dist.get(BUST_TOTAL) ?? 0;
}
